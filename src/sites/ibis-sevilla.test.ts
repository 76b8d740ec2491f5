import { describe, expect, it } from "vitest";
import { detailLinks, ibisSevilla } from "./ibis-sevilla.js";
import { testContext } from "./testing.js";

const LISTING_URL = "https://www.ibis-sevilla.es/es/ofertas-empleo/";
const BASE = "https://www.ibis-sevilla.es/es/ofertas-empleo/ofertas-de-empleo-ibis";

const LISTING = `
  <a href="/es/ofertas-empleo/ofertas-de-empleo-ibis/">Ofertas de empleo</a>
  <a href="/es/inicio/">Inicio empleo</a>
  <a href="${BASE}/tecnico-citometria/">Oferta: Técnico de citometría</a>
  <a href="${BASE}/gestor-proyectos/">Convocatoria gestor de proyectos</a>
  <a href="${BASE}/tecnico-citometria/">Oferta: Técnico de citometría</a>
  <a href="/es/noticias/plaza-nueva/">Plaza nueva en el edificio</a>`;

describe("detailLinks", () => {
  it("keeps unique offer detail pages under the IBiS section", () => {
    expect(detailLinks(LISTING, LISTING_URL)).toEqual([
      `${BASE}/tecnico-citometria/`,
      `${BASE}/gestor-proyectos/`,
    ]);
  });
});

describe("ibis-sevilla extractor", () => {
  it("reads each detail page and drops closed offers", async () => {
    const { ctx } = testContext(
      { url: LISTING_URL },
      {
        [`${BASE}/tecnico-citometria/`]: `
          <h1>Técnico de citometría</h1>
          <p>Estado: abierta. Plazo de solicitud del 08/01/2025 al 22/01/2025.</p>`,
        [`${BASE}/gestor-proyectos/`]: `
          <h1>Gestor de proyectos</h1>
          <p>Convocatoria finalizada el 10/12/2024.</p>`,
      }
    );

    expect(await ibisSevilla.extract(LISTING, ctx)).toEqual([
      {
        title: "Técnico de citometría",
        link: `${BASE}/tecnico-citometria/`,
        start_date: "2025-01-08",
        deadline: "2025-01-22",
        location: "Sevilla",
      },
    ]);
  });

  it("skips a detail page that fails to load", async () => {
    const { ctx } = testContext(
      { url: LISTING_URL },
      { [`${BASE}/gestor-proyectos/`]: "<h1>Gestor de proyectos</h1><p>Abierta hasta 30/01/2025</p>" }
    );

    const postings = await ibisSevilla.extract(LISTING, ctx);
    expect(postings.map((p) => p.title)).toEqual(["Gestor de proyectos"]);
  });
});
