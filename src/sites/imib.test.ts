import { describe, expect, it } from "vitest";
import { imib, referenceBlocks } from "./imib.js";
import { testContext } from "./testing.js";

const LISTING_URL = "https://www.imib.es/rrhh/ofertasDeEmpleo.jsf";

describe("imib extractor", () => {
  it("reads open rows of the data table", async () => {
    const html = `
      <table>
        <thead><tr><th>Oferta</th><th>Plazo</th><th>Estado</th></tr></thead>
        <tbody>
          <tr>
            <td><a href="ofertaDetalle.jsf?id=12">Técnico/a de apoyo a la investigación</a></td>
            <td>Del 10/01/2025 al 24/01/2025</td>
            <td>Abierto</td>
          </tr>
          <tr><td>Gestor de ensayos</td><td>01/12/2024</td><td>Cerrado</td></tr>
        </tbody>
      </table>`;
    const { ctx } = testContext({ url: LISTING_URL });

    expect(await imib.extract(html, ctx)).toEqual([
      {
        title: "Técnico/a de apoyo a la investigación",
        link: "https://www.imib.es/rrhh/ofertaDetalle.jsf?id=12",
        deadline: "2025-01-24",
      },
    ]);
  });

  it("falls back to reference codes in the page text", async () => {
    const html = `
      <body>
        <p>Resolución de convocatoria de Técnico de laboratorio (IMIB24_C07)</p>
        <p>Estado: Abierto</p>
        <p>Publicación 02/01/2025 - Fin de plazo 20/01/2025</p>
      </body>`;
    const { ctx } = testContext({ url: LISTING_URL });

    const [posting] = await imib.extract(html, ctx);
    expect(posting).toMatchObject({
      title: "Resolución de convocatoria de Técnico de laboratorio (IMIB24_C07)",
      reference: "IMIB24_C07",
      deadline: "2025-01-20",
      start_date: "2025-01-02",
    });
  });
});

describe("referenceBlocks", () => {
  it("takes the title from the resolution heading up to the reference", () => {
    const text =
      "Ofertas de empleo Resolución de convocatoria de Técnico de laboratorio (IMIB24_C07) Estado: Abierto Publicación 02/01/2025 Fin de plazo 20/01/2025";

    expect(referenceBlocks(text)).toEqual([
      {
        title: "Resolución de convocatoria de Técnico de laboratorio (IMIB24_C07)",
        link: "",
        deadline: "2025-01-20",
        start_date: "2025-01-02",
        reference: "IMIB24_C07",
        location: "Murcia",
      },
    ]);
  });

  it("skips calls without an open status nearby", () => {
    expect(referenceBlocks("Resolución de Auxiliar administrativo (IMIB23_C02) Estado: Cerrado 01/03/2023")).toEqual([]);
  });

  it("names a call by its reference when no heading of its own precedes it", () => {
    const text =
      "Resolución de convocatoria de Técnico de laboratorio (IMIB24_C07) Estado: Abierto. " +
      "Bioinformático (IMIB24_C08) Estado: Abierto Fin de plazo 20/01/2025";

    expect(referenceBlocks(text).map((p) => p.title)).toEqual([
      "Resolución de convocatoria de Técnico de laboratorio (IMIB24_C07)",
      "Convocatoria IMIB24_C08",
    ]);
  });

  it("does not take the title from unrelated text before the reference", () => {
    const [posting] = referenceBlocks(
      "Jornada de puertas abiertas el 10/01/2025 en el salón de actos. Técnico (IMIB25_C01) Estado: Abierto"
    );
    expect(posting?.title).toBe("Convocatoria IMIB25_C01");
    expect(posting?.reference).toBe("IMIB25_C01");
  });
});
