import { describe, expect, it } from "vitest";
import { biobizkaia } from "./biobizkaia.js";
import { testContext } from "./testing.js";

const LISTING_URL = "https://www.biobizkaia.org/es/empleo";

describe("biobizkaia extractor", () => {
  it("reads table rows and drops closed ones", async () => {
    const html = `
      <table>
        <tr><th>Título</th><th>Inicio</th><th>Fin</th><th>Estado</th></tr>
        <tr>
          <td><a href="/es/empleo/oferta-123">Técnico de cultivos celulares</a></td>
          <td>08/01/2025</td><td>22/01/2025</td><td>Abierta</td>
        </tr>
        <tr><td>Investigador senior</td><td>01/10/2024</td><td>15/10/2024</td><td>Cerrada</td></tr>
        <tr><td>Gestor de ensayos</td><td>09/01/2025</td><td>sin fecha</td><td></td></tr>
      </table>`;
    const { ctx } = testContext({ url: LISTING_URL });

    expect(await biobizkaia.extract(html, ctx)).toEqual([
      {
        title: "Técnico de cultivos celulares",
        link: "https://www.biobizkaia.org/es/empleo/oferta-123",
        start_date: "2025-01-08",
        deadline: "2025-01-22",
        location: "Bizkaia",
      },
      {
        title: "Gestor de ensayos",
        link: "",
        start_date: "2025-01-09",
        deadline: null,
        location: "Bizkaia",
      },
    ]);
  });

  it("falls back to offer blocks when there is no table", async () => {
    const html = `
      <div class="convocatoria-item">
        <h3>Bioestadístico/a</h3>
        <p>Del 10/01/2025 al 30/01/2025</p>
        <a href="/es/convocatorias/55">Más info</a>
      </div>`;
    const { ctx } = testContext({ url: LISTING_URL });

    expect(await biobizkaia.extract(html, ctx)).toEqual([
      {
        title: "Bioestadístico/a",
        link: "https://www.biobizkaia.org/es/convocatorias/55",
        start_date: "2025-01-10",
        deadline: "2025-01-30",
        location: "Bizkaia",
      },
    ]);
  });

  it("reads a lone block date as the deadline", async () => {
    const html = `
      <article>
        <h3>Técnico de bioinformática</h3>
        <p>Plazo: 14/02/2025</p>
      </article>`;
    const { ctx } = testContext({ url: LISTING_URL });

    const [posting] = await biobizkaia.extract(html, ctx);
    expect(posting?.deadline).toBe("2025-02-14");
  });
});
