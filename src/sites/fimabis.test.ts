import { describe, expect, it } from "vitest";
import { fimabis } from "./fimabis.js";
import { testContext } from "./testing.js";

const LISTING_URL = "https://www.rfgi.es/ConvocatoriasPropiasFIMABIS/es/Convocatorias/DetalleTipoConvocatoria/FIMAB_EM?Estado=A";

describe("fimabis extractor", () => {
  it("reads the Fundanet table and skips its header", async () => {
    const html = `
      <table>
        <tr><th>Título</th><th>F.Inicio</th><th>F.Fin</th></tr>
        <tr>
          <td><a href="/ConvocatoriasPropiasFIMABIS/es/Convocatorias/Detalle/123">Contrato técnico de apoyo</a></td>
          <td>02/01/2025</td><td>20/01/2025</td>
        </tr>
        <tr><td>Investigador/a postdoctoral</td><td>10 de enero de 2025</td><td></td></tr>
        <tr><td>Beca</td><td>01/01/2025</td><td>05/01/2025</td></tr>
      </table>`;
    const { ctx } = testContext({ url: LISTING_URL });

    expect(await fimabis.extract(html, ctx)).toEqual([
      {
        title: "Contrato técnico de apoyo",
        link: "https://www.rfgi.es/ConvocatoriasPropiasFIMABIS/es/Convocatorias/Detalle/123",
        start_date: "2025-01-02",
        deadline: "2025-01-20",
      },
      { title: "Investigador/a postdoctoral", link: "", start_date: "2025-01-10", deadline: null },
    ]);
  });

  it("falls back to list items when there is no table", async () => {
    const html = `
      <ul>
        <li><h4>Técnico de datos clínicos</h4> <a href="doc.pdf">Bases</a> Plazo hasta 28/02/2025</li>
        <li>Oferta cerrada: Auxiliar administrativo</li>
      </ul>`;
    const { ctx } = testContext({ url: LISTING_URL });

    expect(await fimabis.extract(html, ctx)).toEqual([
      {
        title: "Técnico de datos clínicos",
        link: "https://www.rfgi.es/ConvocatoriasPropiasFIMABIS/es/Convocatorias/DetalleTipoConvocatoria/doc.pdf",
        deadline: "2025-02-28",
      },
    ]);
  });
});
