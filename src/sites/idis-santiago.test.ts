import { describe, expect, it } from "vitest";
import { idisSantiago } from "./idis-santiago.js";
import { testContext } from "./testing.js";

const LISTING_URL = "https://empleo.idisantiago.es/ofertastrabajo/publicadas";

describe("idis-santiago extractor", () => {
  it("reads open offer blocks with reference and both dates", async () => {
    const html = `
      <div class="ofertas-list">
        <div class="oferta">
          <h5>TITULADO/A SUPERIOR EN BIOLOGÍA</h5>
          <p>Referencia: 23/2025</p>
          <p>Publicación: 02/01/2025</p>
          <p>Fin de plazo: 24/01/2025</p>
          <span>Abierto</span>
          <a href="/ofertastrabajo/ver/23">Ver oferta</a>
        </div>
        <div class="oferta">
          <h5>TÉCNICO/A DE LABORATORIO</h5>
          <p>Referencia: 19/2024</p>
          <p>01/11/2024</p>
          <p>15/11/2024</p>
          <span>Cerrado</span>
        </div>
      </div>`;
    const { ctx } = testContext({ url: LISTING_URL });

    expect(await idisSantiago.extract(html, ctx)).toEqual([
      {
        title: "TITULADO/A SUPERIOR EN BIOLOGÍA",
        link: "https://empleo.idisantiago.es/ofertastrabajo/ver/23",
        start_date: "2025-01-02",
        deadline: "2025-01-24",
        reference: "23/2025",
        location: "Santiago de Compostela",
      },
    ]);
  });

  it("finds the title by role when there is no heading", async () => {
    const html = `
      <div class="convocatoria">
        Referencia 4/2025
        INVESTIGADOR/A POSTDOCTORAL EN ONCOLOGÍA
        Abierto hasta 31/01/2025
      </div>`;
    const { ctx } = testContext({ url: LISTING_URL });

    const [posting] = await idisSantiago.extract(html, ctx);
    expect(posting).toMatchObject({
      title: "INVESTIGADOR/A POSTDOCTORAL EN ONCOLOGÍA",
      reference: "4/2025",
      start_date: "2025-01-31",
      deadline: "2025-01-31",
    });
  });
});
