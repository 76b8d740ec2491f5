import type { SiteExtractor } from "../types.js";
import { biobizkaia } from "./biobizkaia.js";
import { ciberisciii } from "./ciberisciii.js";
import { fimabis } from "./fimabis.js";
import { ibisSevilla } from "./ibis-sevilla.js";
import { ibsGranada } from "./ibs-granada.js";
import { ibsal } from "./ibsal.js";
import { idibaps } from "./idibaps.js";
import { idisSantiago } from "./idis-santiago.js";
import { idival } from "./idival.js";
import { igtp } from "./igtp.js";
import { iisLaFe } from "./iis-la-fe.js";
import { iisPrincesa } from "./iis-princesa.js";
import { iisgm } from "./iisgm.js";
import { imib } from "./imib.js";
import { puertaHierro } from "./puerta-hierro.js";

export const EXTRACTORS: SiteExtractor[] = [
  ciberisciii,
  fimabis,
  igtp,
  imib,
  idival,
  ibisSevilla,
  ibsGranada,
  ibsal,
  puertaHierro,
  idibaps,
  idisSantiago,
  iisLaFe,
  iisPrincesa,
  iisgm,
  biobizkaia,
];

export function getExtractor(id: string): SiteExtractor | undefined {
  return EXTRACTORS.find((e) => e.id === id);
}
