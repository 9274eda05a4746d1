import { parseEnglishBenedict, parseFinnishBenedict } from "./benedict.js";
import { parseCorcencc } from "./corcencc.js";
import { parseTorch } from "./torch.js";
import type { CorpusParser } from "./common.js";

/**
 * Corpus parsers keyed by the dataset name they produce.
 *
 * ```ts
 * import { corpusParsers } from "usas-eval";
 *
 * const dataset = corpusParsers["Benedict English"]("benedict_english.txt", {
 *   labelFilter: new Set(["Z99"]),
 * });
 * ```
 */
export const corpusParsers = {
  "Benedict English": parseEnglishBenedict,
  "Benedict Finnish": parseFinnishBenedict,
  Corcencc: parseCorcencc,
  Torch: parseTorch,
} as const satisfies Record<string, CorpusParser>;

export type CorpusName = keyof typeof corpusParsers;

export { parseEnglishBenedict, parseFinnishBenedict } from "./benedict.js";
export { parseCorcencc } from "./corcencc.js";
export { parseTorch, splitTorchLabels } from "./torch.js";
export type { CorpusParser, LabelCorrector, LabelSite, ParseOptions } from "./common.js";
