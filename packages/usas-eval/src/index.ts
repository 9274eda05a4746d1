export { parseUsasTag, parseUsasTagGroups, joinTagCodes, isUsasTagText } from "./tags/index.js";
export { applyLabelOptions, resolveLabelGroup, assertTokenIsNotTag } from "./labels.js";
export type { LabelOptions } from "./labels.js";
export { validateBracketLine, getBracketMweIndexes, validateSuffixLine, parseFormattedLine } from "./formats/index.js";
export type { BracketLine, LineFormat, SuffixLine } from "./formats/index.js";
export { getAllMweTokenIndexes } from "./mwe.js";
export { createEvaluationTexts, createEvaluationDataset, EvaluationTextsSchema, EvaluationDatasetSchema, TextLevelSchema, TEXT_LEVELS } from "./dataset.js";
export type { EvaluationDataset, EvaluationDatasetInput, EvaluationTexts, TextLevel } from "./dataset.js";
export { flattenTaxonomy, loadUsasMapper } from "./taxonomy.js";
export { corpusParsers, parseEnglishBenedict, parseFinnishBenedict, parseCorcencc, parseTorch, splitTorchLabels } from "./parsers/index.js";
export type { CorpusName, CorpusParser, LabelCorrector, LabelSite, ParseOptions } from "./parsers/index.js";
export { parseCorpusDiagnostics } from "./diagnostics.js";
export type { CorpusDiagnostic, CorpusParseResult } from "./diagnostics.js";
export { defaultLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { PUNCT } from "./types.js";
export type { MweIndexSet, UsasTag, UsasTagGroup } from "./types.js";
