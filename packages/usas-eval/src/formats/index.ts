import { createEvaluationTexts, type EvaluationTexts } from "../dataset.js";
import { assertTokenIsNotTag, type LabelOptions } from "../labels.js";
import { getBracketMweIndexes, validateBracketLine } from "./bracket.js";
import { validateSuffixLine } from "./suffix.js";

/** `bracket`: `tok_TAG[i1.2.1` lines; `suffix`: `tok_TAG_i` lines */
export type LineFormat = "bracket" | "suffix";

/**
 * Parse one corpus line into an evaluation text. The text is the line
 * itself, markers included; lemmas and POS tags are not available.
 */
export function parseFormattedLine(line: string, format: LineFormat, options?: LabelOptions): EvaluationTexts {
  if (format === "bracket") {
    const { text, tokens, semanticTags } = validateBracketLine(line, options);
    for (const token of tokens) assertTokenIsNotTag(token, line);
    return createEvaluationTexts({
      text,
      tokens,
      lemmas: null,
      posTags: null,
      semanticTags,
      mweIndexes: getBracketMweIndexes(text),
    });
  }

  const { text, tokens, semanticTags, mweIndexes } = validateSuffixLine(line, options);
  for (const token of tokens) assertTokenIsNotTag(token, line);
  return createEvaluationTexts({ text, tokens, lemmas: null, posTags: null, semanticTags, mweIndexes });
}

export { validateBracketLine, getBracketMweIndexes } from "./bracket.js";
export type { BracketLine } from "./bracket.js";
export { validateSuffixLine } from "./suffix.js";
export type { SuffixLine } from "./suffix.js";
