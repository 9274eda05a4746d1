/**
 * Suffix-marker line format (Benedict Finnish).
 *
 * Units are `<token>`, `<token>_<tags>` or `<token>_<tags>_i`. A run of
 * adjacent `_i` units forms one MWE, so discontinuous MWEs cannot be
 * written in this format:
 *
 *   Vac_F2/O2_i pot_F2/O2_i is_A3+ good_A13.3_i day_A13.3_i
 *   → MWE ids 1 1 - 2 2
 */
import { applyLabelOptions, type LabelOptions } from "../labels.js";
import { joinTagCodes, parseUsasTagGroups } from "../tags/index.js";
import { PUNCT, type MweIndexSet } from "../types.js";

/** Bare units allowed without a tag */
const PUNCT_TOKENS = new Set(["-", ".", ",", "!", ":", "(", ")", '"', "?"]);

const MWE_FLAG = "i";

export type SuffixLine = {
  text: string;
  tokens: string[];
  semanticTags: string[];
  mweIndexes: MweIndexSet[];
};

/**
 * Validate a suffix-marker line, extracting tokens, semantic tags and MWE
 * membership in one pass. The line is trimmed first.
 */
export function validateSuffixLine(rawText: string, options?: LabelOptions): SuffixLine {
  const text = rawText.trim();
  if (!text) {
    throw new Error(`The text string is empty: "${rawText}"`);
  }

  const tokens: string[] = [];
  const semanticTags: string[] = [];
  const mweIndexes: MweIndexSet[] = [];
  let mweCounter = 0;
  let inMwe = false;

  for (const unit of text.split(/\s+/)) {
    const segments = unit.split("_");
    const [token] = segments;
    let tagSpec: string | undefined;

    switch (segments.length) {
      case 1:
        if (!PUNCT_TOKENS.has(token)) {
          throw new Error(`Invalid text string: "${text}" contains a bare token ${token} that is not punctuation`);
        }
        inMwe = false;
        break;
      case 2:
        tagSpec = segments[1];
        inMwe = false;
        break;
      case 3:
        if (segments[2] !== MWE_FLAG) {
          throw new Error(
            `Invalid text string: "${text}", expected MWE index token \`${MWE_FLAG}\` but got ${segments[2]} for the token ${token}`,
          );
        }
        tagSpec = segments[1];
        if (!inMwe) mweCounter++;
        inMwe = true;
        break;
      default:
        throw new Error(`Invalid text string: "${text}", the token ${unit} contains more than two underscores`);
    }

    if (!token.trim()) {
      throw new Error(`Invalid text string: "${text}", the token text is empty in ${unit}`);
    }

    if (tagSpec === undefined) {
      semanticTags.push(PUNCT);
    } else {
      if (!tagSpec) {
        throw new Error(`USAS tag is empty in token: ${unit} for text: ${text}`);
      }
      try {
        const [group] = parseUsasTagGroups(tagSpec);
        semanticTags.push(joinTagCodes(group));
      } catch (err) {
        throw new Error(`Invalid USAS tag "${tagSpec}" in token: ${unit} for text: ${text}`, { cause: err });
      }
    }

    tokens.push(token);
    mweIndexes.push(inMwe ? new Set([mweCounter]) : new Set<number>());
  }

  return {
    text,
    tokens,
    semanticTags: applyLabelOptions(semanticTags, options),
    mweIndexes,
  };
}
