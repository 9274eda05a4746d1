import { createEvaluationDataset, createEvaluationTexts, type EvaluationDataset, type EvaluationTexts } from "../dataset.js";
import { assertTokenIsNotTag, resolveLabelGroup } from "../labels.js";
import { atLine, readCorpusLines, startParse, type ParseOptions } from "./common.js";

const COLUMN_COUNT = 7;

/** Welsh broadcaster name that also reads as a USAS code */
const TAG_SHAPED_TOKENS = new Set(["S4C"]);

/**
 * CorCenCC (Welsh). One sentence per line; every token is
 *
 *   {token}|{lemma}|{core POS}|{basic POS}|{enriched POS}|{predicted basic POS}|{USAS tag}
 *
 * e.g. `A|a|pron|Rha|Rhaperth|Rha|Z5`. Only the token and the USAS tag are
 * read. The corpus has no MWEs, and the text of a sentence is its tokens
 * joined by a single space.
 */
export function parseCorcencc(datasetPath: string, options: ParseOptions = {}): EvaluationDataset {
  const name = "Corcencc";
  const logger = startParse(name, datasetPath, options);

  const texts: EvaluationTexts[] = [];
  readCorpusLines(datasetPath).forEach((rawLine, lineIndex) => {
    const line = rawLine.trim();
    if (!line) return;
    logger.debug("[usas-eval] line index: %d", lineIndex);

    texts.push(atLine(lineIndex + 1, () => {
      const tokens: string[] = [];
      const semanticTags: string[] = [];

      line.split(/\s+/).forEach((entry, tokenIndex) => {
        const columns = entry.split("|");
        if (columns.length !== COLUMN_COUNT) {
          throw new Error(
            `CorCenCC data is not in the expected format, expected ${COLUMN_COUNT} columns but found ${columns.length} columns: ${line}`,
          );
        }
        const token = columns[0].trim();
        const rawLabel = columns[COLUMN_COUNT - 1].trim();
        const label = options.correctLabel
          ? options.correctLabel({ line: lineIndex, tokenIndex, token, label: rawLabel })
          : rawLabel;

        semanticTags.push(label === null ? "" : resolveLabelGroup(label, options));
        if (!TAG_SHAPED_TOKENS.has(token)) assertTokenIsNotTag(token, line);
        tokens.push(token);
      });

      return createEvaluationTexts({
        text: tokens.join(" "),
        tokens,
        lemmas: null,
        posTags: null,
        semanticTags,
        mweIndexes: tokens.map(() => new Set<number>()),
      });
    }));
  });

  logger.info("[usas-eval] finished parsing the %s dataset", name);
  return createEvaluationDataset({
    name,
    textLevel: "sentence",
    labelsRemoved: options.labelFilter ?? null,
    texts,
  });
}
