/**
 * Parsers for the human-annotated Benedict corpora. One sentence per line;
 * blank lines are skipped. The text of each sentence is the original line,
 * markers included.
 */
import { createEvaluationDataset, type EvaluationDataset, type EvaluationTexts } from "../dataset.js";
import { parseFormattedLine, type LineFormat } from "../formats/index.js";
import { atLine, readCorpusLines, startParse, type ParseOptions } from "./common.js";

function parseLineCorpus(
  name: string,
  format: LineFormat,
  datasetPath: string,
  options: ParseOptions,
): EvaluationDataset {
  const logger = startParse(name, datasetPath, options);

  const texts: EvaluationTexts[] = [];
  readCorpusLines(datasetPath).forEach((rawLine, lineIndex) => {
    const line = rawLine.trim();
    if (!line) return;
    logger.debug("[usas-eval] line index: %d", lineIndex);
    const text = atLine(lineIndex + 1, () => parseFormattedLine(line, format, options));
    logger.debug("[usas-eval] number of tokens in line: %d", text.tokens.length);
    texts.push(text);
  });

  logger.info("[usas-eval] finished parsing the %s dataset", name);
  return createEvaluationDataset({
    name,
    textLevel: "sentence",
    labelsRemoved: options.labelFilter ?? null,
    texts,
  });
}

/**
 * Benedict English: `<token>_<tags>[i<id>.<total>.<position>`.
 *
 * The tag payloads `PUNC`, `-`, `.`, `,` and `!` become `PUNCT`.
 * Supports discontinuous MWEs.
 */
export function parseEnglishBenedict(datasetPath: string, options: ParseOptions = {}): EvaluationDataset {
  return parseLineCorpus("Benedict English", "bracket", datasetPath, options);
}

/**
 * Benedict Finnish: `<token>`, `<token>_<tags>` or `<token>_<tags>_i`.
 *
 * Bare punctuation tokens get `PUNCT`. Each run of adjacent `_i` tokens is
 * one MWE.
 */
export function parseFinnishBenedict(datasetPath: string, options: ParseOptions = {}): EvaluationDataset {
  return parseLineCorpus("Benedict Finnish", "suffix", datasetPath, options);
}
