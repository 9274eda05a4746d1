import { readFileSync } from "node:fs";
import { parse as parseCsv } from "csv-parse/sync";
import { z } from "zod";
import { createEvaluationDataset, createEvaluationTexts, type EvaluationDataset, type EvaluationTexts } from "../dataset.js";
import { assertTokenIsNotTag, resolveLabelGroup } from "../labels.js";
import { PUNCT } from "../types.js";
import { atLine, startParse, type ParseOptions } from "./common.js";

const REQUIRED_COLUMNS = ["Token", "Corrected-USAS", "sentence-break"] as const;

const RowsSchema = z.array(z.record(z.string()));

const SENTENCE_BREAK = new Map([["true", true], ["false", false]]);

/**
 * Split a label cell into labels. Cells use a full-width `；`, a comma, or
 * whitespace between alternatives, in that order of preference.
 */
export function splitTorchLabels(cell: string): string[] {
  let labels: string[];
  if (cell.includes("；")) labels = cell.split("；");
  else if (cell.includes(",")) labels = cell.split(",");
  else labels = cell.split(/\s+/);
  return labels.map((label) => label.trim()).filter(Boolean);
}

function readRows(datasetPath: string): Record<string, string>[] {
  const records: unknown = parseCsv(readFileSync(datasetPath, "utf-8"), {
    bom: true,
    skip_empty_lines: true,
    columns: (header: string[]) => {
      const missing = REQUIRED_COLUMNS.filter((column) => !header.includes(column));
      if (missing.length > 0) {
        throw new Error(
          `Expected at least the following columns: ${REQUIRED_COLUMNS.join(", ")} but got: ${header.join(", ")}`,
        );
      }
      return header;
    },
  });
  return RowsSchema.parse(records);
}

/**
 * ToRCH (Chinese), a CSV with at least the columns `Token`,
 * `Corrected-USAS` and `sentence-break`. A `true` sentence break closes the
 * current sentence. Only the first corrected label of a token is kept, and
 * an empty corrected label whose `Predicted-USAS` is `PUNCT` becomes
 * `PUNCT`. The corpus has no MWEs; sentence text is the tokens joined by a
 * single space.
 */
export function parseTorch(datasetPath: string, options: ParseOptions = {}): EvaluationDataset {
  const name = "Torch";
  const logger = startParse(name, datasetPath, options);

  const texts: EvaluationTexts[] = [];
  let tokens: string[] = [];
  let semanticTags: string[] = [];

  const closeSentence = () => {
    texts.push(createEvaluationTexts({
      text: tokens.join(" "),
      tokens,
      lemmas: null,
      posTags: null,
      semanticTags,
      mweIndexes: tokens.map(() => new Set<number>()),
    }));
    tokens = [];
    semanticTags = [];
  };

  readRows(datasetPath).forEach((row, i) => {
    // Row numbers match the file, with the header on row 1
    const rowNumber = i + 2;
    const rowText = JSON.stringify(row);
    atLine(rowNumber, () => {
      const token = row["Token"].trim();
      let label = row["Corrected-USAS"].trim();
      if (label === "" && row["Predicted-USAS"]?.trim() === PUNCT) {
        label = PUNCT;
      }

      const corrected = options.correctLabel
        ? options.correctLabel({ line: rowNumber, tokenIndex: tokens.length, token, label })
        : label;

      let semanticTag = "";
      if (corrected !== null) {
        const [first] = splitTorchLabels(corrected);
        if (first === undefined) {
          throw new Error(`Expected at least one label in ${rowText}`);
        }
        semanticTag = resolveLabelGroup(first, options);
      }
      assertTokenIsNotTag(token, rowText);

      const breakValue = row["sentence-break"].trim().toLowerCase();
      const isSentenceBreak = SENTENCE_BREAK.get(breakValue);
      if (isSentenceBreak === undefined) {
        throw new Error(`Expected sentence-break to be true or false but got: ${breakValue}`);
      }

      tokens.push(token);
      semanticTags.push(semanticTag);
      if (isSentenceBreak) closeSentence();
    });
  });
  if (tokens.length > 0) closeSentence();

  logger.info("[usas-eval] finished parsing the %s dataset", name);
  return createEvaluationDataset({
    name,
    textLevel: "sentence",
    labelsRemoved: options.labelFilter ?? null,
    texts,
  });
}
