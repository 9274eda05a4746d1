import { readFileSync } from "node:fs";
import type { LabelOptions } from "../labels.js";
import { defaultLogger, type Logger } from "../logger.js";
import type { EvaluationDataset } from "../dataset.js";

/** Where a raw label was read from, handed to a `LabelCorrector` */
export type LabelSite = {
  /** Zero-based line index, or the CSV row number (header = 1) for ToRCH */
  line: number;
  /** Index of the token within its line or sentence */
  tokenIndex: number;
  token: string;
  label: string;
};

/**
 * Fix a known annotation error. Return the replacement label (validated
 * like any other), the unchanged label, or `null` to drop the label
 * without validating it (the token gets `""`).
 */
export type LabelCorrector = (site: LabelSite) => string | null;

export type ParseOptions = LabelOptions & {
  /**
   * Structured logger for parse progress.
   * Defaults to silent no-ops so there is zero output unless you opt in.
   */
  logger?: Logger;
  /** Per-token label corrections (CorCenCC and ToRCH only) */
  correctLabel?: LabelCorrector;
};

export type CorpusParser = (datasetPath: string, options?: ParseOptions) => EvaluationDataset;

export function startParse(datasetName: string, datasetPath: string, options: ParseOptions): Logger {
  const logger = options.logger ?? defaultLogger;
  logger.info("[usas-eval] parsing the %s dataset found at: %s", datasetName, datasetPath);
  logger.info("[usas-eval] using label validation: %s", options.labelValidation !== undefined);
  logger.info("[usas-eval] using label filtering: %s", options.labelFilter !== undefined);
  return logger;
}

/** Read a text corpus as raw, untrimmed lines. */
export function readCorpusLines(datasetPath: string): string[] {
  return readFileSync(datasetPath, "utf-8").split("\n");
}

/** Run `fn`, prefixing any error with the 1-based line number. */
export function atLine<T>(lineNumber: number, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Line ${lineNumber}: ${message}`, { cause: err });
  }
}
