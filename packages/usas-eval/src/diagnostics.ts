import type { EvaluationTexts } from "./dataset.js";
import { parseFormattedLine, type LineFormat } from "./formats/index.js";
import type { LabelOptions } from "./labels.js";

export type CorpusDiagnostic = {
  message: string;
  severity: "error" | "warning";
  range: {
    start: { line: number; character: number };
    end:   { line: number; character: number };
  };
};

export type CorpusParseResult = {
  texts: EvaluationTexts[];
  diagnostics: CorpusDiagnostic[];
  /** 1-based line of each text */
  startLines: Map<EvaluationTexts, number>;
};

/**
 * Check every line of a corpus and return both the parsed texts and one
 * diagnostic per malformed line. Unlike the corpus parsers this never
 * throws, so all problems in a file can be reported at once (editors, CI).
 * Blank lines are skipped; line numbers in ranges are zero-based.
 */
export function parseCorpusDiagnostics(
  corpus: string,
  format: LineFormat,
  options?: LabelOptions,
): CorpusParseResult {
  const texts: EvaluationTexts[] = [];
  const diagnostics: CorpusDiagnostic[] = [];
  const startLines = new Map<EvaluationTexts, number>();

  corpus.split("\n").forEach((rawLine, lineIndex) => {
    const line = rawLine.trim();
    if (!line) return;
    try {
      const text = parseFormattedLine(line, format, options);
      texts.push(text);
      startLines.set(text, lineIndex + 1);
    } catch (err) {
      diagnostics.push({
        message: err instanceof Error ? err.message : String(err),
        severity: "error",
        range: {
          start: { line: lineIndex, character: 0 },
          end:   { line: lineIndex, character: rawLine.length },
        },
      });
    }
  });

  return { texts, diagnostics, startLines };
}
