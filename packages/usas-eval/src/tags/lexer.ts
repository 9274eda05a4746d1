/**
 * Chevrotain Lexer for a single USAS tag atom, e.g. `S2mf`, `X5.2++`, `A1%`.
 *
 * The token set ends with a catch-all `Stray` token so tokenizing never
 * fails: unknown characters after the code are kept in the stream and
 * ignored by the parser.
 */
import { createToken, Lexer } from "chevrotain";

// ── Codes ──────────────────────────────────────────────────────────────────

export const TagCode = createToken({
  name: "TagCode",
  pattern: /[A-Z]\d+(?:\.\d+)*/,
});

export const PunctCode = createToken({ name: "PunctCode", pattern: /PUNCT/ });

// ── Intensity runs ─────────────────────────────────────────────────────────

export const PositiveRun = createToken({ name: "PositiveRun", pattern: /\++/ });
export const NegativeRun = createToken({ name: "NegativeRun", pattern: /-+/ });

// ── Single-character markers ───────────────────────────────────────────────

export const MaleMarker       = createToken({ name: "MaleMarker",       pattern: /m/ });
export const FemaleMarker     = createToken({ name: "FemaleMarker",     pattern: /f/ });
export const RarityMarker1    = createToken({ name: "RarityMarker1",    pattern: /%/ });
export const RarityMarker2    = createToken({ name: "RarityMarker2",    pattern: /@/ });
export const AntecedentMarker = createToken({ name: "AntecedentMarker", pattern: /c/ });
export const NeuterMarker     = createToken({ name: "NeuterMarker",     pattern: /n/ });

// Any single character not taken by the tokens above
export const Stray = createToken({
  name: "Stray",
  pattern: /[^+\-mf%@cn]/,
  line_breaks: true,
});

// ── Token ordering ─────────────────────────────────────────────────────────

export const allTokens = [
  TagCode,
  PunctCode,
  PositiveRun,
  NegativeRun,
  MaleMarker,
  FemaleMarker,
  RarityMarker1,
  RarityMarker2,
  AntecedentMarker,
  NeuterMarker,
  // Must stay last: matches any single character
  Stray,
];

export const TagLexer = new Lexer(allTokens, {
  positionTracking: "onlyOffset",
});
