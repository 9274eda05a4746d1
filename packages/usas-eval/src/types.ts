/**
 * Structured form of a single USAS tag, e.g. `S2mf` or `X5.2++`.
 *
 * Marker characters:
 *   `+` / `-`  positive / negative intensity (counted)
 *   `%` / `@`  rarity markers 1 and 2
 *   `m` / `f`  male / female
 *   `c`        potential antecedent of a conceptual anaphor
 *   `n`        neuter
 */
export type UsasTag = {
  /** Taxonomy code such as `A1.1.1`, or the `PUNCT` sentinel */
  code: string;
  positiveMarkers: number;
  negativeMarkers: number;
  rarity1: boolean;
  rarity2: boolean;
  male: boolean;
  female: boolean;
  antecedents: boolean;
  neuter: boolean;
  /** Idioms are not detected yet */
  idiom: false;
};

/**
 * One or more tags assigned jointly to a single token (multi-tag
 * membership, written `F2/O2`). The first tag is the primary one.
 */
export type UsasTagGroup = {
  tags: UsasTag[];
};

/**
 * MWE membership of one token. Empty when the token is not part of a
 * multi word expression; otherwise holds the id shared by every token of
 * the same expression.
 */
export type MweIndexSet = ReadonlySet<number>;

/** Sentinel tag for punctuation tokens */
export const PUNCT = "PUNCT";
