/**
 * USAS tag parser.
 *
 * A tag atom is lexed with the TagLexer and then read in three passes over
 * the token stream: the leading code, the intensity runs, and the
 * single-character markers.
 */
import type { IToken, TokenType } from "chevrotain";
import {
  AntecedentMarker,
  FemaleMarker,
  MaleMarker,
  NegativeRun,
  NeuterMarker,
  PositiveRun,
  PunctCode,
  RarityMarker1,
  RarityMarker2,
  TagCode,
  TagLexer,
} from "./lexer.js";
import type { UsasTag, UsasTagGroup } from "../types.js";

function has(tokens: IToken[], type: TokenType): boolean {
  return tokens.some((t) => t.tokenType === type);
}

/**
 * Length of the first `-` run once every `+` run is gone. Runs that were
 * only separated by `+` characters join up, so their lengths add.
 */
function firstNegativeRun(tokens: IToken[]): number {
  const start = tokens.findIndex((t) => t.tokenType === NegativeRun);
  if (start === -1) return 0;
  let count = 0;
  for (let i = start; i < tokens.length && tokens[i].tokenType === NegativeRun; i++) {
    count += tokens[i].image.length;
  }
  return count;
}

/**
 * Parse a single USAS tag atom, e.g. `X5.2+`. The atom must not contain a
 * `/` or whitespace; use `parseUsasTagGroups` for those.
 *
 * The code (`[A-Z]\d+(\.\d+)*` or `PUNCT`) must open the atom. Marker
 * characters may appear anywhere after it in any order, and characters
 * that are not markers are ignored.
 */
export function parseUsasTag(text: string): UsasTag {
  const lexResult = TagLexer.tokenize(text);
  if (lexResult.errors.length > 0) {
    throw new Error(`Unexpected character in USAS tag text: ${text}`);
  }

  const [head, ...rest] = lexResult.tokens;
  if (!head || (head.tokenType !== TagCode && head.tokenType !== PunctCode)) {
    throw new Error(`Cannot find the tag for this USAS tag text: ${text}`);
  }

  const positiveRun = rest.find((t) => t.tokenType === PositiveRun);
  const withoutPositive = rest.filter((t) => t.tokenType !== PositiveRun);
  const markers = withoutPositive.filter((t) => t.tokenType !== NegativeRun);

  return {
    code: head.image,
    positiveMarkers: positiveRun ? positiveRun.image.length : 0,
    negativeMarkers: firstNegativeRun(withoutPositive),
    rarity1: has(markers, RarityMarker1),
    rarity2: has(markers, RarityMarker2),
    male: has(markers, MaleMarker),
    female: has(markers, FemaleMarker),
    antecedents: has(markers, AntecedentMarker),
    neuter: has(markers, NeuterMarker),
    idiom: false,
  };
}

/**
 * Parse whitespace separated USAS tags into tag groups, as produced by the
 * USAS tagger for one token, e.g.
 * `L1 E3- O4.2- X5.2+ Z2/S2mf G1.2/S2mf`.
 *
 * Each whitespace separated atom becomes one group; `/` inside an atom
 * separates the tags of that group. Empty or whitespace-only text yields no
 * groups.
 */
export function parseUsasTagGroups(text: string): UsasTagGroup[] {
  const groups: UsasTagGroup[] = [];
  for (const atom of text.match(/\S+/g) ?? []) {
    const tags = atom.split("/").map((part) => {
      try {
        return parseUsasTag(part);
      } catch (err) {
        throw new Error(
          `Cannot parse USAS tag "${part}" in tag group "${atom}"`,
          { cause: err },
        );
      }
    });
    groups.push({ tags });
  }
  return groups;
}

/** `/`-joined codes of a tag group, e.g. `F2/O4.5` */
export function joinTagCodes(group: UsasTagGroup): string {
  return group.tags.map((t) => t.code).join("/");
}

/** True when the whole text parses as USAS tag groups. */
export function isUsasTagText(text: string): boolean {
  try {
    parseUsasTagGroups(text);
    return true;
  } catch {
    return false;
  }
}
