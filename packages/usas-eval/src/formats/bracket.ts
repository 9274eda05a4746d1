/**
 * Bracket-marker line format (Benedict English).
 *
 * Each whitespace separated unit is `<token>_<tags><mwe>?`, where `<mwe>`
 * is `[i<id>.<total>.<position>`:
 *
 *   Turkish_F2/O4.5[i86.2.1 grind_F2/O4.5[i86.2.2 -_- extremely_A13.3
 *
 * MWE ids are only unique within a line and members of one MWE need not be
 * adjacent.
 */
import { applyLabelOptions, type LabelOptions } from "../labels.js";
import { joinTagCodes, parseUsasTagGroups } from "../tags/index.js";
import { PUNCT, type MweIndexSet } from "../types.js";

/** Tag payloads that stand for punctuation in this format */
const PUNCT_PAYLOADS = new Set(["PUNC", "-", ".", ",", "!"]);

const MWE_MARKER_START = "[i";
const MWE_MARKER = /\[i(\d+)\.(\d+)\.(\d+)/;
const MWE_MARKER_GLOBAL = new RegExp(MWE_MARKER.source, "g");

export type BracketLine = {
  text: string;
  tokens: string[];
  semanticTags: string[];
};

/** Split a unit on its single underscore into token text and the rest. */
function splitUnit(unit: string, text: string): [token: string, rest: string] {
  const parts = unit.split("_");
  if (parts.length === 1) {
    throw new Error(`Invalid token format in text: ${text}, expected a single underscore in token: ${unit}`);
  }
  if (parts.length !== 2) {
    throw new Error(`Invalid token format in text: ${text}, expected exactly one underscore in token: ${unit}`);
  }
  return [parts[0], parts[1]];
}

/**
 * Validate a bracket-marker line and extract its tokens and semantic tags.
 *
 * The tag payload is everything after the underscore up to the first `[i`.
 * Punctuation payloads (`PUNC`, `-`, `.`, `,`, `!`) become `PUNCT`; any
 * other payload must parse as a tag group and its codes are `/`-joined.
 * The MWE markers themselves are checked by `getBracketMweIndexes`.
 */
export function validateBracketLine(text: string, options?: LabelOptions): BracketLine {
  if (!text.trim()) {
    throw new Error(`Empty or whitespace-only text string: "${text}"`);
  }

  const tokens: string[] = [];
  const semanticTags: string[] = [];

  for (const unit of text.split(/\s+/).filter(Boolean)) {
    const [token, rest] = splitUnit(unit, text);
    if (!token) {
      throw new Error(`Token text is empty in token: ${unit} for text: ${text}`);
    }

    const mweStart = rest.indexOf(MWE_MARKER_START);
    if (mweStart === 0) {
      throw new Error(`Token has MWE but no USAS tag: ${unit} for text: ${text}`);
    }
    const payload = mweStart === -1 ? rest : rest.slice(0, mweStart);

    if (PUNCT_PAYLOADS.has(payload)) {
      semanticTags.push(PUNCT);
    } else {
      if (!payload) {
        throw new Error(`USAS tag is empty in token: ${unit} for text: ${text}`);
      }
      try {
        // Payloads hold no whitespace, so there is exactly one group
        const [group] = parseUsasTagGroups(payload);
        semanticTags.push(joinTagCodes(group));
      } catch (err) {
        throw new Error(`Invalid USAS tag "${payload}" in token: ${unit} for text: ${text}`, { cause: err });
      }
    }
    tokens.push(token);
  }

  return { text, tokens, semanticTags: applyLabelOptions(semanticTags, options) };
}

/**
 * Recover MWE membership for every unit of a bracket-marker line.
 *
 * Raw ids are sorted numerically and renumbered from 1, so `[i187…` and
 * `[i86…` on the same line become 2 and 1. Every id must have exactly as
 * many members as its declared total. A unit may carry at most one marker.
 *
 * @returns one set per unit; empty for units outside any MWE
 */
export function getBracketMweIndexes(text: string): MweIndexSet[] {
  if (!text.trim()) return [];

  const units = text.split(/\s+/).filter(Boolean);
  const mwes = new Map<number, { total: number; positions: number[] }>();
  const unitIds: (number | undefined)[] = [];

  units.forEach((unit, position) => {
    // Only the part after the underscore is searched: token text may
    // itself contain `[i`
    const [, rest] = splitUnit(unit, text);
    const match = rest.match(MWE_MARKER);
    if (!match) {
      if (rest.includes(MWE_MARKER_START) && !rest.endsWith("]")) {
        throw new Error(`Invalid MWE format in token: ${unit} for text: ${text}`);
      }
      unitIds.push(undefined);
      return;
    }

    if ((rest.match(MWE_MARKER_GLOBAL) ?? []).length > 1) {
      throw new Error(`Multiple MWE assignments not supported in token: ${unit} for text: ${text}`);
    }

    const id = Number(match[1]);
    const total = Number(match[2]);
    let mwe = mwes.get(id);
    if (!mwe) {
      mwe = { total, positions: [] };
      mwes.set(id, mwe);
    }
    mwe.positions.push(position);
    unitIds.push(id);
  });

  for (const [id, { total, positions }] of mwes) {
    if (positions.length !== total) {
      throw new Error(`MWE ${id} has ${positions.length} tokens but expected ${total} for text: ${text}`);
    }
  }

  const renumbered = new Map<number, number>();
  [...mwes.keys()].sort((a, b) => a - b).forEach((id, i) => renumbered.set(id, i + 1));

  return unitIds.map((id) => {
    const mweId = id === undefined ? undefined : renumbered.get(id);
    return mweId === undefined ? new Set<number>() : new Set([mweId]);
  });
}
