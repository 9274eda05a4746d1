import { isUsasTagText, joinTagCodes, parseUsasTagGroups } from "./tags/index.js";
import { PUNCT } from "./types.js";

export type LabelOptions = {
  /** Allowed tag codes. Every `/`-separated sub-tag must be in the set;
   *  `PUNCT` and filtered (empty) labels are not checked. */
  labelValidation?: ReadonlySet<string>;
  /** Full tag strings to remove, e.g. `F2/O2`. A filtered label becomes
   *  `""`. `F2` in the filter does not remove `F2/O2`. */
  labelFilter?: ReadonlySet<string>;
};

/**
 * Apply the label filter, then validate what is left.
 * Returns a new array; the input is not modified.
 */
export function applyLabelOptions(semanticTags: readonly string[], options: LabelOptions = {}): string[] {
  const { labelFilter, labelValidation } = options;
  const filtered = semanticTags.map((tag) => (labelFilter?.has(tag) ? "" : tag));
  if (labelValidation) {
    for (const tag of filtered) {
      if (tag === PUNCT || tag === "") continue;
      for (const subTag of tag.split("/")) {
        if (!labelValidation.has(subTag)) {
          throw new Error(`Semantic tag is not in the label validation set: ${subTag}`);
        }
      }
    }
  }
  return filtered;
}

/**
 * Resolve one raw label (e.g. `Z2/S2mf`) into its `/`-joined codes.
 *
 * The label must hold exactly one tag group. Codes are validated before
 * the filter is applied, so a filtered label must still be valid.
 */
export function resolveLabelGroup(label: string, options: LabelOptions = {}): string {
  const { labelFilter, labelValidation } = options;
  const groups = parseUsasTagGroups(label);
  if (groups.length !== 1) {
    throw new Error(`Expected only one label group in "${label}" but found ${groups.length}`);
  }
  const [group] = groups;
  if (labelValidation) {
    for (const tag of group.tags) {
      if (tag.code !== PUNCT && !labelValidation.has(tag.code)) {
        throw new Error(`Label ${tag.code} is not in the label validation set`);
      }
    }
  }
  const joined = joinTagCodes(group);
  return labelFilter?.has(joined) ? "" : joined;
}

/** Token text that reads as a USAS tag points at a shifted column. */
export function assertTokenIsNotTag(token: string, line: string): void {
  if (!token) {
    throw new Error(`Expected token not to be empty: \`${line}\``);
  }
  if (isUsasTagText(token)) {
    throw new Error(`Expected token not to be a USAS tag: ${token} in \`${line}\``);
  }
}
