import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { getBracketMweIndexes, validateBracketLine } from "../src/formats/index.js";

/** `mwe(1, 0)` → `[{1}, {}]`, 0 meaning "not in an MWE" */
function mwe(...ids: number[]): Set<number>[] {
  return ids.map((id) => (id === 0 ? new Set<number>() : new Set([id])));
}

// ── validateBracketLine ─────────────────────────────────────────────────────

describe("validateBracketLine", () => {
  test("tags only", () => {
    const text = "Vac_F2/O2 pot_F2/O2 is_A3+ by_A13.3 far_A13.3";
    assert.deepStrictEqual(validateBracketLine(text), {
      text,
      tokens: ["Vac", "pot", "is", "by", "far"],
      semanticTags: ["F2/O2", "F2/O2", "A3", "A13.3", "A13.3"],
    });
  });

  test("MWE markers are not part of the tag", () => {
    const text = "Vac_F2/O2[i136.3.1 pot_F2/O2[i136.3.2 is_A3+ by_A13.3[i136.3.3 far_A13.3";
    assert.deepStrictEqual(validateBracketLine(text), {
      text,
      tokens: ["Vac", "pot", "is", "by", "far"],
      semanticTags: ["F2/O2", "F2/O2", "A3", "A13.3", "A13.3"],
    });
  });

  test("punctuation payloads become PUNCT", () => {
    const text = "-_- ._. a_! ._PUNC another_,";
    assert.deepStrictEqual(validateBracketLine(text), {
      text,
      tokens: ["-", ".", "a", ".", "another"],
      semanticTags: ["PUNCT", "PUNCT", "PUNCT", "PUNCT", "PUNCT"],
    });
  });

  test("punctuation payload with an MWE marker", () => {
    const { tokens, semanticTags } = validateBracketLine(
      "Vac_F2/O2[i136.3.1 !_![i136.3.2 is_A3+ by_A13.3[i136.3.3 far_A13.3",
    );
    assert.deepStrictEqual(tokens, ["Vac", "!", "is", "by", "far"]);
    assert.deepStrictEqual(semanticTags, ["F2/O2", "PUNCT", "A3", "A13.3", "A13.3"]);
  });

  test("empty or whitespace-only line", () => {
    assert.throws(() => validateBracketLine(""), { message: 'Empty or whitespace-only text string: ""' });
    assert.throws(() => validateBracketLine(" "), { message: 'Empty or whitespace-only text string: " "' });
  });

  test("unit without an underscore", () => {
    assert.throws(() => validateBracketLine("Vac pot"), {
      message: "Invalid token format in text: Vac pot, expected a single underscore in token: Vac",
    });
  });

  test("unit with two underscores", () => {
    assert.throws(() => validateBracketLine("Vac_F2/O2_F2/O2 pot_F2/O2"), {
      message:
        "Invalid token format in text: Vac_F2/O2_F2/O2 pot_F2/O2, expected exactly one underscore in token: Vac_F2/O2_F2/O2",
    });
  });

  test("empty token text", () => {
    assert.throws(() => validateBracketLine("_F2/O2 pot_F2/O2"), {
      message: "Token text is empty in token: _F2/O2 for text: _F2/O2 pot_F2/O2",
    });
  });

  test("tag that does not parse", () => {
    assert.throws(() => validateBracketLine("Vac_ZX2"), {
      message: 'Invalid USAS tag "ZX2" in token: Vac_ZX2 for text: Vac_ZX2',
    });
  });

  test("no tag after the underscore", () => {
    assert.throws(() => validateBracketLine("Vac_ pot_"), {
      message: "USAS tag is empty in token: Vac_ for text: Vac_ pot_",
    });
  });

  test("MWE marker without a tag", () => {
    assert.throws(() => validateBracketLine("Vac_[i136.2.1 pot_[i136.2.2"), {
      message: "Token has MWE but no USAS tag: Vac_[i136.2.1 for text: Vac_[i136.2.1 pot_[i136.2.2",
    });
  });

  test("label filter then validation", () => {
    const { semanticTags } = validateBracketLine("Coffee_F2 of_Z5 ,_PUNC", {
      labelFilter: new Set(["F2"]),
      labelValidation: new Set(["Z5"]),
    });
    assert.deepStrictEqual(semanticTags, ["", "Z5", "PUNCT"]);
  });

  test("tag outside the validation set", () => {
    assert.throws(() => validateBracketLine("Coffee_F2/O4.5", { labelValidation: new Set(["F2"]) }), {
      message: "Semantic tag is not in the label validation set: O4.5",
    });
  });
});

// ── getBracketMweIndexes ────────────────────────────────────────────────────

describe("getBracketMweIndexes", () => {
  test("no MWEs", () => {
    assert.deepStrictEqual(getBracketMweIndexes("Coffee_F2"), mwe(0));
    assert.deepStrictEqual(getBracketMweIndexes("The_Z5 history_T1.1.1 of_Z5 coffee_F2"), mwe(0, 0, 0, 0));
  });

  test("empty line has no units", () => {
    assert.deepStrictEqual(getBracketMweIndexes(""), []);
  });

  test("one MWE", () => {
    assert.deepStrictEqual(
      getBracketMweIndexes("Turkish_F2/O4.5[i86.2.1 grind_F2/O4.5[i86.2.2 -_- extremely_A13.3"),
      mwe(1, 1, 0, 0),
    );
  });

  test("two MWEs", () => {
    assert.deepStrictEqual(
      getBracketMweIndexes("Vac_F2/O2[i136.2.1 pot_F2/O2[i136.2.2 is_A3+ by_A13.3[i137.2.1 far_A13.3[i137.2.2"),
      mwe(1, 1, 0, 2, 2),
    );
  });

  test("ids are renumbered in sorted order, not order of appearance", () => {
    assert.deepStrictEqual(
      getBracketMweIndexes("Vac_F2/O2[i187.2.1 pot_F2/O2[i187.2.2 is_A3+ by_A13.3[i86.2.1 far_A13.3[i86.2.2"),
      mwe(2, 2, 0, 1, 1),
    );
  });

  test("discontinuous MWE", () => {
    assert.deepStrictEqual(
      getBracketMweIndexes("Vac_F2/O2[i136.3.1 pot_F2/O2[i136.3.2 is_A3+ by_A13.3[i136.3.3 far_A13.3"),
      mwe(1, 1, 0, 1, 0),
    );
  });

  test("interleaved MWEs", () => {
    assert.deepStrictEqual(
      getBracketMweIndexes("a_Z5[i4.2.1 b_Z5[i9.2.1 c_Z5[i4.2.2 d_Z5[i9.2.2"),
      mwe(1, 2, 1, 2),
    );
  });

  test("[i inside token text is not a marker", () => {
    assert.deepStrictEqual(
      getBracketMweIndexes("Vac[i_F2/O2[i136.3.1 pot_F2/O2[i136.3.2 is[i_A3+ by_A13.3[i136.3.3 far_A13.3"),
      mwe(1, 1, 0, 1, 0),
    );
  });

  test("unit without an underscore", () => {
    assert.throws(() => getBracketMweIndexes("VacF2/O2[i136.1.1"), {
      message: "Invalid token format in text: VacF2/O2[i136.1.1, expected a single underscore in token: VacF2/O2[i136.1.1",
    });
  });

  test("member count does not match the declared total", () => {
    const text = "Vac_F2/O2[i136.2.1 pot_F2/O2[i136.2.2 is_A3+ by_A13.3[i137.2.3 far_A13.3";
    assert.throws(() => getBracketMweIndexes(text), {
      message: `MWE 137 has 1 tokens but expected 2 for text: ${text}`,
    });
  });

  test("too few members", () => {
    const text = "Vac_F2/O2[i136.2.1 pot_F2/O2 is_A3+";
    assert.throws(() => getBracketMweIndexes(text), {
      message: `MWE 136 has 1 tokens but expected 2 for text: ${text}`,
    });
  });

  test("more than one marker on a unit", () => {
    const text = "Vac_F2/O2[i136.2.1[i137.2.1 pot_F2/O2[i136.2.2 by_A13.3[i137.2.2";
    assert.throws(() => getBracketMweIndexes(text), {
      message: `Multiple MWE assignments not supported in token: Vac_F2/O2[i136.2.1[i137.2.1 for text: ${text}`,
    });
  });

  test("malformed marker numbers", () => {
    for (const marker of ["[iA1.2.1", "[i.2.1", "[i1.g.1", "[i1.2.g", "[i1.2"]) {
      const text = `Vac_F2/O2${marker} is_A3+`;
      assert.throws(() => getBracketMweIndexes(text), {
        message: `Invalid MWE format in token: Vac_F2/O2${marker} for text: ${text}`,
      });
    }
  });
});
