import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { applyLabelOptions, assertTokenIsNotTag, resolveLabelGroup } from "../src/labels.js";

describe("applyLabelOptions", () => {
  test("no options returns the tags unchanged", () => {
    assert.deepStrictEqual(applyLabelOptions(["A1", "F2/O2", "PUNCT"]), ["A1", "F2/O2", "PUNCT"]);
  });

  test("filter matches the whole joined tag", () => {
    const labelFilter = new Set(["F2/O2", "Z99"]);
    assert.deepStrictEqual(
      applyLabelOptions(["F2/O2", "F2", "Z99", "A1"], { labelFilter }),
      ["", "F2", "", "A1"],
    );
  });

  test("does not modify its input", () => {
    const tags = ["Z99"];
    applyLabelOptions(tags, { labelFilter: new Set(["Z99"]) });
    assert.deepStrictEqual(tags, ["Z99"]);
  });

  test("every sub-tag must be in the validation set", () => {
    const labelValidation = new Set(["F2", "A1"]);
    assert.deepStrictEqual(applyLabelOptions(["F2", "A1/F2"], { labelValidation }), ["F2", "A1/F2"]);
    assert.throws(() => applyLabelOptions(["F2/O2"], { labelValidation }), {
      message: "Semantic tag is not in the label validation set: O2",
    });
  });

  test("PUNCT and filtered tags are not validated", () => {
    const options = { labelValidation: new Set(["A1"]), labelFilter: new Set(["Z99"]) };
    assert.deepStrictEqual(applyLabelOptions(["PUNCT", "Z99", "A1"], options), ["PUNCT", "", "A1"]);
  });
});

describe("resolveLabelGroup", () => {
  test("joins the codes of one group", () => {
    assert.equal(resolveLabelGroup("Z2/S2mf"), "Z2/S2");
    assert.equal(resolveLabelGroup(" A5.1+ "), "A5.1");
  });

  test("requires exactly one group", () => {
    assert.throws(() => resolveLabelGroup("A1 Z5"), {
      message: 'Expected only one label group in "A1 Z5" but found 2',
    });
    assert.throws(() => resolveLabelGroup(""), {
      message: 'Expected only one label group in "" but found 0',
    });
  });

  test("validates codes before filtering", () => {
    const options = { labelValidation: new Set(["A1"]), labelFilter: new Set(["Z99"]) };
    assert.throws(() => resolveLabelGroup("Z99", options), {
      message: "Label Z99 is not in the label validation set",
    });
    assert.equal(resolveLabelGroup("PUNCT", options), "PUNCT");
  });

  test("filtered label becomes empty", () => {
    assert.equal(resolveLabelGroup("F2/O2", { labelFilter: new Set(["F2/O2"]) }), "");
  });
});

describe("assertTokenIsNotTag", () => {
  test("accepts ordinary words", () => {
    assert.doesNotThrow(() => assertTokenIsNotTag("hello", "hello_Z4"));
  });

  test("rejects empty tokens", () => {
    assert.throws(() => assertTokenIsNotTag("", "_Z4"), {
      message: "Expected token not to be empty: `_Z4`",
    });
  });

  test("rejects tokens that read as a tag", () => {
    assert.throws(() => assertTokenIsNotTag("Z4", "Z4_Z4"), {
      message: "Expected token not to be a USAS tag: Z4 in `Z4_Z4`",
    });
  });
});
