import { z } from "zod";
import type { MweIndexSet } from "./types.js";

export const TextLevelSchema = z.enum(["sentence", "paragraph", "document"]);
export type TextLevel = z.infer<typeof TextLevelSchema>;
export const TEXT_LEVELS = TextLevelSchema.options;

const MweIndexSetSchema = z.custom<MweIndexSet>(
  (value) => value instanceof Set && [...value].every((id) => Number.isInteger(id)),
  { message: "MWE indexes must be sets of integers" },
);

const PARALLEL_ATTRIBUTES = [
  ["lemmas", "lemmas"],
  ["posTags", "POS tags"],
  ["semanticTags", "semantic tags"],
  ["mweIndexes", "MWE indexes"],
] as const;

export const EvaluationTextsSchema = z
  .object({
    text: z.string(),
    tokens: z.array(z.string()),
    lemmas: z.array(z.string()).nullable(),
    posTags: z.array(z.string()).nullable(),
    semanticTags: z.array(z.string()).nullable(),
    mweIndexes: z.array(MweIndexSetSchema).nullable(),
  })
  .superRefine((value, ctx) => {
    const numberTokens = value.tokens.length;
    for (const [key, label] of PARALLEL_ATTRIBUTES) {
      const list = value[key];
      if (list !== null && list.length !== numberTokens) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `The number of tokens: ${numberTokens} and ${label} must be the same: ${list.length}`,
        });
      }
    }
  });

/**
 * A text unit (sentence, paragraph or document) with its tokens and
 * optional per-token annotations. Every non-null list has one entry per
 * token. An empty MWE set means the token is not part of an MWE; tokens
 * sharing an id form one MWE.
 */
export type EvaluationTexts = {
  readonly text: string;
  readonly tokens: readonly string[];
  readonly lemmas: readonly string[] | null;
  readonly posTags: readonly string[] | null;
  readonly semanticTags: readonly string[] | null;
  readonly mweIndexes: readonly MweIndexSet[] | null;
};

export const EvaluationDatasetSchema = z.object({
  name: z.string().min(1),
  textLevel: TextLevelSchema,
  labelsRemoved: z.custom<ReadonlySet<string>>((value) => value instanceof Set).nullable().default(null),
  texts: z.array(EvaluationTextsSchema),
});

/**
 * A gold or predicted dataset ready for evaluation. `labelsRemoved` holds
 * the label filter that was applied while parsing, if any.
 */
export type EvaluationDataset = {
  readonly name: string;
  readonly textLevel: TextLevel;
  readonly labelsRemoved: ReadonlySet<string> | null;
  readonly texts: readonly EvaluationTexts[];
};

export type EvaluationDatasetInput = Omit<EvaluationDataset, "labelsRemoved"> & {
  labelsRemoved?: ReadonlySet<string> | null;
};

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/** Validate and freeze a text unit. Throws when list lengths disagree. */
export function createEvaluationTexts(input: EvaluationTexts): EvaluationTexts {
  const parsed = EvaluationTextsSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`Invalid evaluation text: ${formatIssues(parsed.error)}`);
  }
  return Object.freeze(parsed.data);
}

export function createEvaluationDataset(input: EvaluationDatasetInput): EvaluationDataset {
  const parsed = EvaluationDatasetSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`Invalid evaluation dataset: ${formatIssues(parsed.error)}`);
  }
  return Object.freeze({
    ...parsed.data,
    texts: parsed.data.texts.map((text) => Object.freeze(text)),
  });
}
