import { z } from "zod";
import { ValidationError } from "./errors.js";

export const AddOptionSchema = z.object({
  body: z.string(),
  correct: z.boolean(),
});

export const AddQuestionSchema = z.object({
  body: z.string(),
  options: z.array(AddOptionSchema),
});

const Id = z.number().int().positive();

export const QuestionSchema = z.object({
  id: Id,
  body: z.string(),
  options: z.array(AddOptionSchema.extend({ id: Id.optional() })),
});

/** Accept either an array of questions or `{ questions: [...] }`. */
export const SeedFileSchema = z.union([
  z.array(AddQuestionSchema),
  z
    .object({ questions: z.array(AddQuestionSchema) })
    .transform((f) => f.questions),
]);

/** Parse `input`, turning schema failures into a `ValidationError`. */
export function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  what: string
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (i) => `${i.path.join(".") || "(root)"}: ${i.message}`
    );
    throw new ValidationError(`Invalid ${what}`, issues);
  }
  return result.data;
}

/** Ids arrive as path segments; only plain positive decimals pass. */
export function parseId(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new ValidationError(`Invalid id "${raw}"`);
  }
  const id = Number(raw);
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new ValidationError(`Invalid id "${raw}"`);
  }
  return id;
}
