import { z } from "zod";
import { VARIABLE_NAME, validateVariables } from "./variables.js";

export const variableSchema = z.object({
  name: z.string().regex(VARIABLE_NAME, "must be an identifier ([A-Za-z_][A-Za-z0-9_]*)"),
  type: z.enum(["text", "textarea", "select", "number"]).default("text"),
  defaultValue: z.string().nullish().transform((v) => v ?? ""),
  options: z.array(z.string()).nullish().transform((v) => v ?? []),
});

const title = z.string().trim().min(3, "Title must be 3-200 characters").max(200, "Title must be 3-200 characters");
const content = z
  .string()
  .max(10000, "Content must be 10-10000 characters")
  .refine((c) => c.trim().length >= 10, "Content must be 10-10000 characters");
const category = z.string().trim().min(1, "Category must be 1-50 characters").max(50, "Category must be 1-50 characters");
const tag = z.string().trim().min(1, "Tag must be 1-30 characters").max(30, "Tag must be 1-30 characters");

/**
 * Variable definitions a form can be built from. Malformed names are already
 * reported by `variableSchema`, so only the remaining problems are added here.
 */
const variables = z.array(variableSchema).superRefine((defined, ctx) => {
  for (const issue of validateVariables(defined)) {
    if (!VARIABLE_NAME.test(issue.name)) continue;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue.message });
  }
});

export const promptInputSchema = z.object({
  title,
  content,
  category,
  tags: z.array(tag).optional(),
  variables: variables.optional(),
  isFavorite: z.boolean().optional(),
});

export const promptChangesSchema = z.object({
  title: title.optional(),
  content: content.optional(),
  category: category.optional(),
  tags: z.array(tag).optional(),
  variables: variables.optional(),
  isFavorite: z.boolean().optional(),
});

const SNAKE_CASE_KEYS = new Map([
  ["is_favorite", "isFavorite"],
  ["use_count", "useCount"],
  ["created_at", "createdAt"],
  ["updated_at", "updatedAt"],
  ["default_value", "defaultValue"],
]);

/**
 * Renames the snake_case keys older export files use. A camelCase key wins
 * when both spellings are present.
 */
function camelCaseKeys(value: unknown): unknown {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return value;
  const renamed: Array<[string, unknown]> = [];
  for (const [key, field] of Object.entries(value)) {
    const alias = SNAKE_CASE_KEYS.get(key);
    if (alias === undefined) {
      renamed.push([key, field]);
    } else if (!Object.hasOwn(value, alias)) {
      renamed.push([alias, field]);
    }
  }
  return Object.fromEntries(renamed);
}

/**
 * Shape of one exported prompt. Imports take whatever an earlier export
 * wrote, so the create-form length limits do not apply; missing counters and
 * timestamps are tolerated so hand-written files import too.
 */
export const exportedPromptSchema = z.preprocess(
  camelCaseKeys,
  z.object({
    title: z.string(),
    content: z.string(),
    category: z.string(),
    tags: z.array(z.string()).optional(),
    variables: z.array(z.preprocess(camelCaseKeys, variableSchema)).optional(),
    isFavorite: z.boolean().optional(),
    useCount: z.number().int().nonnegative().optional(),
    createdAt: z.string().optional(),
    updatedAt: z.string().optional(),
  })
);

export const valuesSchema = z.record(z.string(), z.union([z.string(), z.number()]).transform(String));

export function formatIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

/**
 * Flattens zod issues into one readable line.
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues.map(formatIssue).join("; ");
}
