import { z } from "zod";
import { InvalidInputError } from "./errors";
import { DEFAULT_MAX_TITLE_LENGTH, DEFAULT_TITLE_RULES } from "./title";

/** Smallest title budget that still leaves room for an ellipsis and a few words. */
export const MIN_TITLE_LENGTH = 10;

export const processOptionsSchema = z.object({
  maxTitleLength: z
    .number()
    .int()
    .min(MIN_TITLE_LENGTH)
    .default(DEFAULT_MAX_TITLE_LENGTH),

  /** Number of spine entries the upstream generator emits before the first article (cover and index). */
  trimLeadingPages: z.number().int().min(0).default(2),

  /** Replacement stylesheet copied into the package directory as `stylesheet.css`. */
  stylesheetPath: z.string().min(1).optional(),

  titleRules: z
    .object({
      sources: z
        .array(z.string().min(1))
        .default(() => [...DEFAULT_TITLE_RULES.sources]),
      sectionMarkers: z
        .array(z.string().min(1))
        .default(() => [...DEFAULT_TITLE_RULES.sectionMarkers]),
    })
    .default({}),

  debug: z.boolean().default(false),

  provenance: z
    .object({
      workflowRunId: z.string().default("local"),
      gitSha: z.string().default("unknown"),
    })
    .default({}),
});

export type ProcessOptionsInput = z.input<typeof processOptionsSchema>;
export type ResolvedProcessOptions = z.output<typeof processOptionsSchema>;

export function resolveProcessOptions(
  options: ProcessOptionsInput,
): ResolvedProcessOptions {
  const result = processOptionsSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw new InvalidInputError(`invalid processing options: ${issues}`, {
      cause: result.error,
    });
  }
  return result.data;
}

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

const environmentSchema = z.object({
  EPUB_DEBUG: optionalText.transform((value) =>
    ["1", "true", "yes"].includes((value ?? "").toLowerCase()),
  ),
  WORKFLOW_RUN_ID: optionalText,
  GIT_SHA: optionalText,
  EPUB_MAX_TITLE_LENGTH: optionalText.pipe(
    z.coerce.number().int().min(MIN_TITLE_LENGTH).optional(),
  ),
  EPUB_STYLESHEET: optionalText,
});

/** Reads processing options from environment variables. Unset and empty variables are ignored. */
export function readEnvironment(
  env: Record<string, string | undefined> = process.env,
): ProcessOptionsInput {
  const result = environmentSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new InvalidInputError(`invalid environment: ${issues}`, {
      cause: result.error,
    });
  }

  const parsed = result.data;

  return {
    debug: parsed.EPUB_DEBUG,
    maxTitleLength: parsed.EPUB_MAX_TITLE_LENGTH,
    stylesheetPath: parsed.EPUB_STYLESHEET,
    provenance: {
      workflowRunId: parsed.WORKFLOW_RUN_ID,
      gitSha: parsed.GIT_SHA,
    },
  };
}
