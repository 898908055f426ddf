import { z } from "zod";
import { ConfigurationError } from "./errors";

type ZodSchemaShape = z.ZodRawShape;

export function buildDynamic<T extends ZodSchemaShape>(
  schema: z.ZodObject<T>,
  env: NodeJS.ProcessEnv = process.env,
) {
  const shape: ZodSchemaShape = schema.shape;
  const envVarsToParse: Record<string, unknown> = {};
  for (const key of Object.keys(shape)) {
    envVarsToParse[key] = coerceValue(shape[key], env[key]);
  }
  return envVarsToParse;
}

function coerceValue(field: z.ZodTypeAny, value: string | undefined) {
  if (value === undefined || value === "") return undefined;

  let fieldSchema = field;

  // Unwrap ZodDefault and ZodOptional to get the underlying type
  while (
    fieldSchema instanceof z.ZodDefault ||
    fieldSchema instanceof z.ZodOptional
  ) {
    fieldSchema =
      fieldSchema instanceof z.ZodDefault
        ? fieldSchema.removeDefault()
        : fieldSchema.unwrap();
  }

  if (fieldSchema instanceof z.ZodNumber) {
    return Number(value);
  } else if (fieldSchema instanceof z.ZodBoolean) {
    return value.toLowerCase() === "true" || value === "1";
  }

  return value;
}

/**
 * Validates the environment on first call and memoizes the result.
 * Later calls return the same object without re-reading the environment.
 */
export function lazilyValidate<S extends z.ZodTypeAny>(
  schema: S,
  readEnvironment: () => Record<string, unknown>,
): () => z.infer<S> {
  let _variables: z.infer<S> | null = null;

  return function validateEnvironment() {
    if (_variables) return _variables;

    const parsed = schema.safeParse(readEnvironment());

    if (!parsed.success) {
      throw new ConfigurationError(
        `Missing or invalid environment variables: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".")} (${issue.message})`)
          .join(", ")}`,
        { cause: parsed.error },
      );
    }

    _variables = parsed.data;
    return _variables;
  };
}

const environmentShape = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),
  BIGRAM_SEGMENT_SIZE: z.number().int().positive().default(4096),
  BIGRAM_PAUSE_WRITER_THRESHOLD: z.number().int().positive().default(65536),
  BIGRAM_RESUME_WRITER_THRESHOLD: z.number().int().positive().default(32768),
  BIGRAM_STREAM_TIMEOUT_MS: z.number().int().nonnegative().default(0),
  BIGRAM_MONITOR: z.boolean().default(false),
});

export const environmentSchema = environmentShape.refine(
  (env) =>
    env.BIGRAM_RESUME_WRITER_THRESHOLD <= env.BIGRAM_PAUSE_WRITER_THRESHOLD,
  {
    message:
      "BIGRAM_RESUME_WRITER_THRESHOLD must not exceed BIGRAM_PAUSE_WRITER_THRESHOLD",
    path: ["BIGRAM_RESUME_WRITER_THRESHOLD"],
  },
);

export type Environment = z.infer<typeof environmentSchema>;

export const environment = lazilyValidate(environmentSchema, () =>
  buildDynamic(environmentShape),
);
