import { z } from "zod";
import { configError } from "../lib/errors.js";

// ============================================
// Environment configuration with validation
// Fails fast on startup if config is invalid
// ============================================

const envSchema = z.object({
  // Server
  PORT: z.string().default("3000").transform(Number),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // OpenAI
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
  COMPLETION_MODEL: z.string().min(1).default("gpt-4o-mini"),
  EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
  EMBEDDING_DIMENSIONS: z.string().default("1536").transform(Number),

  // Corpus
  CORPUS_FILE: z.string().min(1).default("data/corpus.json"),
  STANCE_LEXICON_FILE: z.string().optional(),

  // Retrieval + assembly knobs
  RETRIEVAL_K_INITIAL: z.string().default("40").transform(Number),
  RETRIEVAL_K_FINAL: z.string().default("12").transform(Number),
  RETRIEVAL_MIN_SIMILARITY: z.string().default("0.2").transform(Number),
  ENTITY_BOOST_WEIGHT: z.string().default("0.15").transform(Number),
  CONTEXT_TOKEN_BUDGET: z.string().default("3000").transform(Number),

  // Per-call deadline for embedding and completion requests
  UPSTREAM_TIMEOUT_MS: z.string().default("30000").transform(Number),
}).superRefine((value, ctx) => {
  if (value.RETRIEVAL_K_INITIAL < value.RETRIEVAL_K_FINAL) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["RETRIEVAL_K_INITIAL"],
      message: "RETRIEVAL_K_INITIAL must be >= RETRIEVAL_K_FINAL",
    });
  }
  for (const key of [
    "PORT",
    "EMBEDDING_DIMENSIONS",
    "RETRIEVAL_K_INITIAL",
    "RETRIEVAL_K_FINAL",
    "CONTEXT_TOKEN_BUDGET",
    "UPSTREAM_TIMEOUT_MS",
  ] as const) {
    if (!Number.isInteger(value[key]) || value[key] <= 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [key],
        message: `${key} must be a positive integer`,
      });
    }
  }
  if (Number.isNaN(value.RETRIEVAL_MIN_SIMILARITY) || Number.isNaN(value.ENTITY_BOOST_WEIGHT)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["RETRIEVAL_MIN_SIMILARITY"],
      message: "Similarity floor and boost weight must be numbers",
    });
  }
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse a raw environment. Throws with one line per invalid key.
 */
export function parseEnv(rawEnv: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(rawEnv);

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `   ${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("\n");
    throw configError(`Invalid environment configuration:\n${details}`, {
      keys: result.error.issues.map((issue) => issue.path.join(".") || "env"),
    });
  }

  return result.data;
}

/** Derived config for convenience */
export function buildConfig(env: Env) {
  return {
    port: env.PORT,
    isDev: env.NODE_ENV === "development",
    isProd: env.NODE_ENV === "production",

    openai: {
      apiKey: env.OPENAI_API_KEY,
      completionModel: env.COMPLETION_MODEL,
      embeddingModel: env.EMBEDDING_MODEL,
      embeddingDimensions: env.EMBEDDING_DIMENSIONS,
    },

    corpus: {
      file: env.CORPUS_FILE,
      stanceLexiconFile: env.STANCE_LEXICON_FILE,
    },

    retrieval: {
      kInitial: env.RETRIEVAL_K_INITIAL,
      kFinal: env.RETRIEVAL_K_FINAL,
      minSimilarity: env.RETRIEVAL_MIN_SIMILARITY,
      boostWeight: env.ENTITY_BOOST_WEIGHT,
    },

    tokenBudget: env.CONTEXT_TOKEN_BUDGET,
    upstreamTimeoutMs: env.UPSTREAM_TIMEOUT_MS,
  } as const;
}

export type AppConfig = ReturnType<typeof buildConfig>;

/**
 * Load config from process.env, exiting the process when it is invalid.
 * Only the server entrypoint calls this; library code takes explicit options.
 */
export function loadConfig(): AppConfig {
  try {
    return buildConfig(parseEnv(process.env));
  } catch (err) {
    console.error(`❌ ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}
