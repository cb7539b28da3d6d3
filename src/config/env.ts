import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

export function parseDotEnvLine(line: string): [string, string] | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }

  const separatorIndex = trimmed.indexOf("=");
  if (separatorIndex <= 0) {
    return null;
  }

  const key = trimmed.slice(0, separatorIndex).trim();
  let value = trimmed.slice(separatorIndex + 1).trim();

  if (
    (value.startsWith('"') && value.endsWith('"')) ||
    (value.startsWith("'") && value.endsWith("'"))
  ) {
    value = value.slice(1, -1);
  }

  return [key, value];
}

export interface LoadModeEnvFileOptions {
  cwd?: string;
  processEnv?: NodeJS.ProcessEnv;
  existsSync?: typeof fs.existsSync;
  readFileSync?: typeof fs.readFileSync;
}

export function loadModeEnvFile(options: LoadModeEnvFileOptions = {}): string | null {
  const cwd = options.cwd ?? process.cwd();
  const processEnv = options.processEnv ?? process.env;
  const existsSync = options.existsSync ?? fs.existsSync;
  const readFileSync = options.readFileSync ?? fs.readFileSync;
  const protectedKeys = new Set(
    Object.keys(processEnv).filter((key) => processEnv[key] !== undefined)
  );
  const rawMode = processEnv.APP_MODE?.trim().toLowerCase();
  const explicitMode = rawMode === "local" || rawMode === "prod" ? rawMode : undefined;

  const modeCandidates = explicitMode ? [explicitMode] : ["local", "prod"];
  const envFilePath = modeCandidates
    .map((mode) => path.join(cwd, `.env.${mode}`))
    .find((candidate) => existsSync(candidate));
  if (!envFilePath) {
    return null;
  }

  const content = readFileSync(envFilePath, "utf8");
  for (const line of content.split(/\r?\n/)) {
    const entry = parseDotEnvLine(line);
    if (!entry) {
      continue;
    }
    const [key, value] = entry;
    if (protectedKeys.has(key)) {
      continue;
    }
    processEnv[key] = value;
  }

  return envFilePath;
}

const runtimeModeSchema = z.enum(["prod", "local"]);
const booleanFlagSchema = z
  .union([z.boolean(), z.string()])
  .transform((value) => {
    if (typeof value === "boolean") {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
  });

const optionalTrimmedString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed && trimmed.length > 0 ? trimmed : undefined;
  });

export const envSchema = z
  .object({
    APP_MODE: runtimeModeSchema.default("local"),
    PORT: z.coerce.number().int().positive().default(3000),
    FRONTEND_ORIGIN: z.string().min(1).default("http://localhost:5173"),
    ENABLE_INFRA_BOOTSTRAP: booleanFlagSchema.default(false),
    RUN_STARTUP_CHECKS: booleanFlagSchema.default(false),
    OPENAI_API_KEY: optionalTrimmedString,
    OPENAI_EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
    POSTGRES_URL: optionalTrimmedString,
    QDRANT_URL: optionalTrimmedString,
    QDRANT_API_KEY: optionalTrimmedString,
    QDRANT_COLLECTION: z.string().min(1).default("court_ruling_chunks"),
    LOCAL_VECTOR_STORE_FILE: optionalTrimmedString,
    CHUNK_MAX_CHARS: z.coerce.number().int().positive().default(1000),
    CHUNK_OVERLAP_CHARS: z.coerce.number().int().nonnegative().default(150),
    EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(7000),
    EMBEDDING_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
    EMBEDDING_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(4),
    INGEST_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(2),
    SEARCH_MIN_RELEVANCE: z.coerce.number().min(-1).max(1).default(0.3),
    SEARCH_DEFAULT_LIMIT: z.coerce.number().int().min(1).max(100).default(10),
    SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    CLARIFICATION_MAX_ROUNDS: z.coerce.number().int().nonnegative().max(10).default(2),
    AMBIGUITY_THRESHOLD: z.coerce.number().int().min(1).default(1)
  })
  .superRefine((value, ctx) => {
    if (value.APP_MODE === "prod") {
      for (const key of ["OPENAI_API_KEY", "POSTGRES_URL", "QDRANT_URL"] as const) {
        if (!value[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: `${key} is required in prod mode`
          });
        }
      }
    }
    // Room for the overlap tail plus at least one unit of new text.
    if (value.CHUNK_MAX_CHARS < value.CHUNK_OVERLAP_CHARS * 2 + 64) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_MAX_CHARS"],
        message: "CHUNK_MAX_CHARS must be at least twice CHUNK_OVERLAP_CHARS plus 64"
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

export function parseEnv(rawEnv: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(rawEnv);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `- ${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${details}`);
  }

  return parsed.data;
}

loadModeEnvFile();

export const env: Env = parseEnv(process.env);
