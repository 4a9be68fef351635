import { z } from "zod";
import type { AppConfig, SourcesConfig } from "@collabrag/types";
import { ConfigurationError } from "@collabrag/errors";

const optionalString = z
  .string()
  .optional()
  .transform((val) => (val === undefined || val.trim() === "" ? undefined : val.trim()));

const keyList = z
  .string()
  .default("")
  .transform((val) =>
    val
      .split(",")
      .map((key) => key.trim())
      .filter((key) => key.length > 0),
  );

function positiveInt(defaultValue: string) {
  return z.string().default(defaultValue).transform(Number).pipe(z.number().int().positive());
}

function nonNegativeInt(defaultValue: string) {
  return z.string().default(defaultValue).transform(Number).pipe(z.number().int().nonnegative());
}

const httpUrl = (name: string) =>
  optionalString.refine((url) => url === undefined || /^https?:\/\//.test(url), {
    message: `${name} must start with http:// or https://`,
  });

/**
 * Zod schema for every environment variable the pipeline reads.
 * Source credentials are optional; a source is enabled by supplying them.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("production"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
    COLLECTION_NAME: z.string().min(1).default("collabrag_chunks"),

    // ---------- Qdrant ----------
    QDRANT_URL: z.string().min(1, "QDRANT_URL is required").default("http://localhost:6333"),
    QDRANT_API_KEY: optionalString,

    // ---------- Cohere ----------
    COHERE_API_KEY: z.string().min(1, "COHERE_API_KEY is required"),
    COHERE_EMBED_MODEL: z.string().default("embed-v4.0"),
    EMBEDDING_DIMENSIONS: positiveInt("1024"),
    EMBED_BATCH_SIZE: z
      .string()
      .default("32")
      .transform(Number)
      .pipe(z.number().int().positive().max(96, "EMBED_BATCH_SIZE cannot exceed 96")),
    EMBED_TIMEOUT_MS: positiveInt("30000"),

    // ---------- Provider HTTP ----------
    HTTP_TIMEOUT_MS: positiveInt("30000"),
    HTTP_MAX_RETRIES: nonNegativeInt("2"),

    // ---------- Chunking ----------
    CHUNK_UNIT: z.enum(["char", "word"]).default("char"),
    CHUNK_SIZE: positiveInt("1000"),
    CHUNK_OVERLAP: nonNegativeInt("200"),

    // ---------- Retrieval ----------
    RETRIEVAL_TOP_K: positiveInt("3"),
    PROMPT_MAX_CHARS: positiveInt("12000"),
    TARGET_MODEL: z.enum(["claude", "gpt", "gemini", "generic"]).default("generic"),

    // ---------- Collection window ----------
    LOOKBACK_DAYS: optionalString.pipe(
      z.coerce.number().int().positive("LOOKBACK_DAYS must be a positive integer").optional(),
    ),

    // ---------- Jira ----------
    JIRA_BASE_URL: httpUrl("JIRA_BASE_URL"),
    JIRA_EMAIL: optionalString,
    JIRA_API_TOKEN: optionalString,
    JIRA_PROJECT_KEYS: keyList,
    JIRA_MAX_RESULTS: positiveInt("50"),

    // ---------- Confluence ----------
    CONFLUENCE_BASE_URL: httpUrl("CONFLUENCE_BASE_URL"),
    CONFLUENCE_EMAIL: optionalString,
    CONFLUENCE_API_TOKEN: optionalString,
    CONFLUENCE_SPACE_KEYS: keyList,
    CONFLUENCE_PAGE_LIMIT: z
      .string()
      .default("25")
      .transform(Number)
      .pipe(z.number().int().positive().max(100, "CONFLUENCE_PAGE_LIMIT cannot exceed 100")),

    // ---------- Microsoft 365 ----------
    M365_TENANT_ID: optionalString,
    M365_CLIENT_ID: optionalString,
    M365_CLIENT_SECRET: optionalString,
    M365_SOURCES: keyList.pipe(z.array(z.enum(["sharepoint", "teams"]))),
    SHAREPOINT_SITE_NAME: optionalString,
    TEAMS_GROUP_NAME: optionalString,

    // ---------- Scheduling ----------
    REDIS_URL: z.string().default("redis://localhost:6379"),
    SYNC_CRON: z.string().default("0 2 * * *"),
  })
  .superRefine((env, ctx) => {
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP"],
        message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
      });
    }

    requireAllOrNone(ctx, "Jira", {
      JIRA_BASE_URL: env.JIRA_BASE_URL,
      JIRA_EMAIL: env.JIRA_EMAIL,
      JIRA_API_TOKEN: env.JIRA_API_TOKEN,
    });
    requireAllOrNone(ctx, "Confluence", {
      CONFLUENCE_BASE_URL: env.CONFLUENCE_BASE_URL,
      CONFLUENCE_EMAIL: env.CONFLUENCE_EMAIL,
      CONFLUENCE_API_TOKEN: env.CONFLUENCE_API_TOKEN,
    });
    requireAllOrNone(ctx, "Microsoft 365", {
      M365_TENANT_ID: env.M365_TENANT_ID,
      M365_CLIENT_ID: env.M365_CLIENT_ID,
      M365_CLIENT_SECRET: env.M365_CLIENT_SECRET,
    });
  });

function requireAllOrNone(
  ctx: z.RefinementCtx,
  label: string,
  values: Record<string, string | undefined>,
): void {
  const entries = Object.entries(values);
  const present = entries.filter(([, value]) => value !== undefined);
  if (present.length === 0 || present.length === entries.length) return;

  for (const [name, value] of entries) {
    if (value === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [name],
        message: `${name} is required when using ${label}`,
      });
    }
  }
}

type ParsedEnv = z.infer<typeof envSchema>;

function buildSources(parsed: ParsedEnv): SourcesConfig {
  const sources: SourcesConfig = { lookbackDays: parsed.LOOKBACK_DAYS };

  if (parsed.JIRA_BASE_URL && parsed.JIRA_EMAIL && parsed.JIRA_API_TOKEN) {
    sources.jira = {
      baseUrl: parsed.JIRA_BASE_URL.replace(/\/$/, ""),
      email: parsed.JIRA_EMAIL,
      apiToken: parsed.JIRA_API_TOKEN,
      projectKeys: parsed.JIRA_PROJECT_KEYS,
      maxResults: parsed.JIRA_MAX_RESULTS,
    };
  }

  if (parsed.CONFLUENCE_BASE_URL && parsed.CONFLUENCE_EMAIL && parsed.CONFLUENCE_API_TOKEN) {
    sources.confluence = {
      baseUrl: parsed.CONFLUENCE_BASE_URL.replace(/\/$/, ""),
      email: parsed.CONFLUENCE_EMAIL,
      apiToken: parsed.CONFLUENCE_API_TOKEN,
      spaceKeys: parsed.CONFLUENCE_SPACE_KEYS,
      pageLimit: parsed.CONFLUENCE_PAGE_LIMIT,
    };
  }

  if (parsed.M365_TENANT_ID && parsed.M365_CLIENT_ID && parsed.M365_CLIENT_SECRET) {
    const credentials = {
      tenantId: parsed.M365_TENANT_ID,
      clientId: parsed.M365_CLIENT_ID,
      clientSecret: parsed.M365_CLIENT_SECRET,
    };
    const enabled: Array<"sharepoint" | "teams"> =
      parsed.M365_SOURCES.length > 0 ? parsed.M365_SOURCES : ["sharepoint", "teams"];

    if (enabled.includes("sharepoint")) {
      sources.sharepoint = { ...credentials, siteName: parsed.SHAREPOINT_SITE_NAME };
    }
    if (enabled.includes("teams")) {
      sources.teams = { ...credentials, groupName: parsed.TEAMS_GROUP_NAME };
    }
  }

  return sources;
}

/**
 * Parse and validate process.env (or any compatible record) and return the
 * explicit {@link AppConfig} every component is constructed with.
 *
 * Throws a ConfigurationError listing every invalid variable.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    throw new ConfigurationError("Invalid configuration", issues, { cause: result.error });
  }

  const parsed = result.data;

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    collectionName: parsed.COLLECTION_NAME,

    qdrant: {
      url: parsed.QDRANT_URL,
      apiKey: parsed.QDRANT_API_KEY,
    },

    cohere: {
      apiKey: parsed.COHERE_API_KEY,
      embedModel: parsed.COHERE_EMBED_MODEL,
    },

    embedding: {
      dimensions: parsed.EMBEDDING_DIMENSIONS,
      batchSize: parsed.EMBED_BATCH_SIZE,
      timeoutMs: parsed.EMBED_TIMEOUT_MS,
    },

    http: {
      timeoutMs: parsed.HTTP_TIMEOUT_MS,
      maxRetries: parsed.HTTP_MAX_RETRIES,
    },

    chunking: {
      unit: parsed.CHUNK_UNIT,
      chunkSize: parsed.CHUNK_SIZE,
      chunkOverlap: parsed.CHUNK_OVERLAP,
    },

    retrieval: {
      topK: parsed.RETRIEVAL_TOP_K,
      promptMaxChars: parsed.PROMPT_MAX_CHARS,
      targetModel: parsed.TARGET_MODEL,
    },

    sources: buildSources(parsed),

    redis: {
      url: parsed.REDIS_URL,
      syncCron: parsed.SYNC_CRON,
    },
  };
}
