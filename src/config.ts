import { z } from "zod";

import { ConfigError } from "./errors.js";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const optionalString = z
  .string()
  .transform((value) => value.trim())
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  GITHUB_TOKEN: optionalString,
  GITHUB_USERNAME: optionalString,
  LLM_API_KEY: optionalString,
  LLM_MODEL: optionalString,
  LLM_BASE_URL: optionalString,
  GEMINI_API_KEY: optionalString,
  IMAGEN_MODEL: optionalString,
  IMAGEN_BASE_URL: optionalString,
  LINKEDIN_ACCESS_TOKEN: optionalString,
  LINKEDIN_PERSON_URN: optionalString,
  LINKEDIN_ID_TOKEN: optionalString,
  LINKEDIN_CLIENT_ID: optionalString,
  LINKEDIN_CLIENT_SECRET: optionalString,
  LINKEDIN_REDIRECT_URI: optionalString,
  LOOKBACK_HOURS: z.coerce.number().positive().default(24),
  HISTORY_FILE: optionalString,
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  LOG_DIR: optionalString,
});

type ParsedEnv = z.infer<typeof envSchema>;

export interface GitHubConfig {
  token: string;
  username: string;
  lookbackHours: number;
}

export interface LlmConfig {
  apiKey: string;
  model: string;
  baseURL: string;
}

export interface ImageConfig {
  /** No key means the image stage is skipped */
  apiKey?: string;
  model: string;
  baseURL: string;
}

export interface LinkedInConfig {
  accessToken: string;
  personUrn?: string;
  idToken?: string;
  apiBaseUrl: string;
}

export interface OAuthConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

export interface AppConfig {
  github: GitHubConfig;
  llm: LlmConfig;
  image: ImageConfig;
  linkedin: LinkedInConfig;
  historyFile: string;
  logging: { level: LogLevel; dir: string };
}

export const DEFAULT_LLM_MODEL = "llama-3.3-70b-versatile";
export const DEFAULT_LLM_BASE_URL = "https://api.groq.com/openai/v1";
export const DEFAULT_IMAGEN_MODEL = "imagen-4.0-generate-001";
export const DEFAULT_IMAGEN_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";
export const LINKEDIN_API_BASE_URL = "https://api.linkedin.com/v2";

type Env = Record<string, string | undefined>;

function parseEnv(env: Env): ParsedEnv {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return result.data;
}

/**
 * Reports every missing variable in one error, then hands out the values.
 */
function requireAll<K extends keyof ParsedEnv>(parsed: ParsedEnv, keys: readonly K[]): (key: K) => string {
  const missing = keys.filter((key) => parsed[key] === undefined);
  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(", ")}`);
  }
  return (key) => {
    const value = parsed[key];
    if (typeof value !== "string") {
      throw new ConfigError(`Missing required environment variable: ${String(key)}`);
    }
    return value;
  };
}

function linkedInFrom(parsed: ParsedEnv, accessToken: string): LinkedInConfig {
  return {
    accessToken,
    personUrn: parsed.LINKEDIN_PERSON_URN,
    idToken: parsed.LINKEDIN_ID_TOKEN,
    apiBaseUrl: LINKEDIN_API_BASE_URL,
  };
}

/**
 * Builds the run configuration from environment variables.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = parseEnv(env);
  const required = requireAll(parsed, [
    "GITHUB_TOKEN",
    "GITHUB_USERNAME",
    "LLM_API_KEY",
    "LINKEDIN_ACCESS_TOKEN",
  ]);

  return {
    github: {
      token: required("GITHUB_TOKEN"),
      username: required("GITHUB_USERNAME"),
      lookbackHours: parsed.LOOKBACK_HOURS,
    },
    llm: {
      apiKey: required("LLM_API_KEY"),
      model: parsed.LLM_MODEL ?? DEFAULT_LLM_MODEL,
      baseURL: parsed.LLM_BASE_URL ?? DEFAULT_LLM_BASE_URL,
    },
    image: {
      apiKey: parsed.GEMINI_API_KEY,
      model: parsed.IMAGEN_MODEL ?? DEFAULT_IMAGEN_MODEL,
      baseURL: parsed.IMAGEN_BASE_URL ?? DEFAULT_IMAGEN_BASE_URL,
    },
    linkedin: linkedInFrom(parsed, required("LINKEDIN_ACCESS_TOKEN")),
    historyFile: parsed.HISTORY_FILE ?? "post_examples.json",
    logging: { level: parsed.LOG_LEVEL, dir: parsed.LOG_DIR ?? "logs" },
  };
}

/**
 * Subset used by commands that only talk to LinkedIn.
 */
export function loadLinkedInConfig(env: Env = process.env): LinkedInConfig {
  const parsed = parseEnv(env);
  const required = requireAll(parsed, ["LINKEDIN_ACCESS_TOKEN"]);
  return linkedInFrom(parsed, required("LINKEDIN_ACCESS_TOKEN"));
}

export function loadOAuthConfig(env: Env = process.env): OAuthConfig {
  const required = requireAll(parseEnv(env), [
    "LINKEDIN_CLIENT_ID",
    "LINKEDIN_CLIENT_SECRET",
    "LINKEDIN_REDIRECT_URI",
  ]);
  return {
    clientId: required("LINKEDIN_CLIENT_ID"),
    clientSecret: required("LINKEDIN_CLIENT_SECRET"),
    redirectUri: required("LINKEDIN_REDIRECT_URI"),
  };
}

/**
 * Logging settings never fail: an unknown level falls back to info.
 */
export function loadLoggingConfig(env: Env = process.env): { level: LogLevel; dir: string } {
  const level = LOG_LEVELS.find((candidate) => candidate === env["LOG_LEVEL"]) ?? "info";
  return { level, dir: env["LOG_DIR"]?.trim() || "logs" };
}
