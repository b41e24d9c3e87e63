// src/config.ts
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { Aliases, StandingsSourceKind, TeamLabels } from "@champions-pool/shared";
import type { MatchStrategy } from "@champions-pool/pool-engine";
import { ConfigurationError, ConfigurationMissingError } from "./errors.js";

// dotenv leaves "FOO=" as an empty string; treat it as unset.
const unsetIfEmpty = (value: unknown) => (value === "" ? undefined : value);

export const MAX_REFRESH_INTERVAL_MINUTES = 35791;

const envSchema = z.object({
  PORT: z.preprocess(unsetIfEmpty, z.coerce.number().int().positive().default(3000)),
  STANDINGS_SOURCE: z.preprocess(unsetIfEmpty, z.enum(["api", "html", "static"]).default("api")),
  STANDINGS_API_URL: z.preprocess(unsetIfEmpty, z.string().url().default("https://api.football-data.org/v4")),
  STANDINGS_API_TOKEN: z.preprocess(unsetIfEmpty, z.string().optional()),
  COMPETITION_CODE: z.preprocess(unsetIfEmpty, z.string().default("CL")),
  STANDINGS_PAGE_URL: z.preprocess(
    unsetIfEmpty,
    z.string().url().default("https://www.uefa.com/uefachampionsleague/standings/"),
  ),
  REQUEST_TIMEOUT_MS: z.preprocess(unsetIfEmpty, z.coerce.number().int().positive().default(15000)),
  PARTICIPANTS_FILE: z.preprocess(unsetIfEmpty, z.string().default("config/participants.json")),
  MATCH_STRATEGY: z.preprocess(unsetIfEmpty, z.enum(["fuzzy", "substring"]).default("fuzzy")),
  MATCH_THRESHOLD: z.preprocess(unsetIfEmpty, z.coerce.number().int().min(0).max(100).default(60)),
  CACHE_DIR: z.preprocess(unsetIfEmpty, z.string().default("cache")),
  // setTimeout caps its delay at 2^31-1 ms (about 24.8 days).
  REFRESH_INTERVAL_MINUTES: z.preprocess(
    unsetIfEmpty,
    z.coerce.number().positive().max(MAX_REFRESH_INTERVAL_MINUTES).default(60),
  ),
  CSV_OUTPUT: z.preprocess(unsetIfEmpty, z.string().default("ranking.csv")),
});

export interface AppConfig {
  port: number;
  source: StandingsSourceKind;
  api: {
    baseUrl: string;
    token: string | undefined;
    competition: string;
  };
  pageUrl: string;
  requestTimeoutMs: number;
  participantsFile: string;
  matchStrategy: MatchStrategy;
  matchThreshold: number;
  cacheDir: string;
  refreshIntervalMs: number;
  csvOutput: string;
}

export interface PoolConfig {
  participants: Record<string, TeamLabels>;
  aliases: Aliases;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

/**
 * Builds the service configuration from environment variables. Paths are
 * resolved against `cwd`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid environment: ${formatIssues(parsed.error)}`);
  }
  const vars = parsed.data;

  return {
    port: vars.PORT,
    source: vars.STANDINGS_SOURCE,
    api: {
      baseUrl: vars.STANDINGS_API_URL.replace(/\/$/, ""),
      token: vars.STANDINGS_API_TOKEN,
      competition: vars.COMPETITION_CODE,
    },
    pageUrl: vars.STANDINGS_PAGE_URL,
    requestTimeoutMs: vars.REQUEST_TIMEOUT_MS,
    participantsFile: path.resolve(cwd, vars.PARTICIPANTS_FILE),
    matchStrategy: vars.MATCH_STRATEGY,
    matchThreshold: vars.MATCH_THRESHOLD,
    cacheDir: path.resolve(cwd, vars.CACHE_DIR),
    refreshIntervalMs: vars.REFRESH_INTERVAL_MINUTES * 60 * 1000,
    csvOutput: path.resolve(cwd, vars.CSV_OUTPUT),
  };
}

const teamLabel = z.string().trim().min(1, "team label must not be empty");

const poolSchema = z.object({
  participants: z.record(z.string().min(1), z.tuple([teamLabel, teamLabel])),
  aliases: z.record(z.string(), z.array(z.string())).default({}),
});

export function parsePoolConfig(raw: unknown, origin = "participants configuration"): PoolConfig {
  const parsed = poolSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${origin}: ${formatIssues(parsed.error)}`);
  }
  if (Object.keys(parsed.data.participants).length === 0) {
    throw new ConfigurationMissingError(`No participants configured in ${origin}`);
  }
  return parsed.data;
}

/**
 * Reads the participants file: `{ participants: { id: [team, team] }, aliases?: { label: [names] } }`.
 */
export async function loadPoolConfig(filePath: string): Promise<PoolConfig> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new ConfigurationMissingError(`Participants file not found: ${filePath}`);
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(
      `Participants file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return parsePoolConfig(raw, filePath);
}
