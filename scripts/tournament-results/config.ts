import "dotenv/config";
import fs from "node:fs";
import path from "node:path";

import { ConfigError } from "./errors";

export const DEFAULT_API_URL = "https://api.start.gg/gql/alpha";
export const DEFAULT_PER_PAGE = 50;
export const DEFAULT_AUTH_FILE = "auth.txt";

export interface ResultsConfig {
  apiUrl: string;
  apiToken: string;
  perPage: number;
}

type Env = Record<string, string | undefined>;

export function loadApiToken(
  env: Env = process.env,
  cwd = process.cwd()
): string {
  const fromEnv = env.STARTGG_API_KEY?.trim();
  if (fromEnv) return fromEnv;

  const authFile = path.resolve(
    cwd,
    env.STARTGG_AUTH_FILE ?? DEFAULT_AUTH_FILE
  );
  if (fs.existsSync(authFile)) {
    const fromFile = fs.readFileSync(authFile, "utf8").trim();
    if (fromFile) return fromFile;
  }

  throw new ConfigError(
    `No start.gg API token found. Set STARTGG_API_KEY or put the token in ${authFile}`
  );
}

function parsePerPage(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") return DEFAULT_PER_PAGE;
  const value = Number(raw);
  if (!/^\d+$/.test(raw.trim()) || value < 1) {
    throw new ConfigError(
      `STARTGG_PER_PAGE must be a positive integer, got "${raw}"`
    );
  }
  return value;
}

export function loadConfig(
  env: Env = process.env,
  cwd = process.cwd()
): ResultsConfig {
  return {
    apiUrl: env.STARTGG_API_URL?.trim() || DEFAULT_API_URL,
    apiToken: loadApiToken(env, cwd),
    perPage: parsePerPage(env.STARTGG_PER_PAGE),
  };
}
