#!/usr/bin/env node
import process from "node:process";

import { loadConfig } from "./config";
import { ApiError, ConfigError, InvalidInputError } from "./errors";
import { renderResults } from "./format";
import type { FetchLike } from "./http";
import { appendRunLog, createRunContext } from "./log";
import { collectResults } from "./results";
import { resolveTournamentReference } from "./slug";
import { StartggClient } from "./startgg";
import type { CliOptions } from "./types";

export const USAGE = [
  "Usage: startgg-results <tournament-url-or-slug> [options]",
  "",
  "-n, --places <N>   Only print the top N placements of each event",
  "-c, --characters   Append the characters each entrant played",
  "-t, --twitter      Append entrants' Twitter handles",
  "-v, --verbose      Log API requests to stderr",
  "-h, --help         Show this message",
].join("\n");

export type ParsedArgs = { help: true } | ({ help: false } & CliOptions);

function parsePlaces(raw: string | undefined): number {
  if (raw === undefined || !/^\d+$/.test(raw) || Number(raw) < 1) {
    throw new InvalidInputError(
      `--places expects a positive integer, got "${raw ?? ""}"`
    );
  }
  return Number(raw);
}

export function parseArgs(args: string[]): ParsedArgs {
  let link: string | undefined;
  let places: number | undefined;
  let characters = false;
  let twitter = false;
  let verbose = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") {
      return { help: true };
    } else if (arg === "--places" || arg === "-n") {
      places = parsePlaces(args[++i]);
    } else if (arg.startsWith("--places=")) {
      places = parsePlaces(arg.slice("--places=".length));
    } else if (arg === "--characters" || arg === "-c") {
      characters = true;
    } else if (arg === "--twitter" || arg === "-t") {
      twitter = true;
    } else if (arg === "--verbose" || arg === "-v") {
      verbose = true;
    } else if (arg.startsWith("-")) {
      throw new InvalidInputError(`Unknown argument: ${arg}`);
    } else if (link === undefined) {
      link = arg;
    } else {
      throw new InvalidInputError(`Unexpected extra argument: ${arg}`);
    }
  }

  if (link === undefined) {
    throw new InvalidInputError(
      "A start.gg tournament link or slug is required"
    );
  }
  return { help: false, link, places, characters, twitter, verbose };
}

export interface MainDeps {
  env?: Record<string, string | undefined>;
  cwd?: string;
  fetchImpl?: FetchLike;
  writeOut?: (text: string) => void;
  writeErr?: (line: string) => void;
}

export function exitCodeFor(error: unknown): number {
  return error instanceof InvalidInputError ? 2 : 1;
}

function describeError(error: unknown): string {
  if (
    error instanceof InvalidInputError ||
    error instanceof ApiError ||
    error instanceof ConfigError
  ) {
    return error.message;
  }
  return error instanceof Error ? error.stack ?? error.message : String(error);
}

export async function main(
  argv: string[],
  deps: MainDeps = {}
): Promise<number> {
  const writeOut =
    deps.writeOut ?? ((text: string) => process.stdout.write(text));
  const writeErr =
    deps.writeErr ?? ((line: string) => process.stderr.write(`${line}\n`));

  try {
    const parsed = parseArgs(argv);
    if (parsed.help) {
      writeOut(`${USAGE}\n`);
      return 0;
    }

    const reference = resolveTournamentReference(parsed.link);
    const config = loadConfig(
      deps.env ?? process.env,
      deps.cwd ?? process.cwd()
    );
    const ctx = createRunContext({ verbose: parsed.verbose, writeErr });
    const target = reference.eventSlug
      ? `${reference.slug} / ${reference.eventSlug}`
      : reference.slug;
    appendRunLog(ctx, `Fetching results for ${target}`);

    const client = new StartggClient({
      endpoint: config.apiUrl,
      token: config.apiToken,
      perPage: config.perPage,
      ctx,
      fetchImpl: deps.fetchImpl,
    });
    const results = await collectResults(
      client,
      reference,
      { places: parsed.places, characters: parsed.characters },
      ctx
    );

    const lines = renderResults(results, {
      limit: parsed.places,
      twitter: parsed.twitter,
    });
    if (lines.length > 0) {
      writeOut(`${lines.join("\n")}\n`);
    }
    return 0;
  } catch (error) {
    writeErr(`Error: ${describeError(error)}`);
    if (error instanceof InvalidInputError) writeErr(USAGE);
    return exitCodeFor(error);
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error(error);
      process.exitCode = 1;
    });
}
