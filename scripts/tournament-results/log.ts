import type { RunContext } from "./types";

export function createRunContext({
  verbose,
  writeErr = (line) => process.stderr.write(`${line}\n`),
}: {
  verbose: boolean;
  writeErr?: (line: string) => void;
}): RunContext {
  return { verbose, writeErr };
}

export function appendRunLog(ctx: RunContext, message: string) {
  if (!ctx.verbose) return;
  ctx.writeErr(`[${new Date().toISOString()}] ${message}`);
}
