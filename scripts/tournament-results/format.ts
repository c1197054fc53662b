import type { EventResults, ParticipantInfo, PlacementRecord } from "./types";

export interface FormatOptions {
  limit?: number;
  twitter?: boolean;
}

export function formatEntrantName(
  participants: ParticipantInfo[],
  fallback: string
): string {
  if (participants.length === 0) return fallback;
  return participants
    .map(({ prefix, gamerTag }) => {
      const cleanPrefix = prefix?.trim();
      return cleanPrefix ? `${cleanPrefix} | ${gamerTag}` : gamerTag;
    })
    .join(" / ");
}

export function formatPlacementLine(
  record: PlacementRecord,
  { twitter = false }: FormatOptions = {}
): string {
  let line = `${record.rank}. ${record.entrantName}`;
  if (twitter && record.socialHandles.length > 0) {
    const handles = record.socialHandles.map((handle) => `@${handle}`);
    line += ` (${handles.join(" ")})`;
  }
  if (record.characters.length > 0) {
    line += ` - ${record.characters.join(", ")}`;
  }
  return line;
}

export function formatPlacements(
  records: PlacementRecord[],
  options: FormatOptions = {}
): string[] {
  const shown =
    options.limit === undefined ? records : records.slice(0, options.limit);
  return shown.map((record) => formatPlacementLine(record, options));
}

/**
 * Results with a heading print it above their lines, with a blank line
 * between consecutive results.
 */
export function renderResults(
  results: EventResults[],
  options: FormatOptions = {}
): string[] {
  const lines: string[] = [];
  results.forEach((result, index) => {
    if (result.heading !== undefined) {
      if (index > 0) lines.push("");
      lines.push(result.heading);
    }
    lines.push(...formatPlacements(result.placements, options));
  });
  return lines;
}
