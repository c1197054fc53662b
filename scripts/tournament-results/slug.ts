import { InvalidInputError } from "./errors";
import type { TournamentReference } from "./types";

const STARTGG_HOSTS = new Set(["start.gg", "smash.gg"]);
const SLUG_SEGMENT = /^[a-z0-9][a-z0-9-]*$/;
const URL_LIKE = /^(https?:\/\/|(www\.)?(start|smash)\.gg(\/|$))/i;

/**
 * Turns a start.gg link or slug into the tournament (and optional event) it
 * names.
 *
 * Accepted shapes:
 *  - "https://www.start.gg/tournament/evo-2023/details"
 *  - "tournament/evo-2023"
 *  - "start.gg/evo" (tournament shorthand)
 *  - "start.gg/tournament/evo-2023/event/street-fighter-6/overview"
 */
export function resolveTournamentReference(
  input: string
): TournamentReference {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new InvalidInputError(
      "A start.gg tournament link or slug is required"
    );
  }

  const fromUrl = URL_LIKE.test(trimmed);
  const segments = fromUrl ? urlSegments(trimmed) : slugSegments(trimmed);

  if (segments[0] === "tournament") {
    return tournamentFromSegments(segments, input);
  }

  if (fromUrl && segments.length === 1 && SLUG_SEGMENT.test(segments[0])) {
    return { slug: segments[0] };
  }

  throw new InvalidInputError(
    `Not a start.gg tournament or event link: "${trimmed}"`
  );
}

export function eventQuerySlug(reference: TournamentReference): string {
  if (!reference.eventSlug) {
    throw new InvalidInputError(`"${reference.slug}" does not name an event`);
  }
  return `tournament/${reference.slug}/event/${reference.eventSlug}`;
}

function urlSegments(raw: string): string[] {
  const withProto = /^https?:\/\//i.test(raw) ? raw : `https://${raw}`;
  let url: URL;
  try {
    url = new URL(withProto);
  } catch {
    throw new InvalidInputError(`Not a valid URL: "${raw}"`);
  }

  const host = url.hostname.toLowerCase().replace(/^www\./, "");
  if (!STARTGG_HOSTS.has(host)) {
    throw new InvalidInputError(`Not a start.gg link: "${raw}"`);
  }
  return splitPath(url.pathname);
}

function slugSegments(raw: string): string[] {
  return splitPath(raw.replace(/[?#].*$/, ""));
}

function splitPath(path: string): string[] {
  return path
    .split("/")
    .filter(Boolean)
    .map((segment) => segment.toLowerCase());
}

function tournamentFromSegments(
  segments: string[],
  input: string
): TournamentReference {
  const [, slug, marker, eventSlug] = segments;
  if (!slug || !SLUG_SEGMENT.test(slug)) {
    throw new InvalidInputError(
      `Missing tournament slug in "${input.trim()}"`
    );
  }
  if (marker !== "event") {
    return { slug };
  }
  if (!eventSlug || !SLUG_SEGMENT.test(eventSlug)) {
    throw new InvalidInputError(`Missing event slug in "${input.trim()}"`);
  }
  return { slug, eventSlug };
}
