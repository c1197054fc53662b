import { ApiError } from "./errors";
import { appendRunLog } from "./log";
import { eventQuerySlug } from "./slug";
import type { StartggClient } from "./startgg";
import type {
  EventResults,
  PlacementRecord,
  RunContext,
  TournamentReference,
} from "./types";

export interface CollectOptions {
  places?: number;
  characters: boolean;
}

type ResultsSource = Pick<
  StartggClient,
  "getEvent" | "getTournamentEvents" | "getStandings" | "getEntrantCharacters"
>;

async function loadPlacements(
  client: ResultsSource,
  eventId: string,
  options: CollectOptions,
  ctx: RunContext
): Promise<PlacementRecord[]> {
  const standings = await client.getStandings(eventId, {
    limit: options.places,
  });
  if (!standings) {
    throw new ApiError(`Event ${eventId} not found on start.gg`);
  }
  const placements =
    options.places === undefined
      ? standings
      : standings.slice(0, options.places);

  if (options.characters) {
    for (const record of placements) {
      appendRunLog(
        ctx,
        `Fetching characters for ${record.entrantName} (${record.entrantId})`
      );
      record.characters = await client.getEntrantCharacters(
        eventId,
        record.entrantId
      );
    }
  }
  return placements;
}

/**
 * A single event comes back as one heading-less result; a whole tournament
 * as one result per event, each headed `<game> - <event>`.
 */
export async function collectResults(
  client: ResultsSource,
  reference: TournamentReference,
  options: CollectOptions,
  ctx: RunContext
): Promise<EventResults[]> {
  if (reference.eventSlug) {
    const slug = eventQuerySlug(reference);
    const event = await client.getEvent(slug);
    if (!event) {
      throw new ApiError(`Event not found on start.gg: ${slug}`);
    }
    appendRunLog(ctx, `Resolved ${slug} to event ${event.id}`);
    return [
      { placements: await loadPlacements(client, event.id, options, ctx) },
    ];
  }

  const tournament = await client.getTournamentEvents(reference.slug);
  if (!tournament) {
    throw new ApiError(`Tournament not found on start.gg: ${reference.slug}`);
  }
  appendRunLog(
    ctx,
    `Tournament ${tournament.name} has ${tournament.events.length} event(s)`
  );

  const results: EventResults[] = [];
  for (const event of tournament.events) {
    const heading = event.gameName
      ? `${event.gameName} - ${event.name}`
      : event.name;
    const placements = await loadPlacements(client, event.id, options, ctx);
    results.push({ heading, placements });
  }
  return results;
}
