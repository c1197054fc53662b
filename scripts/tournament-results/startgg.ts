import { z } from "zod";

import { formatEntrantName } from "./format";
import { postGraphql, type FetchLike, type GraphqlOptions } from "./http";
import { appendRunLog } from "./log";
import {
  ENTRANT_CHARACTERS_QUERY,
  EVENT_QUERY,
  STANDINGS_QUERY,
  TOURNAMENT_EVENTS_QUERY,
} from "./queries";
import type { PlacementRecord, RunContext } from "./types";

const SETS_PER_PAGE = 150;

const idSchema = z.union([z.number(), z.string()]).transform(String);
const namedSchema = z.object({ name: z.string() });

const eventInfoSchema = z.object({
  event: z.object({ id: idSchema, name: z.string() }).nullable(),
});

const tournamentEventsSchema = z.object({
  tournament: z
    .object({
      id: idSchema,
      name: z.string(),
      events: z
        .array(
          z.object({
            id: idSchema,
            name: z.string(),
            videogame: namedSchema.nullable(),
          })
        )
        .nullable(),
    })
    .nullable(),
});

const participantSchema = z.object({
  gamerTag: z.string(),
  prefix: z.string().nullable().optional(),
  user: z
    .object({
      authorizations: z
        .array(z.object({ externalUsername: z.string().nullable() }))
        .nullable(),
    })
    .nullable()
    .optional(),
});

const standingNodeSchema = z.object({
  placement: z.number().int().nullable(),
  entrant: z
    .object({
      id: idSchema,
      name: z.string(),
      participants: z.array(participantSchema).nullable(),
    })
    .nullable(),
});

const standingsSchema = z.object({
  event: z
    .object({
      standings: z
        .object({
          pageInfo: z
            .object({ total: z.number(), totalPages: z.number() })
            .nullable(),
          nodes: z.array(standingNodeSchema).nullable(),
        })
        .nullable(),
    })
    .nullable(),
});

const selectionSchema = z.object({
  entrant: z.object({ id: idSchema }).nullable(),
  selectionType: z.string().nullable(),
  selectionValue: idSchema.nullable(),
});

const charactersSchema = z.object({
  event: z
    .object({
      videogame: z
        .object({
          characters: z
            .array(z.object({ id: idSchema, name: z.string() }))
            .nullable(),
        })
        .nullable(),
      sets: z
        .object({
          nodes: z.array(
            z.object({
              games: z
                .array(
                  z.object({ selections: z.array(selectionSchema).nullable() })
                )
                .nullable(),
            })
          ),
        })
        .nullable(),
    })
    .nullable(),
});

export interface EventInfo {
  id: string;
  name: string;
}

export interface TournamentEvents {
  id: string;
  name: string;
  events: Array<{ id: string; name: string; gameName: string | null }>;
}

export interface StartggClientOptions {
  endpoint: string;
  token: string;
  ctx: RunContext;
  perPage: number;
  fetchImpl?: FetchLike;
}

export class StartggClient {
  private readonly graphql: GraphqlOptions;
  private readonly perPage: number;

  constructor({
    endpoint,
    token,
    ctx,
    perPage,
    fetchImpl = fetch,
  }: StartggClientOptions) {
    this.graphql = { endpoint, token, ctx, fetchImpl };
    this.perPage = perPage;
  }

  async getEvent(eventSlug: string): Promise<EventInfo | null> {
    const { event } = await postGraphql(
      {
        operationName: "EventInfo",
        query: EVENT_QUERY,
        variables: { slug: eventSlug },
      },
      eventInfoSchema,
      this.graphql
    );
    return event ? { id: event.id, name: event.name } : null;
  }

  async getTournamentEvents(slug: string): Promise<TournamentEvents | null> {
    const { tournament } = await postGraphql(
      {
        operationName: "TournamentEvents",
        query: TOURNAMENT_EVENTS_QUERY,
        variables: { slug },
      },
      tournamentEventsSchema,
      this.graphql
    );
    if (!tournament) return null;
    return {
      id: tournament.id,
      name: tournament.name,
      events: (tournament.events ?? []).map((event) => ({
        id: event.id,
        name: event.name,
        gameName: event.videogame?.name ?? null,
      })),
    };
  }

  /**
   * Reads standings page by page until `limit` records are in hand or the
   * pages run out. Returns `null` when the event does not exist; an event
   * without standings yields an empty list.
   */
  async getStandings(
    eventId: string,
    { limit }: { limit?: number } = {}
  ): Promise<PlacementRecord[] | null> {
    const records: PlacementRecord[] = [];
    let page = 1;
    let totalPages = 1;

    while (page <= totalPages) {
      const { event } = await postGraphql(
        {
          operationName: "EventStandings",
          query: STANDINGS_QUERY,
          variables: { eventId, page, perPage: this.perPage },
        },
        standingsSchema,
        this.graphql
      );
      if (!event) return null;

      const nodes = event.standings?.nodes ?? [];
      const pageInfo = event.standings?.pageInfo;
      const total = pageInfo?.total ?? nodes.length;
      totalPages = pageInfo?.totalPages ?? page;
      appendRunLog(
        this.graphql.ctx,
        `Event ${eventId}: page ${page}/${totalPages}, ${nodes.length} of ${total}`
      );

      for (const node of nodes) {
        if (node.placement === null || node.placement < 1 || !node.entrant) {
          continue;
        }
        const participants = node.entrant.participants ?? [];
        records.push({
          rank: node.placement,
          entrantId: node.entrant.id,
          entrantName: formatEntrantName(participants, node.entrant.name),
          socialHandles: participants.flatMap((participant) =>
            (participant.user?.authorizations ?? [])
              .map((auth) => auth.externalUsername)
              .filter((handle): handle is string => Boolean(handle))
              .slice(0, 1)
          ),
          characters: [],
        });
      }

      if (limit !== undefined && records.length >= limit) break;
      page += 1;
    }

    return records.sort((a, b) => a.rank - b.rank);
  }

  async getEntrantCharacters(
    eventId: string,
    entrantId: string
  ): Promise<string[]> {
    const { event } = await postGraphql(
      {
        operationName: "EntrantCharacters",
        query: ENTRANT_CHARACTERS_QUERY,
        variables: { eventId, entrantId, perPage: SETS_PER_PAGE },
      },
      charactersSchema,
      this.graphql
    );

    const roster = event?.videogame?.characters ?? [];
    if (!event || roster.length === 0) return [];

    const names = new Map(
      roster.map((character): [string, string] => [
        character.id,
        character.name,
      ])
    );
    const played = new Set<string>();
    for (const set of event.sets?.nodes ?? []) {
      for (const game of set.games ?? []) {
        for (const selection of game.selections ?? []) {
          if (selection.entrant?.id !== entrantId) continue;
          if (selection.selectionType !== "CHARACTER") continue;
          if (selection.selectionValue === null) continue;
          const name = names.get(selection.selectionValue);
          if (name) played.add(name);
        }
      }
    }
    return Array.from(played);
  }
}
