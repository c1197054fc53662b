export const EVENT_QUERY = `
query EventInfo($slug: String!) {
  event(slug: $slug) {
    id
    name
  }
}
`;

export const TOURNAMENT_EVENTS_QUERY = `
query TournamentEvents($slug: String!) {
  tournament(slug: $slug) {
    id
    name
    events {
      id
      name
      videogame { name }
    }
  }
}
`;

export const STANDINGS_QUERY = `
query EventStandings($eventId: ID!, $page: Int!, $perPage: Int!) {
  event(id: $eventId) {
    standings(query: { page: $page, perPage: $perPage }) {
      pageInfo { total totalPages }
      nodes {
        placement
        entrant {
          id
          name
          participants {
            gamerTag
            prefix
            user {
              authorizations(types: [TWITTER]) { externalUsername }
            }
          }
        }
      }
    }
  }
}
`;

export const ENTRANT_CHARACTERS_QUERY = `
query EntrantCharacters($eventId: ID!, $entrantId: ID!, $perPage: Int!) {
  event(id: $eventId) {
    videogame {
      characters { id name }
    }
    sets(
      page: 1
      perPage: $perPage
      sortType: RECENT
      filters: { entrantIds: [$entrantId] }
    ) {
      nodes {
        games {
          selections {
            entrant { id }
            selectionType
            selectionValue
          }
        }
      }
    }
  }
}
`;
