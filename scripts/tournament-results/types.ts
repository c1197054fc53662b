export interface TournamentReference {
  readonly slug: string;
  readonly eventSlug?: string;
}

export interface PlacementRecord {
  rank: number;
  entrantId: string;
  entrantName: string;
  socialHandles: string[];
  characters: string[];
}

export type ResultList = PlacementRecord[];

export interface EventResults {
  heading?: string;
  placements: ResultList;
}

export interface ParticipantInfo {
  prefix?: string | null;
  gamerTag: string;
}

export interface RunContext {
  verbose: boolean;
  writeErr: (line: string) => void;
}

export interface CliOptions {
  link: string;
  places?: number;
  characters: boolean;
  twitter: boolean;
  verbose: boolean;
}
