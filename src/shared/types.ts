// Core Types

/** One row of the co-appearance table */
export interface CoAppearanceRecord {
  character1: string;
  character2: string;
  scenesTogether: number;
}

export interface GraphEdge {
  source: string;
  target: string;
  weight: number;
}

export interface DegreeEntry {
  character: string;
  degree: number;
}

export interface PairEntry {
  pair: [string, string];
  weight: number;
}

export interface CoCharacter {
  name: string;
  weight: number;
}

export interface CharacterStats {
  totalScenes: number;
  topCoCharacter: CoCharacter;
  uniqueCoAppearances: number;
  family: FamilyLabel;
}

export type FamilyGroup = 'Pritchett' | 'Dunphy' | 'Tucker-Pritchett';
export type FamilyLabel = FamilyGroup | 'Unknown';

// Query results

export type QueryFailure = { kind: 'not-found'; character: string };

export type QueryResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: QueryFailure };

export type PathResult =
  | { kind: 'found'; path: string[] }
  | { kind: 'no-path'; source: string; target: string }
  | { kind: 'not-found'; character: string };

// Transcript types

export interface EpisodeRecord {
  title: string;
  scenes: string[];
}

export interface SceneRecord {
  episode: string;
  title: string;
  scene: string;
}

export interface SegmentedTranscript {
  episodes: Record<string, EpisodeRecord>;
  scenes: SceneRecord[];
}

export interface EpisodeSummary {
  id: string;
  title: string;
  sceneCount: number;
}

// Dashboard types

export interface DashboardOptions {
  minScenesOptions: number[];
  defaultMinScenes: number;
  defaultTopN: number;
  maxTopN: number;
}
