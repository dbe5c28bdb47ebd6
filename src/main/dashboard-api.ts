/**
 * Request handlers behind the dashboard endpoints.
 *
 * Each handler takes the raw query object, validates it and answers with
 * plain data. Failures are thrown as EnsembleError and turned into HTTP
 * statuses by statusForError().
 */

import type { z, ZodTypeAny } from 'zod';
import { characterStats, findPath, topConnected, topPairs } from '../graph/graph-analysis';
import type { GraphSession } from '../graph/graph-session';
import { EnsembleError, ErrorCode } from '../shared/errors';
import { createQuerySchemas, type QuerySchemas } from '../shared/schemas/query-params';
import type { CharacterStats, DashboardOptions, DegreeEntry, PairEntry } from '../shared/types';

export interface PathResponse {
  path: string[] | null;
}

function validate<S extends ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new EnsembleError(`Invalid parameters: ${details}`, ErrorCode.INVALID_PARAMS, {
      context: { issues: result.error.issues },
    });
  }
  return result.data;
}

export function statusForError(error: EnsembleError): number {
  switch (error.code) {
    case ErrorCode.INVALID_PARAMS:
      return 400;
    case ErrorCode.CHARACTER_NOT_FOUND:
      return 404;
    default:
      return 500;
  }
}

export class DashboardApi {
  private readonly session: GraphSession;
  private readonly options: DashboardOptions;
  private readonly schemas: QuerySchemas;

  constructor(session: GraphSession, options: DashboardOptions) {
    this.session = session;
    this.options = options;
    this.schemas = createQuerySchemas(options);
  }

  getOptions(): DashboardOptions {
    return {
      minScenesOptions: [...this.options.minScenesOptions],
      defaultMinScenes: this.options.defaultMinScenes,
      defaultTopN: this.options.defaultTopN,
      maxTopN: this.options.maxTopN,
    };
  }

  listCharacters(query: unknown): string[] {
    const { minScenes } = validate(this.schemas.characters, query);
    return this.session.characters(minScenes);
  }

  topConnected(query: unknown): DegreeEntry[] {
    const { minScenes, limit } = validate(this.schemas.ranking, query);
    return topConnected(this.session.graphFor(minScenes), limit);
  }

  topPairs(query: unknown): PairEntry[] {
    const { minScenes, limit } = validate(this.schemas.ranking, query);
    return topPairs(this.session.graphFor(minScenes), limit);
  }

  /**
   * "No path" is a normal answer (path: null); an unknown name is not.
   */
  path(query: unknown): PathResponse {
    const { minScenes, from, to } = validate(this.schemas.path, query);
    if (from === to) {
      throw new EnsembleError('Please select two different characters', ErrorCode.INVALID_PARAMS, {
        context: { from, to },
      });
    }

    const result = findPath(this.session.graphFor(minScenes), from, to);
    switch (result.kind) {
      case 'found':
        return { path: result.path };
      case 'no-path':
        return { path: null };
      case 'not-found':
        throw new EnsembleError(`Unknown character: ${result.character}`, ErrorCode.CHARACTER_NOT_FOUND, {
          context: { character: result.character, minScenes },
        });
    }
  }

  stats(name: string, query: unknown): CharacterStats {
    const raw = typeof query === 'object' && query !== null ? { ...query, name } : { name };
    const { minScenes, name: character } = validate(this.schemas.stats, raw);

    const result = characterStats(this.session.graphFor(minScenes), character);
    if (!result.ok) {
      throw new EnsembleError(
        `No connections for ${result.error.character} at ${minScenes}+ shared scenes`,
        ErrorCode.CHARACTER_NOT_FOUND,
        { context: { character: result.error.character, minScenes } },
      );
    }
    return result.value;
  }
}
