import type { EntityRecord, EntityStore } from '../models/collaborators';
import type { Candidate, EntityKind } from '../models/intent';
import { CollaboratorUnavailableError } from '../errors';
import { withTimeout } from '../utils/timeout';
import { createLogger } from '../utils/logger';

const logger = createLogger('Entity Resolver');

export interface EntityResolverOptions {
  maxCandidates: number;
  lookupTimeoutMs: number;
}

export class EntityResolver {
  constructor(
    private readonly store: EntityStore,
    private readonly options: EntityResolverOptions
  ) {}

  async resolve(nameFragment: string, kind: EntityKind): Promise<Candidate[]> {
    const fragment = nameFragment.trim();
    if (!fragment) return [];

    let records: EntityRecord[];
    try {
      records = await withTimeout(
        this.store.findByNameFragment(fragment, kind),
        this.options.lookupTimeoutMs,
        'entity lookup'
      );
    } catch (error) {
      throw new CollaboratorUnavailableError('entity-store', `Entity lookup failed for '${fragment}'`, {
        cause: error
      });
    }

    const candidates = records
      .map(record => this.toCandidate(record, fragment, kind))
      .sort(compareCandidates)
      .slice(0, this.options.maxCandidates);

    logger.debug(`Resolved '${fragment}' (${kind}) to ${candidates.length} candidate(s)`);
    return candidates;
  }

  private toCandidate(record: EntityRecord, fragment: string, kind: EntityKind): Candidate {
    const parsed = record.lastActivity ? Date.parse(record.lastActivity) : NaN;

    return {
      id: record.id,
      displayLabel: record.label,
      relevanceScore: scoreRelevance(record.label, fragment),
      recencyTimestamp: Number.isNaN(parsed) ? null : parsed,
      kind
    };
  }
}

/**
 * Name-match relevance in [0, 1]: exact label, exact word, then substring.
 */
export function scoreRelevance(label: string, fragment: string): number {
  const name = label.toLowerCase().trim();
  const search = fragment.toLowerCase().trim();
  let score = 0.5;

  if (name === search) {
    score += 0.3;
  } else if (name.split(/\s+/).includes(search)) {
    score += 0.25;
  } else if (name.includes(search)) {
    score += 0.15;
  }

  return Math.min(score, 1);
}

export function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.relevanceScore !== b.relevanceScore) {
    return b.relevanceScore - a.relevanceScore;
  }

  const recencyA = a.recencyTimestamp ?? Number.NEGATIVE_INFINITY;
  const recencyB = b.recencyTimestamp ?? Number.NEGATIVE_INFINITY;
  if (recencyA !== recencyB) {
    return recencyB - recencyA;
  }

  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
