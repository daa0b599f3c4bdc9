import type { SearchHit, SearchHitCandidate } from '../types/research.types.js';

/** One settled (repository, query) search call of a round's fan-out. */
export interface FanOutResult {
  round: number;
  queryOrder: number;
  repositoryOrder: number;
  query: string;
  repository: string;
  hits: SearchHitCandidate[];
}

export interface MergeResult {
  merged: SearchHit[];
  newlyAdded: number;
}

export namespace ResultAggregator {
  export const hitKey = (hit: Pick<SearchHitCandidate, 'repository' | 'identifier'>): string => {
    return `${hit.repository}\u0000${hit.identifier}`;
  };

  /**
   * Merges `incoming` after `existing`. First occurrence of a (repository, identifier)
   * pair wins; provenance of later duplicates is dropped.
   */
  export function merge(existing: readonly SearchHit[], incoming: readonly SearchHit[]): MergeResult {
    const seen = new Set(existing.map(hitKey));
    const merged = [...existing];
    let newlyAdded = 0;

    for (const hit of incoming) {
      const key = hitKey(hit);

      if (seen.has(key)) {
        continue;
      }

      seen.add(key);
      merged.push(hit);
      newlyAdded += 1;
    }

    return { merged, newlyAdded };
  }

  /**
   * Orders fan-out results by (round, query issuance order, repository order) and
   * flattens them into provenance-stamped hits. Arrival order never matters.
   */
  export function orderFanOut(results: readonly FanOutResult[]): SearchHit[] {
    return [...results]
      .sort((a, b) => a.round - b.round || a.queryOrder - b.queryOrder || a.repositoryOrder - b.repositoryOrder)
      .flatMap((result) => result.hits.map((hit) => ({
        ...hit,
        repository: hit.repository || result.repository,
        provenance: { round: result.round, query: result.query },
      })));
  }
}
