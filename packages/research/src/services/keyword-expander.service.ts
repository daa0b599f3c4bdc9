import { DEFAULT_KEYWORD_LIMIT } from '../types/research.types.js';
import type { Finding } from '../types/research.types.js';

export interface KeywordExpanderOptions {
  limit?: number;
  maxTermLength?: number;
}

const DEFAULT_MAX_TERM_LENGTH = 80;
const BACKTICK_TERM = /`([^`\n]+)`/g;
const QUOTED_TERM = /"([^"\n]+)"/g;
const WRAPPING = /^[\s`'"]+|[\s`'"]+$/g;

export const normalizeQuery = (value: string): string => value.replace(WRAPPING, '').replace(/\s+/g, ' ').trim();

export const queryKey = (value: string): string => normalizeQuery(value).toLowerCase();

/**
 * Derives follow-up queries from a round's Finding. A structured finding contributes
 * only its unresolved terms. Free-text output is mined instead: backticked identifiers,
 * then quoted phrases, in the order the model wrote them.
 */
export class KeywordExpander {
  private readonly limit: number;
  private readonly maxTermLength: number;

  constructor(options: KeywordExpanderOptions = {}) {
    this.limit = Math.max(0, options.limit ?? DEFAULT_KEYWORD_LIMIT);
    this.maxTermLength = options.maxTermLength ?? DEFAULT_MAX_TERM_LENGTH;
  }

  get keywordLimit(): number {
    return this.limit;
  }

  expand(finding: Finding, alreadyIssued: Iterable<string>): string[] {
    const blocked = new Set<string>();

    for (const issued of alreadyIssued) {
      blocked.add(queryKey(issued));
    }

    const accepted: string[] = [];

    for (const candidate of this.candidates(finding)) {
      if (accepted.length >= this.limit) {
        break;
      }

      const term = normalizeQuery(candidate);
      const key = term.toLowerCase();

      if (!term || term.length > this.maxTermLength || blocked.has(key)) {
        continue;
      }

      blocked.add(key);
      accepted.push(term);
    }

    return accepted;
  }

  private *candidates(finding: Finding): Generator<string> {
    yield* finding.suggestedQueries;

    if (finding.structured) {
      return;
    }

    for (const match of finding.text.matchAll(BACKTICK_TERM)) {
      yield match[1] ?? '';
    }

    for (const match of finding.text.matchAll(QUOTED_TERM)) {
      yield match[1] ?? '';
    }
  }
}
