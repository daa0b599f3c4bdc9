import { z } from 'zod';

import type { ChatMessage, Finding, SearchHit, SearchHitCandidate } from '../types/research.types.js';
import type { CompletionResponseFormat } from '../types/gateway.types.js';

const MAX_SNIPPET_LENGTH = 20_000;
const MAX_CONTEXT_LENGTH = 400_000;

const RESEARCH_SYSTEM_PROMPT = `You answer questions about source code using the repository context you are given.

1. Answer first. Give a complete, logical and concise answer to the question.
2. Only list a term as unresolved when the context does not define it and resolving it would improve the answer.
   Do not list general-purpose words, vague concepts or terms already explained earlier in the conversation.
3. Keep unresolved terms short and specific (ideally four words or fewer), such as a class, table or function name.

Return ONLY valid JSON with shape {"answer": "...", "unresolved": ["..."]}.`;

export const DEFAULT_SEARCH_PROMPT = 'This document provides a brief overview of the key points. It avoids excessive detail and focuses on clarity and conciseness based on context, without exceeding the 1000-token limit. It serves as a quick reference or starting point for deeper exploration if needed.';

export const FINDING_RESPONSE_FORMAT: CompletionResponseFormat = {
  type: 'json_schema',
  name: 'ResearchFinding',
  schema: {
    type: 'object',
    properties: {
      answer: { type: 'string' },
      unresolved: { type: 'array', items: { type: 'string' } },
    },
    required: ['answer', 'unresolved'],
    additionalProperties: false,
  },
};

const findingSchema = z.object({
  answer: z.string(),
  unresolved: z.array(z.string()).default([]),
});

export namespace PromptBuilder {
  /** Renders hits as the code context block handed to the model. */
  export function formatContext(hits: readonly SearchHitCandidate[], maxLength = MAX_CONTEXT_LENGTH): string {
    if (hits.length === 0) {
      return '';
    }

    const blocks = hits.map((hit) => {
      const snippet = hit.snippet.length > MAX_SNIPPET_LENGTH
        ? `${hit.snippet.slice(0, MAX_SNIPPET_LENGTH)}\n... (trimmed)`
        : hit.snippet;
      return `File: ${hit.repository}/${hit.identifier}\n\`\`\`\n${snippet}\n\`\`\``;
    });

    const joined = `Context from codebase:\n\n${blocks.join('\n\n')}`;
    return joined.length > maxLength ? `${joined.slice(0, maxLength)}\n... (trimmed)` : joined;
  }

  export function roundMessages(param: {
    query: string;
    round: number;
    hits: readonly SearchHit[];
    findings: readonly Finding[];
    history?: readonly ChatMessage[];
    customPrompt?: string;
  }): ChatMessage[] {
    const { query, round, hits, findings, history = [], customPrompt } = param;
    const system = customPrompt ? `${customPrompt}\n\n${RESEARCH_SYSTEM_PROMPT}` : RESEARCH_SYSTEM_PROMPT;
    const prior = findings.map((finding) => ({
      role: 'assistant' as const,
      content: `Research round ${finding.round} findings: ${finding.text}`,
    }));
    const context = formatContext(hits);

    return [
      { role: 'system', content: system },
      ...history.filter((message) => message.role !== 'system'),
      ...prior,
      {
        role: 'user',
        content: `Research round ${round}. Question: ${query}\n\n${context || 'No new repository content was found in this round.'}`,
      },
    ];
  }

  export function finalMessages(param: {
    query: string;
    hits: readonly SearchHit[];
    findings: readonly Finding[];
    history?: readonly ChatMessage[];
    customPrompt?: string;
  }): ChatMessage[] {
    const { query, hits, findings, history = [], customPrompt } = param;
    const gathered = findings
      .map((finding) => `--- Findings from round ${finding.round} ---\n${finding.text}`)
      .join('\n\n');
    const prompt = `Based on the research gathered across ${findings.length} round(s):

Original question: ${query}

Findings:
${gathered || '(none)'}

${formatContext(hits)}

Provide a comprehensive, well-structured answer to the original question that integrates all of the information gathered.`;

    return [
      ...(customPrompt ? [{ role: 'system' as const, content: customPrompt }] : []),
      ...history,
      { role: 'user', content: prompt },
    ];
  }

  export function searchMessages(context: string, customPrompt?: string | null): ChatMessage[] {
    return [
      { role: 'system', content: customPrompt || DEFAULT_SEARCH_PROMPT },
      { role: 'user', content: context },
    ];
  }

  export function scopeMessages(query: string, context: string, customPrompt?: string | null): ChatMessage[] {
    return [
      ...(customPrompt ? [{ role: 'system' as const, content: customPrompt }] : []),
      {
        role: 'user',
        content: `Please analyze the following code search results for '${query}':\n\n${context}`,
      },
    ];
  }

  /**
   * Parses a synthesis completion. Non-JSON output is kept as plain answer text, marked
   * unstructured so the keyword expander mines it for terms.
   */
  export function parseFinding(raw: string, round: number, hits: readonly SearchHit[]): Finding {
    const references = hits.map((hit) => `${hit.repository}/${hit.identifier}`);
    let payload: unknown;

    try {
      payload = JSON.parse(raw);
    }
    catch {
      return { round, text: raw.trim(), references, suggestedQueries: [], structured: false };
    }

    const parsed = findingSchema.safeParse(payload);

    if (!parsed.success) {
      return { round, text: raw.trim(), references, suggestedQueries: [], structured: false };
    }

    return {
      round,
      text: parsed.data.answer.trim(),
      references,
      suggestedQueries: parsed.data.unresolved,
      structured: true,
    };
  }
}
