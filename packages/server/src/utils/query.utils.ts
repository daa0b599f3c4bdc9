import * as z from 'zod';

const FILTER_SYNTAX = /\b(ext|file|path|proj|repo|class|def|field|method|namespace|ref|type):/i;

/** True for plain text; false once the query uses code search filters such as `ext:` or `path:`. */
export const isRawQuery = (query: string): boolean => !FILTER_SYNTAX.test(query);

/** Splits a comma separated query parameter, dropping blanks. */
export const splitList = (value: unknown): string[] => {
  if (typeof value !== 'string') {
    return [];
  }

  return value.split(',').map((item) => item.trim()).filter(Boolean);
};

/** Sampling temperature from the query string; an absent or blank value takes the default. */
export const temperatureParam = (fallback: number) => z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.coerce.number().min(0).max(2).default(fallback),
);
