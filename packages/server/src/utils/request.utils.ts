import type { RPCApiResult } from '@codescout/httpkit';
import { RequestValidationError, toResearchError } from '@codescout/research';
import type { ZodTypeAny, z } from 'zod';

/** Parses a body or query against its schema; failures read `field: message; ...`. */
export function parseRequest<S extends ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const parsed = schema.safeParse(value);

  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      .join('; ');
    throw new RequestValidationError(`Invalid request (${reason})`);
  }

  return parsed.data;
}

/** `{status: "error", error}` with the status carried by the error. */
export function errorResult(error: unknown): RPCApiResult {
  const failure = toResearchError(error);
  return { status: failure.status, body: { status: 'error', error: failure.message, code: failure.code } };
}
