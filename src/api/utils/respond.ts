import type { Context } from 'hono';
import { ZodError } from 'zod';
import { isStrategyError, type ErrorKind } from '../../domain/errors';
import { stringifyWithBigInt, logger } from '../../utils/logger';

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  authorization: 403,
  validation: 400,
  slippage: 422,
  proportionality: 422,
  'external-call': 502,
  oracle: 503,
  configuration: 500,
};

// Pretty-print JSON when `?pretty=1` or `x-pretty: 1` is supplied. Bigints are sent as decimal strings.
export function jsonRespond(c: Context, data: unknown, status = 200): Response {
  const pretty = c.req.query('pretty') ?? c.req.header('x-pretty');
  const body = stringifyWithBigInt(data, pretty ? 2 : undefined);
  return new Response(body, { status, headers: { 'content-type': 'application/json; charset=utf-8' } });
}

export function respondError(c: Context, err: unknown): Response {
  if (isStrategyError(err)) {
    return jsonRespond(
      c,
      { error: { kind: err.kind, code: err.code, message: err.message, details: err.details } },
      STATUS_BY_KIND[err.kind],
    );
  }
  if (err instanceof ZodError) {
    const details = Object.fromEntries(err.issues.map((i) => [i.path.join('.') || '(body)', i.message]));
    return jsonRespond(c, { error: { kind: 'validation', code: 'InvalidRequest', message: 'Invalid request body', details } }, 400);
  }
  if (err instanceof SyntaxError) {
    return jsonRespond(c, { error: { kind: 'validation', code: 'InvalidJson', message: err.message, details: {} } }, 400);
  }
  const message = err instanceof Error ? err.message : String(err);
  logger.error(`unhandled error on ${c.req.method} ${c.req.path}: ${message}`);
  return jsonRespond(c, { error: { kind: 'internal', code: 'InternalError', message, details: {} } }, 500);
}
