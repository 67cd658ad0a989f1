// src/core/fetch/classify.ts

import { z } from 'zod';
import type { HttpResponse } from '../http/types';
import type { FetchAttemptResult, PageEnvelope } from './types';
import { parseRetryAfter } from '../http/RetryPolicy';
import {
  AuthenticationError,
  AuthorizationError,
  NotFoundError,
  RateLimitError,
  ResponseParseError,
  describeError,
  errorForStatus,
} from '../../utils/errors';
import { isRecord } from '../../utils/guards';

const PaginationSchema = z
  .object({
    nextCursor: z
      .union([z.string(), z.number()])
      .nullish()
      .transform((cursor) => (cursor === null || cursor === undefined ? undefined : String(cursor))),
    totalItems: z.number().nullish(),
  })
  .passthrough();

/**
 * Split a 2xx body into its record sequence and next-page cursor.
 * Accepts `{ data, pagination }`, a bare array, or raw JSON text of either.
 *
 * @throws {ResponseParseError} If the body is not JSON or has an unexpected shape
 */
export function parseEnvelope(body: unknown): PageEnvelope {
  let payload = body;

  if (typeof body === 'string') {
    if (body.trim() === '') {
      return { records: [] };
    }
    try {
      payload = JSON.parse(body);
    } catch (error: unknown) {
      throw new ResponseParseError(`Response is not valid JSON: ${describeError(error)}`);
    }
  }

  if (Array.isArray(payload)) {
    return { records: payload };
  }

  if (!isRecord(payload)) {
    throw new ResponseParseError('Unexpected response body', { type: typeof payload });
  }

  const data = payload.data;
  const records = Array.isArray(data) ? data : data === undefined || data === null ? [] : [data];

  if (payload.pagination === undefined || payload.pagination === null) {
    return { records };
  }

  const pagination = PaginationSchema.safeParse(payload.pagination);
  if (!pagination.success) {
    throw new ResponseParseError('Malformed pagination object', {
      issues: pagination.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
    });
  }

  const { nextCursor, totalItems } = pagination.data;
  return {
    records,
    nextCursor: nextCursor === '' ? undefined : nextCursor,
    totalItems: totalItems ?? undefined,
  };
}

/**
 * Turn one transport response into a FetchAttemptResult
 */
export function classifyResponse(response: HttpResponse, now: number = Date.now()): FetchAttemptResult {
  const { status } = response;

  if (status >= 200 && status < 300) {
    try {
      return { kind: 'success', envelope: parseEnvelope(response.data) };
    } catch (error: unknown) {
      return { kind: 'fatal', reason: describeError(error), status, auth: false };
    }
  }

  const retryAfterMs = status === 429 ? parseRetryAfter(response.headers['retry-after'], now) : undefined;
  const error = errorForStatus(status, undefined, retryAfterMs);

  if (error instanceof AuthenticationError || error instanceof AuthorizationError) {
    return { kind: 'fatal', reason: error.message, status, auth: true };
  }
  if (error instanceof NotFoundError) {
    return { kind: 'not_found', reason: error.message };
  }
  if (error instanceof RateLimitError) {
    return { kind: 'retryable', reason: error.message, status, rateLimited: true, retryAfterMs };
  }
  return { kind: 'retryable', reason: error.message, status, rateLimited: false };
}
