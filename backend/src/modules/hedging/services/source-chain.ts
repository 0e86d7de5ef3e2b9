/**
 * SOURCE CHAIN — ordered fallthrough over data sources
 *
 * Sources run one after another; the first one that resolves wins. Any throw,
 * validation failure or per-source timeout moves on to the next source. The
 * chain deadline bounds the whole walk: a source that would start after it is
 * recorded as skipped.
 */

import type { Logger } from '../../../common/logger.js';
import { errorMessage } from '../../../common/errors.js';
import type { Domain } from '../contracts/hedging.types.js';

export interface DataSource<T> {
  name: string;
  fetch: (signal: AbortSignal) => Promise<T>;
}

export interface SourceAttempt {
  source: string;
  ok: boolean;
  durationMs: number;
  error?: string;
}

export type SourceChainResult<T> =
  | { ok: true; value: T; source: string; attempts: SourceAttempt[] }
  | { ok: false; attempts: SourceAttempt[] };

export interface SourceChainOptions {
  logger: Logger;
  /** Budget for the whole chain */
  deadlineMs: number;
  /** Aborts the running source and skips the rest */
  signal?: AbortSignal;
}

export class SourceTimeoutError extends Error {
  constructor(source: string, ms: number) {
    super(`${source} exceeded ${ms}ms`);
    this.name = 'SourceTimeoutError';
  }
}

export async function runSourceChain<T>(
  domain: Domain,
  sources: ReadonlyArray<DataSource<T>>,
  options: SourceChainOptions,
): Promise<SourceChainResult<T>> {
  const { logger, deadlineMs, signal } = options;
  const attempts: SourceAttempt[] = [];
  const deadline = Date.now() + deadlineMs;

  for (const source of sources) {
    const remainingMs = deadline - Date.now();

    if (signal?.aborted) {
      attempts.push({ source: source.name, ok: false, durationMs: 0, error: 'CYCLE_ABORTED' });
      continue;
    }
    if (remainingMs <= 0) {
      attempts.push({ source: source.name, ok: false, durationMs: 0, error: 'CHAIN_DEADLINE_EXCEEDED' });
      logger.warn({ domain, source: source.name }, '[SourceChain] deadline reached, source skipped');
      continue;
    }

    const startedAt = Date.now();
    try {
      const value = await runWithTimeout(source, remainingMs, signal);
      const durationMs = Date.now() - startedAt;
      attempts.push({ source: source.name, ok: true, durationMs });
      logger.debug({ domain, source: source.name, durationMs }, '[SourceChain] source succeeded');
      return { ok: true, value, source: source.name, attempts };
    } catch (err) {
      const durationMs = Date.now() - startedAt;
      const error = errorMessage(err);
      attempts.push({ source: source.name, ok: false, durationMs, error });
      logger.warn({ domain, source: source.name, durationMs, error }, '[SourceChain] source failed');
    }
  }

  return { ok: false, attempts };
}

/**
 * Run one source under its own AbortController, linked to the parent signal
 */
async function runWithTimeout<T>(
  source: DataSource<T>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener('abort', onParentAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new SourceTimeoutError(source.name, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([source.fetch(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
