import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { runSourceChain, type DataSource } from '../services/source-chain.js';
import { createMockLogger } from './fixtures.js';

function okSource(name: string, value: number): DataSource<number> {
  return { name, fetch: vi.fn(async () => value) };
}

function failingSource(name: string, message: string): DataSource<number> {
  return {
    name,
    fetch: vi.fn(async () => {
      throw new Error(message);
    }),
  };
}

describe('runSourceChain', () => {
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    logger = createMockLogger();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should return the first source that succeeds and not call the rest', async () => {
    const second = okSource('b', 2);
    const result = await runSourceChain('fuel', [okSource('a', 1), second], { logger, deadlineMs: 1000 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toBe(1);
    expect(result.source).toBe('a');
    expect(result.attempts).toHaveLength(1);
    expect(second.fetch).not.toHaveBeenCalled();
  });

  it('should fall through in order and record each failure', async () => {
    const result = await runSourceChain('currency', [failingSource('a', 'boom'), okSource('b', 2)], {
      logger,
      deadlineMs: 1000,
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.source).toBe('b');
    expect(result.attempts.map((a) => [a.source, a.ok, a.error])).toEqual([
      ['a', false, 'boom'],
      ['b', true, undefined],
    ]);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ domain: 'currency', source: 'a', error: 'boom' }),
      '[SourceChain] source failed',
    );
  });

  it('should report exhaustion with every attempt', async () => {
    const result = await runSourceChain('fuel', [failingSource('a', 'x'), failingSource('b', 'y')], {
      logger,
      deadlineMs: 1000,
    });

    expect(result.ok).toBe(false);
    expect(result.attempts.map((a) => a.error)).toEqual(['x', 'y']);
  });

  it('should abort a source at the deadline and skip the sources after it', async () => {
    vi.useFakeTimers();
    let seen: AbortSignal | undefined;
    const hanging: DataSource<number> = {
      name: 'slow',
      fetch: (signal) => {
        seen = signal;
        return new Promise<number>(() => undefined);
      },
    };
    const next = okSource('next', 2);

    const pending = runSourceChain('fuel', [hanging, next], { logger, deadlineMs: 50 });
    await vi.advanceTimersByTimeAsync(50);
    const result = await pending;

    expect(result.ok).toBe(false);
    expect(result.attempts.map((a) => [a.source, a.error])).toEqual([
      ['slow', 'slow exceeded 50ms'],
      ['next', 'CHAIN_DEADLINE_EXCEEDED'],
    ]);
    expect(seen?.aborted).toBe(true);
    expect(next.fetch).not.toHaveBeenCalled();
  });

  it('should skip every source once the parent signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const first = okSource('a', 1);

    const result = await runSourceChain('fuel', [first], {
      logger,
      deadlineMs: 1000,
      signal: controller.signal,
    });

    expect(result.ok).toBe(false);
    expect(result.attempts).toEqual([{ source: 'a', ok: false, durationMs: 0, error: 'CYCLE_ABORTED' }]);
    expect(first.fetch).not.toHaveBeenCalled();
  });
});
