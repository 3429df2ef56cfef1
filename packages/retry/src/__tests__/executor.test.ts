/**
 * Tests for the retry executor and classify predicates
 */

import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import { CheckError, ConfigurationError } from '@backstop/errors';
import { LogLevel, LoggerFactory } from '@backstop/logging';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import {
  ExponentialBackoff,
  RetryConditions,
  RetryExecutor,
  createRetryPolicy,
  execute,
  generate,
  loadRetryConfig,
  retry,
  type RetryState,
  type Sleep,
} from '../index.js';

const LINEAR = { count: 3, firstDelayMs: 10, factor: 2, jitter: 0 } as const;

/**
 * Operation that fails `failures` times before returning `result`
 */
function flaky<T>(
  failures: number,
  result: T,
  makeError = (n: number): Error => new Error(`fail ${n}`)
) {
  let calls = 0;
  return vi.fn(() => {
    calls++;
    if (calls <= failures) {
      throw makeError(calls);
    }
    return result;
  });
}

const recordingSleep = () => vi.fn(async (_ms: number) => undefined);

describe('RetryExecutor', () => {
  let sleep: ReturnType<typeof recordingSleep>;

  beforeEach(() => {
    sleep = recordingSleep();
  });

  it('should return the result after k failures with k + 1 calls', async () => {
    const operation = flaky(2, 'ok');

    const result = await execute(operation, { delays: LINEAR, sleep });

    expect(result).toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[10], [20]]);
  });

  it('should make n + 1 calls then propagate the last error', async () => {
    const operation = flaky(Infinity, 'never');

    await expect(execute(operation, { delays: LINEAR, sleep })).rejects.toThrow('fail 4');
    expect(operation).toHaveBeenCalledTimes(4);
    expect(sleep).toHaveBeenCalledTimes(3);
  });

  it('should call once when classify declines', async () => {
    const operation = flaky(Infinity, 'never');

    await expect(
      execute(operation, { delays: LINEAR, classify: RetryConditions.never(), sleep })
    ).rejects.toThrow('fail 1');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should call once with an empty schedule', async () => {
    const operation = flaky(Infinity, 'never');

    await expect(execute(operation, { delays: [], sleep })).rejects.toThrow('fail 1');
    await expect(execute(operation, { delays: { count: 0 }, sleep })).rejects.toThrow('fail 2');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('should wait for each delay of an explicit sequence', async () => {
    const operation = flaky(2, 'done');

    await execute(operation, { delays: [5, 7], sleep });

    expect(sleep.mock.calls).toEqual([[5], [7]]);
  });

  it('should accept async operations', async () => {
    let calls = 0;
    const operation = async () => {
      calls++;
      if (calls === 1) {
        throw new Error('first');
      }
      return calls;
    };

    expect(await execute(operation, { delays: [1], sleep })).toBe(2);
  });

  it('should propagate the substituted error when classify declines', async () => {
    const mapped = new CheckError('not transient');
    const operation = flaky(Infinity, 'never');

    await expect(
      execute(operation, {
        delays: LINEAR,
        classify: () => ({ retry: false, error: mapped }),
        sleep,
      })
    ).rejects.toBe(mapped);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should propagate the substituted error when the schedule runs out', async () => {
    const operation = flaky(Infinity, 'never');
    const classify = vi.fn(
      RetryConditions.reclassify((_error, state) => new CheckError(`attempt ${state.attempt}`))
    );

    await expect(
      execute(operation, { delays: { count: 2, jitter: 0 }, classify, sleep })
    ).rejects.toThrow('attempt 3');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(classify).toHaveBeenCalledTimes(3);
  });

  it('should pass attempt numbers and upcoming delays to classify', async () => {
    const states: RetryState[] = [];
    const operation = flaky(Infinity, 'never');

    await expect(
      execute(operation, {
        delays: [5, 6],
        classify: state => {
          states.push(state);
          return true;
        },
        sleep,
      })
    ).rejects.toThrow('fail 3');

    expect(states.map(state => [state.attempt, state.nextDelayMs])).toEqual([
      [1, 5],
      [2, 6],
      [3, undefined],
    ]);
  });

  it('should pass arguments through to the operation', async () => {
    const add = vi.fn((a: number, b: number) => a + b);

    expect(await execute(add, { delays: [] }, 2, 3)).toBe(5);
    expect(await retry(add, { delays: [] })(4, 5)).toBe(9);
    expect(add.mock.calls).toEqual([
      [2, 3],
      [4, 5],
    ]);
  });

  it('should wrap operations for repeated use', async () => {
    const executor = new RetryExecutor({ delays: [1], sleep });
    const double = executor.wrap((n: number) => n * 2);

    expect(await double(21)).toBe(42);
    expect(await double(4)).toBe(8);
  });

  it('should restart the backoff on every call of a wrapped function', async () => {
    const operation = flaky(Infinity, 'never');
    const wrapped = retry(operation, {
      delays: new ExponentialBackoff({ count: 2, firstDelayMs: 10, jitter: 0 }),
      sleep,
    });

    await expect(wrapped()).rejects.toThrow('fail 3');
    await expect(wrapped()).rejects.toThrow('fail 6');
    expect(operation).toHaveBeenCalledTimes(6);
    expect(sleep.mock.calls).toEqual([[10], [50], [10], [50]]);
  });

  it('should call a schedule factory once per execution', async () => {
    const operation = flaky(Infinity, 'never');
    const makeDelays = vi.fn(() => generate({ count: 2, firstDelayMs: 10, jitter: 0 }));
    const wrapped = retry(operation, { delays: makeDelays, sleep });

    await expect(wrapped()).rejects.toThrow('fail 3');
    await expect(wrapped()).rejects.toThrow('fail 6');
    expect(makeDelays).toHaveBeenCalledTimes(2);
    expect(operation).toHaveBeenCalledTimes(6);
  });

  it('should reject one-shot iterators as a schedule', () => {
    const operation = flaky(Infinity, 'never');
    let caught: unknown;
    try {
      retry(operation, { delays: generate({ count: 2 }), sleep });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught instanceof ConfigurationError && caught.code).toBe('ONE_SHOT_SCHEDULE');
    expect(() => new RetryExecutor({ delays: [5, 6].values() })).toThrow(ConfigurationError);
    expect(operation).not.toHaveBeenCalled();
  });

  it('should call onRetry before each wait', async () => {
    const onRetry = vi.fn();
    const failure = new Error('fail 1');

    await execute(
      flaky(1, 'ok', () => failure),
      { delays: [9], sleep, onRetry }
    );

    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry).toHaveBeenCalledWith(
      { attempt: 1, nextDelayMs: 9, elapsedMs: expect.any(Number) },
      failure
    );
  });

  it('should log retried failures and the final one', async () => {
    const { logger, transport } = LoggerFactory.createMemoryLogger('retry');

    await expect(
      execute(flaky(Infinity, 'never'), { delays: [10], logger, sleep })
    ).rejects.toThrow('fail 2');

    expect(transport.getMessages()).toEqual([
      'DEBUG Attempt 1 failed, retrying in 10ms',
      'WARN Giving up after 2 attempt(s)',
    ]);
    expect(transport.getEntries(LogLevel.WARN)[0]?.data).toMatchObject({
      reason: 'schedule_exhausted',
      error: { name: 'Error', message: 'fail 2' },
    });
  });

  it('should log non-retryable failures', async () => {
    const { logger, transport } = LoggerFactory.createMemoryLogger('retry');

    await expect(
      execute(flaky(Infinity, 'never'), { classify: RetryConditions.never(), logger, sleep })
    ).rejects.toThrow('fail 1');

    expect(transport.getEntries(LogLevel.WARN)[0]?.data).toMatchObject({
      reason: 'not_retryable',
    });
  });

  it('should reject an invalid backoff spec at construction', () => {
    expect(() => new RetryExecutor({ delays: { count: -1 } })).toThrow(ConfigurationError);
  });

  it('should wait with real timers by default', async () => {
    const operation = flaky(1, 'ok');

    expect(await execute(operation, { delays: [1] })).toBe('ok');
    expect(operation).toHaveBeenCalledTimes(2);
  });
});

describe('RetryConditions', () => {
  let sleep: Sleep;

  beforeEach(() => {
    sleep = async () => undefined;
  });

  it('should retry only matching error classes', async () => {
    const transient = flaky(1, 'ok', () => new TypeError('transient'));
    const fatal = flaky(1, 'ok', () => new RangeError('fatal'));
    const policy = { delays: [1], classify: RetryConditions.whenInstanceOf(TypeError), sleep };

    expect(await execute(transient, policy)).toBe('ok');
    await expect(execute(fatal, policy)).rejects.toThrow('fatal');
  });

  it('should retry only matching messages', async () => {
    const classify = RetryConditions.matchingMessage(/timeout/);

    const timeout = flaky(1, 'ok', () => new Error('read timeout'));

    expect(await execute(timeout, { delays: [1], classify, sleep })).toBe('ok');
    await expect(
      execute(flaky(1, 'ok', () => new Error('refused')), { delays: [1], classify, sleep })
    ).rejects.toThrow('refused');
  });

  it('should match exact message strings and ignore non-errors', () => {
    const classify = RetryConditions.matchingMessage('busy');
    const state = { attempt: 1, nextDelayMs: 1, elapsedMs: 0 };

    expect(classify(state, new Error('busy'))).toBe(true);
    expect(classify(state, new Error('busy now'))).toBe(false);
    expect(classify(state, 'busy')).toBe(false);
  });

  it('should stop after a maximum number of attempts', async () => {
    const operation = flaky(Infinity, 'never');

    await expect(
      execute(operation, {
        delays: { count: 10 },
        classify: RetryConditions.maxAttempts(2),
        sleep,
      })
    ).rejects.toThrow('fail 2');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('should decide with a custom predicate', async () => {
    const classify = RetryConditions.when((_error, state) => state.attempt === 1);
    const operation = flaky(Infinity, 'never');

    await expect(execute(operation, { delays: [1, 1, 1], classify, sleep })).rejects.toThrow(
      'fail 2'
    );
  });

  it('should keep the base decision when reclassifying', () => {
    const classify = RetryConditions.reclassify(
      error => new CheckError(String(error)),
      RetryConditions.never()
    );
    const decision = classify({ attempt: 1, nextDelayMs: 1, elapsedMs: 0 }, 'boom');

    expect(decision).toEqual({ retry: false, error: new CheckError('boom') });
  });
});

describe('Retry configuration', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'backstop-retry-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should load a retry configuration file into a policy', async () => {
    const configPath = join(dir, 'retry.yaml');
    await fs.writeFile(
      configPath,
      [
        'backoff:',
        '  count: 2',
        '  first_delay: 10ms',
        '  max_delay: infinity',
        '  factor: 3',
        '  jitter: 0',
        'logging:',
        '  level: DEBUG',
        '',
      ].join('\n')
    );

    const config = await loadRetryConfig(configPath);
    const sleep = recordingSleep();
    const policy = createRetryPolicy(config, { sleep });

    expect(config.backoff).toEqual({
      count: 2,
      first_delay: 10,
      max_delay: Infinity,
      factor: 3,
      jitter: 0,
    });
    expect(policy.logger?.getLevel()).toBe(LogLevel.DEBUG);
    expect(policy.logger?.getComponent()).toBe('retry');
    expect(policy.delays).toBeInstanceOf(ExponentialBackoff);
    if (policy.delays instanceof ExponentialBackoff) {
      expect(policy.delays.toArray()).toEqual([10, 30]);
    }
    expect(policy.sleep).toBe(sleep);
  });

  it('should default every backoff field', async () => {
    const configPath = join(dir, 'empty.yaml');
    await fs.writeFile(configPath, '{}\n');

    const config = await loadRetryConfig(configPath);
    const policy = createRetryPolicy(config);

    expect(config.logging).toBeUndefined();
    expect(policy.logger).toBeUndefined();
    expect(config.backoff).toEqual({
      count: 1,
      first_delay: 50,
      max_delay: 10_000,
      factor: 5,
      jitter: 0.1,
    });
  });
});
