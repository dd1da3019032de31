import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  createPipeline,
  dedupeLocators,
  runHarvest,
  summarizeReport,
  type HarvestOptions,
} from '../orchestrator.js';
import { TokenBucketRateLimiter } from '../rateLimiter.js';
import { RetryingFetcher } from '../retry.js';
import { CommentSink } from '../sink.js';
import { YouTubeCommentSource } from '../youtube.js';
import type {
  CommentRecord,
  CommentSource,
  ListCommentsRequest,
  PermitGate,
  TaskFailure,
  TaskOutcome,
} from '../types.js';
import { ConfigSchema } from '../../shared/config.js';
import { InputError, RemoteError } from '../../shared/errors.js';

const ALICE_AND_BOB: CommentRecord[] = [
  { authorDisplayName: 'Alice', text: 'hi' },
  { authorDisplayName: 'Bob', text: 'nice video' },
];

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'harvest-run-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function stubSource(list: (request: ListCommentsRequest) => Promise<CommentRecord[]>) {
  const mock = vi.fn(list);
  const source: CommentSource = { name: 'stub', list: mock };
  return { source, list: mock };
}

function countingGate(): PermitGate & { calls: number } {
  return {
    calls: 0,
    async acquire() {
      this.calls++;
    },
  };
}

function baseOptions(source: CommentSource, overrides: Partial<HarvestOptions> = {}): HarvestOptions {
  return {
    source,
    sink: new CommentSink({ outputDir: tmpDir }),
    limiter: new TokenBucketRateLimiter({ capacity: 10, intervalMs: 1 }),
    fetcher: new RetryingFetcher({ initialIntervalMs: 1, randomizationFactor: 0, maxAttempts: 3 }),
    maxResults: 2,
    apiKey: 'test-key',
    ...overrides,
  };
}

function outputFile(videoId: string): string {
  return path.join(tmpDir, `comments_${videoId}.txt`);
}

describe('runHarvest', () => {
  it('writes fetched comments for a video', async () => {
    const { source, list } = stubSource(async () => ALICE_AND_BOB);

    const report = await runHarvest(['https://www.youtube.com/watch?v=abc123'], baseOptions(source));

    expect(fs.readFileSync(outputFile('abc123'), 'utf-8')).toBe(
      'Comment from Alice: hi\nComment from Bob: nice video\n',
    );
    expect(list).toHaveBeenCalledTimes(1);
    expect(list.mock.calls[0]?.[0]).toMatchObject({ videoId: 'abc123', maxResults: 2, apiKey: 'test-key' });
    expect(report.tasks).toEqual([
      {
        locator: 'https://www.youtube.com/watch?v=abc123',
        videoId: 'abc123',
        status: 'succeeded',
        attempts: 1,
        commentsWritten: 2,
        outputPath: outputFile('abc123'),
      },
    ]);
    expect(report.succeeded).toBe(1);
    expect(report.commentsWritten).toBe(2);
  });

  it('appends to a file left by an earlier run', async () => {
    fs.writeFileSync(outputFile('abc123'), 'Comment from Carol: older\n');
    const { source } = stubSource(async () => ALICE_AND_BOB);

    await runHarvest(['https://www.youtube.com/watch?v=abc123'], baseOptions(source));

    expect(fs.readFileSync(outputFile('abc123'), 'utf-8')).toBe(
      'Comment from Carol: older\nComment from Alice: hi\nComment from Bob: nice video\n',
    );
  });

  it('completes every task when one of them exhausts its retries', async () => {
    const { source, list } = stubSource(async ({ videoId }) => {
      if (videoId === 'failing') throw new RemoteError('quota exceeded');
      return ALICE_AND_BOB;
    });
    const failures: TaskFailure[] = [];
    const successes: TaskOutcome[] = [];

    const report = await runHarvest(
      ['https://youtu.be/failing', 'https://youtu.be/working'],
      baseOptions(source, { onFailure: (f) => failures.push(f), onSuccess: (o) => successes.push(o) }),
    );

    expect(report.succeeded).toBe(1);
    expect(report.failed).toBe(1);
    expect(report.cancelled).toBe(0);

    const [failed, ok] = report.tasks;
    expect(failed).toMatchObject({ videoId: 'failing', status: 'exhausted', attempts: 3, error: 'quota exceeded' });
    expect(ok).toMatchObject({ videoId: 'working', status: 'succeeded', attempts: 1 });

    expect(fs.existsSync(outputFile('failing'))).toBe(false);
    expect(fs.readFileSync(outputFile('working'), 'utf-8')).toBe(
      'Comment from Alice: hi\nComment from Bob: nice video\n',
    );

    expect(failures).toHaveLength(1);
    expect(failures[0]?.locator).toBe('https://youtu.be/failing');
    expect(failures[0]?.error).toBeInstanceOf(RemoteError);
    expect(successes).toEqual([
      {
        locator: 'https://youtu.be/working',
        videoId: 'working',
        status: 'succeeded',
        attempts: 1,
        commentsWritten: 2,
        outputPath: outputFile('working'),
      },
    ]);
    expect(list).toHaveBeenCalledTimes(4);
  });

  it('takes a fresh permit for every attempt', async () => {
    const gate = countingGate();
    let calls = 0;
    const { source } = stubSource(async () => {
      calls++;
      if (calls < 3) throw new RemoteError('flaky');
      return ALICE_AND_BOB;
    });

    const report = await runHarvest(['abc123'], baseOptions(source, { limiter: gate }));

    expect(report.tasks[0]?.attempts).toBe(3);
    expect(gate.calls).toBe(3);
  });

  it('does not write duplicate lines when a retry follows a failed fetch', async () => {
    let calls = 0;
    const { source } = stubSource(async () => {
      calls++;
      if (calls === 1) throw new RemoteError('reset by peer');
      return ALICE_AND_BOB;
    });

    await runHarvest(['abc123'], baseOptions(source));

    expect(fs.readFileSync(outputFile('abc123'), 'utf-8')).toBe(
      'Comment from Alice: hi\nComment from Bob: nice video\n',
    );
  });

  it('retries malformed locators like any other failure by default', async () => {
    const gate = countingGate();
    const { source, list } = stubSource(async () => ALICE_AND_BOB);

    const report = await runHarvest(['not a url'], baseOptions(source, { limiter: gate }));

    expect(report.tasks[0]).toMatchObject({
      status: 'exhausted',
      attempts: 3,
      error: 'Invalid video URL: not a url',
    });
    expect(gate.calls).toBe(0);
    expect(list).not.toHaveBeenCalled();
  });

  it('fails malformed locators on the first attempt with failFastOnInputError', async () => {
    const { source } = stubSource(async () => ALICE_AND_BOB);
    const failures: TaskFailure[] = [];

    const report = await runHarvest(
      ['https://www.youtube.com/watch', 'abc123'],
      baseOptions(source, { failFastOnInputError: true, onFailure: (f) => failures.push(f) }),
    );

    expect(report.tasks[0]).toMatchObject({ status: 'exhausted', attempts: 1 });
    expect(report.tasks[1]).toMatchObject({ status: 'succeeded' });
    expect(failures[0]?.error).toBeInstanceOf(InputError);
  });

  it('cancels a task sleeping in backoff without holding up the run', async () => {
    const controller = new AbortController();
    const { source } = stubSource(async ({ videoId }) => {
      if (videoId === 'sleepy') {
        setTimeout(() => controller.abort(), 20);
        throw new RemoteError('unavailable');
      }
      return ALICE_AND_BOB;
    });

    const started = Date.now();
    const report = await runHarvest(
      ['sleepy', 'quick'],
      baseOptions(source, {
        signal: controller.signal,
        fetcher: new RetryingFetcher({ initialIntervalMs: 60_000, randomizationFactor: 0, maxAttempts: 0 }),
      }),
    );

    expect(Date.now() - started).toBeLessThan(5000);
    expect(report.tasks[0]).toMatchObject({ videoId: 'sleepy', status: 'cancelled', attempts: 1 });
    expect(report.tasks[1]).toMatchObject({ videoId: 'quick', status: 'succeeded' });
    expect(report.cancelled).toBe(1);
    expect(report.failed).toBe(0);
  });

  it('reports tasks still waiting for a permit as cancelled', async () => {
    const controller = new AbortController();
    const { source, list } = stubSource(async () => ALICE_AND_BOB);
    const limiter = new TokenBucketRateLimiter({ capacity: 1, intervalMs: 60_000 });
    setTimeout(() => controller.abort(), 20);

    const report = await runHarvest(['first', 'second'], baseOptions(source, { limiter, signal: controller.signal }));

    expect(report.tasks.map((t) => t.status)).toEqual(['succeeded', 'cancelled']);
    expect(list).toHaveBeenCalledTimes(1);
  });

  it('keeps running when a listener throws', async () => {
    const { source } = stubSource(async () => {
      throw new RemoteError('down');
    });

    const report = await runHarvest(
      ['abc123'],
      baseOptions(source, {
        onFailure: () => {
          throw new Error('listener bug');
        },
      }),
    );

    expect(report.failed).toBe(1);
  });

  it('runs every duplicate by default and drops them with dedupe', async () => {
    const { source, list } = stubSource(async () => ALICE_AND_BOB);
    const locators = ['https://www.youtube.com/watch?v=dup1', 'https://youtu.be/dup1'];

    const all = await runHarvest(locators, baseOptions(source));
    expect(all.tasks).toHaveLength(2);
    expect(fs.readFileSync(outputFile('dup1'), 'utf-8').split('\n').filter(Boolean)).toHaveLength(4);

    list.mockClear();
    const deduped = await runHarvest(locators, baseOptions(source, { dedupe: true }));
    expect(deduped.tasks).toHaveLength(1);
    expect(list).toHaveBeenCalledTimes(1);
  });

  it('rejects a maxResults that is not a positive integer', async () => {
    const { source, list } = stubSource(async () => ALICE_AND_BOB);

    await expect(runHarvest(['abc123'], baseOptions(source, { maxResults: 0 }))).rejects.toBeInstanceOf(InputError);
    await expect(runHarvest(['abc123'], baseOptions(source, { maxResults: 2.5 }))).rejects.toBeInstanceOf(InputError);
    expect(list).not.toHaveBeenCalled();
  });

  it('returns an empty report for no locators', async () => {
    const { source } = stubSource(async () => ALICE_AND_BOB);
    const report = await runHarvest([], baseOptions(source));

    expect(report.tasks).toEqual([]);
    expect(report.succeeded).toBe(0);
  });
});

describe('dedupeLocators', () => {
  it('keeps the first locator per video id and every unparseable one', () => {
    expect(
      dedupeLocators([
        'https://www.youtube.com/watch?v=one',
        'one',
        'https://youtu.be/two',
        'bad locator',
        'bad locator',
      ]),
    ).toEqual(['https://www.youtube.com/watch?v=one', 'https://youtu.be/two', 'bad locator']);
  });
});

describe('createPipeline', () => {
  it('builds components from config', () => {
    const config = ConfigSchema.parse({
      rate_limit: { capacity: 4, interval_ms: 250 },
      retry: { max_attempts: 7, initial_interval_ms: 50 },
      output: { dir: tmpDir, file_prefix: 'yt' },
    });

    const pipeline = createPipeline(config);

    expect(pipeline.source).toBeInstanceOf(YouTubeCommentSource);
    expect(pipeline.limiter).toBeInstanceOf(TokenBucketRateLimiter);
    if (pipeline.limiter instanceof TokenBucketRateLimiter) {
      expect(pipeline.limiter.capacity).toBe(4);
      expect(pipeline.limiter.intervalMs).toBe(250);
    }
    expect(pipeline.fetcher.policy.maxAttempts).toBe(7);
    expect(pipeline.fetcher.policy.initialIntervalMs).toBe(50);
    expect(pipeline.fetcher.policy.multiplier).toBe(1.5);
    expect(pipeline.sink.targetPath('abc')).toBe(path.join(tmpDir, 'yt_abc.txt'));
  });
});

describe('summarizeReport', () => {
  it('prints one line per task and a total', () => {
    const lines = summarizeReport({
      tasks: [
        {
          locator: 'https://youtu.be/abc123',
          videoId: 'abc123',
          status: 'succeeded',
          attempts: 1,
          commentsWritten: 2,
          outputPath: '/out/comments_abc123.txt',
        },
        { locator: 'bad', status: 'exhausted', attempts: 3, commentsWritten: 0, error: 'Invalid video URL: bad' },
        { locator: 'later', status: 'cancelled', attempts: 0, commentsWritten: 0 },
      ],
      succeeded: 1,
      failed: 1,
      cancelled: 1,
      commentsWritten: 2,
      durationMs: 42,
    });

    expect(lines).toEqual([
      '✓ abc123: 2 comments → /out/comments_abc123.txt',
      '✗ bad: Invalid video URL: bad (after 3 attempts)',
      '- later: cancelled',
      '1 succeeded, 1 failed, 1 cancelled, 2 comments written in 42ms',
    ]);
  });
});
