import type { Config } from '../shared/config.js';
import type {
  CommentSource,
  FetchReport,
  PermitGate,
  TaskFailure,
  TaskOutcome,
} from './types.js';
import { TokenBucketRateLimiter } from './rateLimiter.js';
import { RetryingFetcher } from './retry.js';
import { CommentSink, withSink } from './sink.js';
import { YouTubeCommentSource } from './youtube.js';
import { parseVideoId } from './videoId.js';
import { CancelledError, InputError, PermanentError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface HarvestPipeline {
  source: CommentSource;
  sink: CommentSink;
  limiter: PermitGate;
  fetcher: RetryingFetcher;
}

export interface HarvestOptions extends HarvestPipeline {
  maxResults: number;
  apiKey: string;
  signal?: AbortSignal;
  /** Treat malformed locators as terminal instead of retrying them. */
  failFastOnInputError?: boolean;
  /** Drop locators that resolve to a video id already in the batch. */
  dedupe?: boolean;
  onFailure?: (failure: TaskFailure) => void;
  onSuccess?: (outcome: TaskOutcome) => void;
}

/**
 * Build the limiter, retry policy, sink and source for one run from config.
 * The limiter is created here once and shared by every task of the run.
 */
export function createPipeline(config: Config): HarvestPipeline {
  return {
    source: new YouTubeCommentSource(config.api.base_url, config.api.timeout_ms),
    sink: new CommentSink({ outputDir: config.output.dir, filePrefix: config.output.file_prefix }),
    limiter: new TokenBucketRateLimiter({
      capacity: config.rate_limit.capacity,
      intervalMs: config.rate_limit.interval_ms,
    }),
    fetcher: new RetryingFetcher({
      initialIntervalMs: config.retry.initial_interval_ms,
      multiplier: config.retry.multiplier,
      randomizationFactor: config.retry.randomization_factor,
      maxIntervalMs: config.retry.max_interval_ms,
      maxElapsedMs: config.retry.max_elapsed_ms,
      maxAttempts: config.retry.max_attempts,
    }),
  };
}

/**
 * Keep the first locator for each video id. Locators that do not parse are
 * kept so their task reports the error.
 */
export function dedupeLocators(locators: string[]): string[] {
  const seen = new Set<string>();
  return locators.filter((locator) => {
    let key = locator;
    try {
      key = parseVideoId(locator);
    } catch (err) {
      if (!(err instanceof InputError)) throw err;
    }
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

function notify<T>(listener: ((value: T) => void) | undefined, value: T): void {
  if (!listener) return;
  try {
    listener(value);
  } catch (err) {
    logger.error({ error: errorMessage(err) }, 'Task listener threw');
  }
}

/**
 * One task: Pending -> PermitAcquired -> InFlight(k) -> Succeeded | Exhausted,
 * or Cancelled when the run's signal fires while the task is waiting.
 * Each attempt takes its own permit. Never rejects.
 */
async function runTask(locator: string, options: HarvestOptions): Promise<TaskOutcome> {
  const { source, sink, limiter, fetcher, maxResults, apiKey, signal } = options;
  let attempts = 0;
  let videoId: string | undefined;
  let outputPath: string | undefined;

  logger.debug({ locator, status: 'pending' }, 'Task queued');

  try {
    const commentsWritten = await fetcher.execute(async (attempt) => {
      attempts = attempt;

      let id: string;
      try {
        id = parseVideoId(locator);
      } catch (err) {
        throw options.failFastOnInputError ? new PermanentError(err) : err;
      }
      videoId = id;

      await limiter.acquire(signal);
      logger.debug({ locator, videoId: id, attempt, status: 'in-flight' }, 'Permit acquired');

      const comments = await source.list({ videoId: id, maxResults, apiKey, signal });

      return withSink(sink, id, async (handle) => {
        outputPath = handle.path;
        for (const comment of comments) {
          await handle.append(comment);
        }
        return handle.written;
      });
    }, signal);

    const outcome: TaskOutcome = {
      locator,
      videoId,
      status: 'succeeded',
      attempts,
      commentsWritten,
      outputPath,
    };
    logger.info({ locator, videoId, attempts, commentsWritten }, 'Comments saved');
    notify(options.onSuccess, outcome);
    return outcome;
  } catch (err) {
    const error = errorMessage(err);

    if (err instanceof CancelledError) {
      logger.info({ locator, videoId, attempts }, 'Task cancelled');
      return { locator, videoId, status: 'cancelled', attempts, commentsWritten: 0, error };
    }

    logger.warn({ locator, videoId, attempts, error }, 'Failed to retrieve comments');
    notify(options.onFailure, { locator, videoId, attempts, error: err });
    return { locator, videoId, status: 'exhausted', attempts, commentsWritten: 0, error };
  }
}

/**
 * Fetch comments for every locator concurrently and wait for all of them.
 *
 * A failed or cancelled task never affects its siblings; the returned report
 * always covers every locator that was run.
 */
export async function runHarvest(locators: string[], options: HarvestOptions): Promise<FetchReport> {
  const startTime = Date.now();

  if (!Number.isInteger(options.maxResults) || options.maxResults < 1) {
    throw new InputError(`maxResults must be a positive integer, got ${options.maxResults}`);
  }

  const batch = options.dedupe ? dedupeLocators(locators) : locators;
  if (batch.length < locators.length) {
    logger.info({ dropped: locators.length - batch.length }, 'Duplicate video ids dropped');
  }

  const tasks = await Promise.all(batch.map((locator) => runTask(locator, options)));

  const report: FetchReport = {
    tasks,
    succeeded: tasks.filter((t) => t.status === 'succeeded').length,
    failed: tasks.filter((t) => t.status === 'exhausted').length,
    cancelled: tasks.filter((t) => t.status === 'cancelled').length,
    commentsWritten: tasks.reduce((sum, t) => sum + t.commentsWritten, 0),
    durationMs: Date.now() - startTime,
  };

  logger.info(
    {
      succeeded: report.succeeded,
      failed: report.failed,
      cancelled: report.cancelled,
      commentsWritten: report.commentsWritten,
      durationMs: report.durationMs,
    },
    'Harvest complete',
  );

  return report;
}

export function summarizeReport(report: FetchReport): string[] {
  const lines: string[] = [];
  for (const task of report.tasks) {
    if (task.status === 'succeeded') {
      lines.push(`✓ ${task.videoId ?? task.locator}: ${task.commentsWritten} comments → ${task.outputPath ?? ''}`);
    } else if (task.status === 'cancelled') {
      lines.push(`- ${task.locator}: cancelled`);
    } else {
      lines.push(`✗ ${task.locator}: ${task.error ?? 'unknown error'} (after ${task.attempts} attempts)`);
    }
  }
  lines.push(
    `${report.succeeded} succeeded, ${report.failed} failed, ${report.cancelled} cancelled, ` +
      `${report.commentsWritten} comments written in ${report.durationMs}ms`,
  );
  return lines;
}
