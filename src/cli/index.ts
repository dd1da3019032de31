#!/usr/bin/env node

import { Command } from 'commander';
import type { EventEmitter } from 'node:events';
import fs from 'node:fs';
import readline, { type Interface as ReadlineInterface } from 'node:readline';
import { stringify as yamlStringify } from 'yaml';
import {
  loadConfig,
  saveConfig,
  writeDefaultConfig,
  getDefaultConfigPath,
  getLoadedConfigPath,
  redactConfig,
  type Config,
} from '../shared/config.js';
import { errorMessage } from '../shared/errors.js';
import { parseUrlList, resolvePath } from '../shared/utils.js';
import { createPipeline, runHarvest, summarizeReport } from '../harvest/orchestrator.js';
import type { FetchReport } from '../harvest/types.js';
import { abortOnInterrupt } from './interrupt.js';

const program = new Command();

program
  .name('comment-harvest')
  .description('Fetch YouTube comments for a batch of videos into per-video text files')
  .version('0.1.0');

interface HarvestRunOptions {
  maxResults: number;
  apiKey: string;
  dedupe: boolean;
  failFast: boolean;
}

/**
 * Run one batch with SIGINT wired to the run's cancellation signal. Pass the
 * open readline interface, if any, since it receives Ctrl-C in raw mode.
 */
async function harvest(
  config: Config,
  urls: string[],
  opts: HarvestRunOptions,
  rl?: ReadlineInterface,
): Promise<FetchReport> {
  const controller = new AbortController();
  const sources: EventEmitter[] = rl ? [process, rl] : [process];
  const detach = abortOnInterrupt(controller, sources, () => log('\nCancelling…'));

  try {
    return await runHarvest(urls, {
      ...createPipeline(config),
      maxResults: opts.maxResults,
      apiKey: opts.apiKey,
      signal: controller.signal,
      dedupe: opts.dedupe,
      failFastOnInputError: opts.failFast,
      onFailure: (failure) => {
        log(`Failed to retrieve comments for ${failure.locator}: ${errorMessage(failure.error)}`);
      },
    });
  } finally {
    detach();
  }
}

function parsePositiveInt(value: string): number | null {
  if (!/^\d+$/.test(value.trim())) return null;
  const n = parseInt(value, 10);
  return n > 0 ? n : null;
}

// === fetch ===
program
  .command('fetch [urls...]')
  .description('Fetch comments for one or more video URLs concurrently')
  .option('-n, --max-results <n>', 'Comments to fetch per video')
  .option('-f, --file <path>', 'Read video URLs from a newline-separated file')
  .option('-o, --out-dir <dir>', 'Directory for comments_<id>.txt files')
  .option('--api-key <key>', 'YouTube Data API key (overrides config)')
  .option('--dedupe', 'Fetch each video id only once per run', false)
  .option('--fail-fast', 'Do not retry malformed URLs', false)
  .action(
    async (
      urls: string[],
      opts: {
        maxResults?: string;
        file?: string;
        outDir?: string;
        apiKey?: string;
        dedupe: boolean;
        failFast: boolean;
      },
    ) => {
      const config = await loadConfig();
      const apiKey = opts.apiKey ?? config.api.key;
      if (!apiKey) {
        log('No API key configured. Set HARVEST_API_KEY, pass --api-key, or run: comment-harvest interactive');
        process.exitCode = 1;
        return;
      }

      const targets = [...urls];
      if (opts.file) {
        const filePath = resolvePath(opts.file);
        if (!fs.existsSync(filePath)) {
          log(`URL file not found: ${filePath}`);
          process.exitCode = 1;
          return;
        }
        targets.push(...parseUrlList(fs.readFileSync(filePath, 'utf-8')));
      }
      if (targets.length === 0) {
        log('No video URLs given.');
        process.exitCode = 1;
        return;
      }

      let maxResults = config.fetch.default_max_results;
      if (opts.maxResults !== undefined) {
        const parsed = parsePositiveInt(opts.maxResults);
        if (parsed === null) {
          log('Invalid --max-results. Please enter a positive integer.');
          process.exitCode = 1;
          return;
        }
        maxResults = parsed;
      }

      const runConfig: Config = opts.outDir
        ? { ...config, output: { ...config.output, dir: opts.outDir } }
        : config;

      log(`Fetching up to ${maxResults} comments for ${targets.length} video(s)…`);
      const report = await harvest(runConfig, targets, {
        maxResults,
        apiKey,
        dedupe: opts.dedupe || config.fetch.dedupe,
        failFast: opts.failFast || config.retry.fail_fast_on_input_error,
      });

      for (const line of summarizeReport(report)) log(line);
      if (report.failed > 0 || report.cancelled > 0) {
        process.exitCode = 1;
      }
    },
  );

// === interactive ===
program
  .command('interactive')
  .description('Prompt for a comment count and video URL, repeatedly')
  .action(async () => {
    let config = await loadConfig();
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

    try {
      if (!config.api.key) {
        log('No API key configured.');
        const key = (await ask(rl, 'Enter your developer key: ')).trim();
        if (!key) {
          log('No key entered.');
          process.exitCode = 1;
          return;
        }
        config = { ...config, api: { ...config.api, key } };
        saveConfig(config);
        log(`✓ Key saved to ${getLoadedConfigPath() ?? getDefaultConfigPath()}`);
      }

      for (;;) {
        const maxResults = await askCount(rl);
        const url = (await ask(rl, 'Enter the YouTube video URL: ')).trim();

        const report = await harvest(
          config,
          [url],
          {
            maxResults,
            apiKey: config.api.key,
            dedupe: false,
            failFast: config.retry.fail_fast_on_input_error,
          },
          rl,
        );
        for (const line of summarizeReport(report)) log(line);

        if (!(await askToContinue(rl))) return;
      }
    } finally {
      rl.close();
    }
  });

// === init ===
program
  .command('init')
  .description('Create ~/.comment-harvest/config.yaml with defaults')
  .action(() => {
    const configPath = getDefaultConfigPath();
    if (fs.existsSync(configPath)) {
      log(`✓ ${configPath} already exists`);
      return;
    }
    writeDefaultConfig(configPath);
    log(`✓ ${configPath} created`);
  });

// === config ===
const configCmd = program.command('config').description('Inspect configuration');

configCmd
  .command('path')
  .description('Show which config file is in effect')
  .action(async () => {
    await loadConfig();
    log(getLoadedConfigPath() ?? '(defaults, no config file found)');
  });

configCmd
  .command('show')
  .description('Print the effective configuration')
  .action(async () => {
    const config = await loadConfig();
    log(yamlStringify(redactConfig(config)).trimEnd());
  });

function ask(rl: ReadlineInterface, question: string): Promise<string> {
  return new Promise<string>((resolve) => {
    rl.question(question, (answer) => resolve(answer));
  });
}

async function askCount(rl: ReadlineInterface): Promise<number> {
  for (;;) {
    const answer = await ask(rl, 'Enter the number of comments to retrieve: ');
    const n = parsePositiveInt(answer);
    if (n !== null) return n;
    log('Invalid input. Please enter a positive integer.');
  }
}

async function askToContinue(rl: ReadlineInterface): Promise<boolean> {
  for (;;) {
    const answer = (await ask(rl, 'Do you want to continue? (Y/N): ')).trim().toLowerCase();
    if (answer === 'y' || answer === 'yes') return true;
    if (answer === 'n' || answer === 'no') return false;
    log('Invalid input. Please enter Y or N.');
  }
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  log(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
});
