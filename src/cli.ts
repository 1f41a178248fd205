#!/usr/bin/env node
/**
 * Corpus check from the command line.
 *
 *   fragment-overlap --untrusted <dir> [--trusted <dir>] [-n 3] [-s 0] [--metric equal]
 *                    [--deadline-ms 60000] [--max-comparisons 50000000]
 *
 * Flags override the corpus defaults from the environment (NGRAM_SIZE, METRIC,
 * METRIC_CUTOFF, COMPARISON_DEADLINE_MS, ...).
 * Every .txt file in a directory becomes one owner, named after the file.
 * Prints the JSON report of both checks to stdout.
 */

import fs from 'fs/promises';
import path from 'path';
import { config } from './config';
import { loadCorpusConfig } from './config/corpus.config';
import { logger } from './lib/logger';
import { cliArgsSchema, CliArgs } from './schemas/corpus.schemas';
import { AppError } from './utils/app-error';
import { CorpusStore } from './services/plagiarism/corpus-store.service';
import { serializeResults } from './services/plagiarism/result-serializer';

const FLAG_NAMES: Record<string, keyof CliArgs> = {
  '--trusted': 'trustedDir',
  '--untrusted': 'untrustedDir',
  '-n': 'n',
  '-s': 's',
  '--metric': 'metric',
  '--deadline-ms': 'deadlineMs',
  '--max-comparisons': 'maxFragmentComparisons',
};

export function parseCliArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliArgs {
  const defaults = loadCorpusConfig(env);
  const raw: Record<string, unknown> = {
    n: defaults.ngramSize,
    s: defaults.metricCutoff,
    metric: defaults.metric,
    normalizedTextPrecedence: defaults.normalizedTextPrecedence,
  };
  if (defaults.comparisonDeadlineMs !== undefined) raw.deadlineMs = defaults.comparisonDeadlineMs;
  if (defaults.maxFragmentComparisons !== undefined) raw.maxFragmentComparisons = defaults.maxFragmentComparisons;

  for (let i = 0; i < argv.length; i++) {
    const key = FLAG_NAMES[argv[i]];
    const value = argv[i + 1];
    if (!key || value === undefined) {
      throw AppError.invalidInput(`Unexpected argument: ${argv[i]}`);
    }
    raw[key] = value;
    i++;
  }

  const parsed = cliArgsSchema.safeParse(raw);
  if (!parsed.success) {
    throw AppError.invalidInput(parsed.error.errors.map((e) => e.message).join('; '));
  }
  return parsed.data;
}

export async function readTextDirectory(dir: string): Promise<Array<{ owner: string; text: string }>> {
  const names = (await fs.readdir(dir)).filter((name) => path.extname(name) === '.txt').sort();
  return Promise.all(
    names.map(async (name) => ({
      owner: path.basename(name, '.txt'),
      text: await fs.readFile(path.join(dir, name), 'utf-8'),
    }))
  );
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  const store = new CorpusStore({
    n: args.n,
    s: args.s,
    metric: args.metric,
    normalizedTextPrecedence: args.normalizedTextPrecedence,
    budget: { deadlineMs: args.deadlineMs, maxFragmentComparisons: args.maxFragmentComparisons },
  });

  if (args.trustedDir) {
    for (const { owner, text } of await readTextDirectory(args.trustedDir)) {
      store.addTrustedText(owner, text);
    }
  }
  for (const { owner, text } of await readTextDirectory(args.untrustedDir)) {
    store.addUntrustedText(owner, text);
  }

  const untrusted = store.compareUntrusted();
  const trusted = store.compareTrusted();

  process.stdout.write(`${JSON.stringify({
    version: config.version,
    untrusted: serializeResults(untrusted.results),
    trusted: serializeResults(trusted.results),
    truncated: untrusted.truncated || trusted.truncated,
  }, null, 2)}\n`);
}

if (require.main === module) {
  // stdout carries the report, keep routine logs off it
  if (!process.env.LOG_LEVEL) process.env.LOG_LEVEL = 'warn';

  main().catch((error: unknown) => {
    logger.error('[CLI] Corpus check failed', error instanceof Error ? error : undefined);
    process.exitCode = 1;
  });
}
