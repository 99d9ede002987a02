#!/usr/bin/env node
import path from 'node:path';
import { Command } from 'commander';
import dotenv from 'dotenv';
import { LlmCache } from './analysis/llmCache.js';
import { FileCache } from './cache/fileCache.js';
import { ClassificationClient, type ClassificationTransport } from './clients/classification.js';
import { LexiconTransport, loadLexicon, type Lexicon } from './clients/lexicon.js';
import { createOpenAiClient, OpenAiTransport } from './clients/openai.js';
import { loadConfig, parsePositiveInteger, type AppConfig, type RawConfigOptions } from './config.js';
import { readCommentRecords } from './csv/reader.js';
import { CsvStreamWriter, resultToRow } from './csv/writer.js';
import { ClassificationPipeline } from './pipeline/orchestrator.js';
import { formatRunSummary } from './pipeline/summary.js';
import type { CommentRecord } from './types/index.js';

dotenv.config();

interface ClassifyCommandOptions extends RawConfigOptions {
  input: string;
  output?: string;
  idColumn: string;
  textColumn: string;
  scoreColumn: string;
  limit?: string;
  domain?: string;
  cacheDir: string;
  cache: boolean;
  scoreGuard: boolean;
  offline?: boolean;
}

const program = new Command();
program
  .name('comment-triage')
  .description('Classify e-commerce review comments into sentiment, urgency and a suggested action.');

program
  .command('classify')
  .description('Classify the comments of a review CSV and write one result row per comment.')
  .requiredOption('-i, --input <path>', 'Review CSV to read.')
  .option('-o, --output <path>', 'Result CSV to write (default output/<timestamp>_triage.csv).')
  .option('--id-column <name>', 'Column holding the review id.', 'review_id')
  .option('--text-column <name>', 'Column holding the comment text.', 'review_comment_message')
  .option('--score-column <name>', 'Column holding the 1-5 review score.', 'review_score')
  .option('--limit <number>', 'Only classify the first N comments.')
  .option('--domain <text>', 'One-line description of the store for the prompt.')
  .option('--model <id>', 'OpenAI model (default gpt-5-nano-2025-08-07).')
  .option('--timeout <ms>', 'Per-attempt request timeout in ms (default 60000).')
  .option('--batch-size <number>', 'Comments per request (default 20).')
  .option('--batch-tokens <number>', 'Estimated token budget per request (default 6000).')
  .option('--attempts <number>', 'Attempts per batch, including the first (default 4).')
  .option('--backoff <ms>', 'Base retry backoff in ms (default 1000).')
  .option('--max-backoff <ms>', 'Retry backoff cap in ms (default 30000).')
  .option('--concurrency <number>', 'Batches in flight at once (default 5).')
  .option('--cache-dir <path>', 'Directory for cached model replies.', '.cache')
  .option('--no-cache', 'Do not read or write cached replies.')
  .option('--no-score-guard', 'Keep verdicts that contradict the review score.')
  .option('--offline', 'Use the keyword classifier instead of the OpenAI API.')
  .action(async (rawOptions: ClassifyCommandOptions) => {
    await handleClassify(rawOptions);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? `${error.name}: ${error.message}` : String(error));
  process.exitCode = 1;
});

async function handleClassify(options: ClassifyCommandOptions) {
  const config = loadConfig(options);
  const logger = createLogger('classify');

  const loaded = await readCommentRecords(path.resolve(options.input), {
    idColumn: options.idColumn,
    textColumn: options.textColumn,
    scoreColumn: options.scoreColumn,
  });
  console.log(
    `Loaded ${loaded.records.length} comments from ${options.input} (skipped ${loaded.skippedEmpty} empty, ${loaded.skippedDuplicate} duplicate).`,
  );
  const records = applyLimit(loaded.records, options.limit);
  if (records.length === 0) {
    console.log('No comments to classify.');
    return;
  }

  const lexicon = loadLexicon();
  const client = new ClassificationClient(createTransport(config, options.offline ?? false, lexicon), {
    requestTimeoutMs: config.requestTimeoutMs,
    maxAttempts: config.maxAttempts,
    baseDelayMs: config.baseDelayMs,
    maxDelayMs: config.maxDelayMs,
    maxRetryAfterMs: config.maxRetryAfterMs,
    cache: options.cache ? new LlmCache(new FileCache({ baseDir: options.cacheDir, logger: createLogger('cache') })) : undefined,
    logger: createLogger('client'),
  });
  const pipeline = new ClassificationPipeline({
    client,
    settings: config,
    promptOptions: options.domain ? { domainDescription: options.domain } : {},
    applyScoreGuard: options.scoreGuard,
    guardLexicon: lexicon.guard,
    logger,
  });

  const controller = new AbortController();
  const onInterrupt = () => {
    console.log('Stopping: no new batches will be sent; waiting for batches in flight...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  const run = await pipeline
    .run(records, {
      signal: controller.signal,
      onBatchComplete: (report, completed, total) =>
        logger(`Batch ${report.batchId} done (${completed}/${total})${report.failure ? `: ${report.failure.reason}` : ''}`),
    })
    .finally(() => process.removeListener('SIGINT', onInterrupt));

  const outputPath = options.output
    ? path.resolve(options.output)
    : path.join('output', `${new Date().toISOString().replace(/[:]/g, '-')}_triage.csv`);
  const writer = await CsvStreamWriter.create(outputPath);
  for (const record of records) {
    const result = run.results.get(record.id);
    if (result) {
      await writer.writeRow(resultToRow(result, record));
    }
  }
  await writer.close();

  console.log(`Wrote ${writer.rowsWritten} rows to ${writer.path}`);
  for (const line of formatRunSummary(run)) {
    console.log(line);
  }
  if (run.commentsUnresolved > 0) {
    console.log(`${run.commentsUnresolved} comments need manual follow-up.`);
  }
}

function createTransport(config: AppConfig, offline: boolean, lexicon: Lexicon): ClassificationTransport {
  if (offline || !config.apiKey) {
    if (!offline) {
      console.log('OPENAI_API_KEY is not set; using the offline keyword classifier.');
    }
    return new LexiconTransport(lexicon);
  }
  return new OpenAiTransport(createOpenAiClient(config.apiKey), { model: config.model });
}

function applyLimit(records: CommentRecord[], limit: string | undefined): CommentRecord[] {
  if (limit === undefined) {
    return records;
  }
  return records.slice(0, parsePositiveInteger(limit, records.length, 'limit'));
}

function createLogger(scope: string) {
  return (message: string) => console.log(`[${scope}] ${message}`);
}
