#!/usr/bin/env tsx
/**
 * Todo Aggregation Runner
 *
 * Collects content from JSON files, extracts todos for one person and
 * reconciles them with the Notion todo database (or an in-memory list with
 * --dry-run). See --help for options.
 */

import 'dotenv/config';
import {
  AggregationPipeline,
  CONTENT_SOURCES,
  InMemoryTaskStore,
  LoggingRunNotifier,
  NotionTaskStore,
  OpenAIModelClient,
  runConfigInputFromEnv,
  StaticContentCollector,
  type RawContentItem,
  type TaskStore,
} from '@todo-aggregator/aggregator-core';
import { helpText, parseArgs, type ParsedArgs } from './lib/args';
import { loadContentFile, loadExistingTasks } from './lib/files';
import { logger } from './lib/logger';
import { formatReport } from './lib/reporter';

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function createStore(args: ParsedArgs): TaskStore {
  if (args.dryRun) {
    const seed = args.existingFile ? loadExistingTasks(args.existingFile) : [];
    logger.info('Dry run against in-memory task list', { openTasks: seed.length });
    return new InMemoryTaskStore(seed);
  }
  return new NotionTaskStore({
    auth: requireEnv('NOTION_API_KEY'),
    databaseId: requireEnv('NOTION_DATABASE_ID'),
  });
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(helpText());
    return;
  }
  if (args.contentFiles.length === 0) {
    throw new Error('At least one --content <path> is required');
  }

  const items: RawContentItem[] = args.contentFiles.flatMap((path) => loadContentFile(path));
  const collectors = CONTENT_SOURCES.filter((source) =>
    items.some((item) => item.source === source)
  ).map((source) => new StaticContentCollector(source, items));

  const pipeline = new AggregationPipeline({
    model: new OpenAIModelClient({ apiKey: requireEnv('OPENAI_API_KEY') }),
    store: createStore(args),
    collectors,
    notifier: new LoggingRunNotifier(),
  });

  const configInput = runConfigInputFromEnv(process.env);
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const report = await pipeline.run(
    args.lookbackHours !== undefined ? { ...configInput, lookbackHours: args.lookbackHours } : configInput,
    { signal: controller.signal }
  );

  console.log(formatReport(report));
  if (report.status === 'failed') {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  logger.error('Aggregation runner failed', error);
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
