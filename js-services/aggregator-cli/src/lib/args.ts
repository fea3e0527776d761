/**
 * Command line arguments of the aggregation runner
 */
export interface ParsedArgs {
  /** JSON files holding arrays of raw content items */
  contentFiles: string[];
  /** JSON file with open tasks to seed the in-memory store with */
  existingFile?: string;
  dryRun: boolean;
  lookbackHours?: number;
  help: boolean;
}

function valueAfter(args: readonly string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`${flag} requires a value`);
  }
  return value;
}

export function parseArgs(args: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { contentFiles: [], dryRun: false, help: false };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === '--content') {
      parsed.contentFiles.push(valueAfter(args, i, arg));
      i += 1;
    } else if (arg === '--existing') {
      parsed.existingFile = valueAfter(args, i, arg);
      i += 1;
    } else if (arg === '--lookback-hours') {
      const hours = Number(valueAfter(args, i, arg));
      if (!Number.isFinite(hours) || hours <= 0) {
        throw new Error('--lookback-hours must be a positive number');
      }
      parsed.lookbackHours = hours;
      i += 1;
    } else if (arg === '--dry-run') {
      parsed.dryRun = true;
    } else if (arg === '--help' || arg === '-h') {
      parsed.help = true;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  if (parsed.existingFile && !parsed.dryRun) {
    throw new Error('--existing only applies to --dry-run');
  }
  return parsed;
}

export function helpText(): string {
  return `
Todo Aggregation Runner

Usage:
  tsx src/run-aggregation.ts --content <file> [--content <file> ...] [options]

Options:
  --content <path>         JSON file with an array of chat, email, meeting or note items (repeatable)
  --dry-run                Reconcile against an in-memory task list instead of Notion
  --existing <path>        JSON file with open tasks for the in-memory list (dry run only)
  --lookback-hours <n>     Override TODO_LOOKBACK_HOURS
  --help, -h               Show this help message

Environment Variables:
  OPENAI_API_KEY           OpenAI API key (required)
  TODO_EXTRACTION_MODEL    Model to use (default: gpt-4o)
  NOTION_API_KEY           Notion integration token (required unless --dry-run)
  NOTION_DATABASE_ID       Notion todo database (required unless --dry-run)
  TODO_USER_NAMES          Comma separated name variants of the person todos are collected for
  TODO_USER_EMAIL          Their email address
  TODO_USER_CHAT_HANDLE    Their chat handle
  TODO_LOOKBACK_HOURS      How far back content counts (default: 24)
`;
}
