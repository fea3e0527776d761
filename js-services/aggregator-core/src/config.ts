import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { IdentityFilters } from './types';

export const DEFAULT_HIGH_PRIORITY_KEYWORDS = ['urgent', 'asap', 'eod', 'critical', 'blocker'];

const probability = z.number().min(0).max(1);

const IdentitySchema = z.object({
  names: z.array(z.string().trim().min(1)).min(1, 'at least one name variant is required'),
  email: z.string().trim().email().nullish(),
  chatHandle: z
    .string()
    .trim()
    .min(1)
    .transform((handle) => handle.replace(/^@/, ''))
    .nullish(),
});

const FeaturesSchema = z.object({
  priorityScoring: z.boolean().default(true),
  categoryTagging: z.boolean().default(true),
  dueDateInference: z.boolean().default(true),
  ownershipFilter: z.boolean().default(true),
});

const ThresholdsSchema = z.object({
  similarity: probability.default(0.8),
  done: probability.default(0.85),
  tentative: probability.default(0.5),
  defaultCandidateConfidence: probability.default(0.5),
  minTokenOverlap: z.number().int().min(1).default(2),
});

const RetrySchema = z.object({
  maxRetries: z.number().int().min(0).max(10).default(3),
  baseDelayMs: z.number().int().min(0).default(1000),
  maxDelayMs: z.number().int().min(0).default(4000),
});

export const RunConfigSchema = z
  .object({
    identity: IdentitySchema,
    lookbackHours: z.number().positive().default(24),
    maxUnitChars: z.number().int().min(100).default(4000),
    features: FeaturesSchema.default({}),
    thresholds: ThresholdsSchema.default({}),
    retry: RetrySchema.default({}),
    highPriorityKeywords: z
      .array(z.string().trim().min(1))
      .default(DEFAULT_HIGH_PRIORITY_KEYWORDS),
  })
  .superRefine((value, ctx) => {
    if (value.thresholds.tentative > value.thresholds.done) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['thresholds', 'tentative'],
        message: 'tentative threshold must not exceed the done threshold',
      });
    }
    if (value.retry.maxDelayMs < value.retry.baseDelayMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['retry', 'maxDelayMs'],
        message: 'maxDelayMs must be at least baseDelayMs',
      });
    }
  });

export type RunConfigInput = z.input<typeof RunConfigSchema>;

type ParsedRunConfig = z.output<typeof RunConfigSchema>;

export type FeatureFlags = Readonly<ParsedRunConfig['features']>;
export type Thresholds = Readonly<ParsedRunConfig['thresholds']>;
export type RetrySettings = Readonly<ParsedRunConfig['retry']>;

/**
 * Immutable settings of one run. Components receive the parts they need
 * explicitly and never read the environment.
 */
export interface RunConfig {
  readonly identity: Readonly<IdentityFilters>;
  readonly lookbackHours: number;
  readonly maxUnitChars: number;
  readonly features: FeatureFlags;
  readonly thresholds: Thresholds;
  readonly retry: RetrySettings;
  readonly highPriorityKeywords: readonly string[];
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate a run configuration, fill defaults and freeze it
 *
 * @throws ConfigurationError when the input is invalid
 */
export function createRunConfig(input: unknown): RunConfig {
  const parsed = RunConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid run configuration: ${issues.join('; ')}`, issues);
  }

  const { identity, ...rest } = parsed.data;
  return deepFreeze({
    ...rest,
    identity: {
      names: identity.names,
      email: identity.email ?? null,
      chatHandle: identity.chatHandle ?? null,
    },
  });
}

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

function readNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  // Left as NaN on garbage so validation reports the variable
  return Number(value);
}

function readFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value.trim().toLowerCase() === 'true';
}

/**
 * Map environment variables onto a run configuration input.
 * Only entry points call this; the pipeline takes the resulting object.
 */
export function runConfigInputFromEnv(env: NodeJS.ProcessEnv): RunConfigInput {
  const lookbackHours = readNumber(env.TODO_LOOKBACK_HOURS);
  const highPriorityKeywords = splitList(env.HIGH_PRIORITY_KEYWORDS);
  const priorityScoring = readFlag(env.ENABLE_PRIORITY_SCORING);
  const categoryTagging = readFlag(env.ENABLE_CATEGORY_TAGGING);
  const dueDateInference = readFlag(env.ENABLE_DUE_DATE_INFERENCE);
  const ownershipFilter = readFlag(env.ENABLE_OWNERSHIP_FILTER);
  const similarity = readNumber(env.TODO_SIMILARITY_THRESHOLD);
  const done = readNumber(env.TODO_DONE_THRESHOLD);
  const tentative = readNumber(env.TODO_TENTATIVE_THRESHOLD);

  return {
    identity: {
      names: splitList(env.TODO_USER_NAMES) ?? [],
      email: env.TODO_USER_EMAIL || null,
      chatHandle: env.TODO_USER_CHAT_HANDLE || null,
    },
    ...(lookbackHours !== undefined ? { lookbackHours } : {}),
    ...(highPriorityKeywords !== undefined ? { highPriorityKeywords } : {}),
    features: {
      ...(priorityScoring !== undefined ? { priorityScoring } : {}),
      ...(categoryTagging !== undefined ? { categoryTagging } : {}),
      ...(dueDateInference !== undefined ? { dueDateInference } : {}),
      ...(ownershipFilter !== undefined ? { ownershipFilter } : {}),
    },
    thresholds: {
      ...(similarity !== undefined ? { similarity } : {}),
      ...(done !== undefined ? { done } : {}),
      ...(tentative !== undefined ? { tentative } : {}),
    },
  };
}
