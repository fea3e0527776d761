import type { RunConfig } from '../../config';
import { createRunConfig } from '../../config';
import type { CandidateTodo, ContentUnit, ExistingTask, SourceRef } from '../../types';
import { computeFingerprint } from '../../utils/fingerprint';

export const NOW = new Date('2024-06-10T12:00:00.000Z');

export function testConfig(overrides: Record<string, unknown> = {}): RunConfig {
  return createRunConfig({
    identity: { names: ['Alex Kim'], email: 'alex@example.com', chatHandle: 'alexk' },
    retry: { maxRetries: 2, baseDelayMs: 10, maxDelayMs: 40 },
    ...overrides,
  });
}

export function makeRef(overrides: Partial<SourceRef> = {}): SourceRef {
  return { source: 'chat', sourceId: 'general:1718020000.000100', link: null, ...overrides };
}

export function makeCandidate(overrides: Partial<CandidateTodo> = {}): CandidateTodo {
  const task = overrides.task ?? 'Send the budget report to finance';
  return {
    task,
    assignee: null,
    dueDate: null,
    priority: 'medium',
    category: [],
    confidence: 0.8,
    sources: [makeRef()],
    fingerprint: computeFingerprint(task),
    context: null,
    kind: 'explicit',
    ...overrides,
  };
}

export function makeTask(overrides: Partial<ExistingTask> = {}): ExistingTask {
  const task = overrides.task ?? 'Send the report';
  return {
    id: 'task-a',
    task,
    assignee: null,
    dueDate: null,
    priority: 'medium',
    category: [],
    status: 'open',
    fingerprint: computeFingerprint(task),
    createdAt: '2024-06-01T09:00:00.000Z',
    sources: [],
    ...overrides,
  };
}

export function makeUnit(overrides: Partial<ContentUnit> = {}): ContentUnit {
  return {
    text: '#general\n[2024-06-10T09:00:00.000Z] @sam: hello',
    source: 'chat',
    sourceId: 'general:1718010000.000100',
    link: null,
    participants: ['sam'],
    timestamp: Date.parse('2024-06-10T09:00:00.000Z'),
    ...overrides,
  };
}
