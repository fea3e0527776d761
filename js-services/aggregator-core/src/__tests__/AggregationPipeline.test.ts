import { describe, test, expect, jest } from '@jest/globals';
import {
  CollectionError,
  ConfigurationError,
  ExtractionFailed,
  ModelInvocationError,
  RunAbortedError,
  SnapshotUnavailableError,
  StoreApplyError,
} from '../errors';
import type { ModelClient } from '../llm/modelClient';
import type { RawContentItem } from '../normalizer/rawContent';
import { AggregationPipeline } from '../pipeline/AggregationPipeline';
import type { ContentCollector } from '../pipeline/collector';
import { StaticContentCollector } from '../pipeline/collector';
import type { RunNotifier } from '../pipeline/notifier';
import { InMemoryTaskStore } from '../store/InMemoryTaskStore';
import type { ExistingTask } from '../types';
import { OperationAction } from '../types';
import { makeTask, NOW } from './helpers/fixtures';
import { noSleep, ScriptedModelClient } from './helpers/scriptedModelClient';

const configInput = {
  identity: { names: ['Alex Kim'], email: 'alex@example.com', chatHandle: 'alexk' },
  retry: { maxRetries: 2, baseDelayMs: 10, maxDelayMs: 40 },
};

const budgetChat: RawContentItem = {
  source: 'chat',
  channel: 'general',
  ts: '1718010000.000100',
  user: 'sam',
  text: 'Alex, can you send the Q3 budget report to finance by Friday?',
};

const budgetEmail: RawContentItem = {
  source: 'email',
  messageId: '<m1@example.com>',
  subject: 'Q3 budget',
  from: 'jordan@example.com',
  to: ['alex@example.com'],
  body: 'Reminder: the Q3 budget report still needs to go to finance.',
  date: '2024-06-10T10:00:00.000Z',
};

const chatRef = { source: 'chat', sourceId: 'general:1718010000.000100', link: null };
const emailRef = { source: 'email', sourceId: '<m1@example.com>', link: null };

function chatMessage(text: string, ts = '1718010000.000100'): RawContentItem {
  return { source: 'chat', channel: 'general', ts, user: 'sam', text };
}

function setup(options: {
  items?: RawContentItem[];
  existing?: ExistingTask[];
  collectors?: ContentCollector[];
  model?: ModelClient;
  notifier?: RunNotifier;
} = {}) {
  const items = options.items ?? [];
  const model = new ScriptedModelClient();
  const store = new InMemoryTaskStore(options.existing ?? [], { clock: () => NOW });
  const collectors = options.collectors ?? [
    new StaticContentCollector('chat', items),
    new StaticContentCollector('email', items),
  ];
  const pipeline = new AggregationPipeline({
    model: options.model ?? model,
    store,
    collectors,
    notifier: options.notifier,
    clock: () => NOW,
    sleep: noSleep,
  });
  return { pipeline, model, store };
}

describe('AggregationPipeline', () => {
  describe('reconciliation', () => {
    test('should create one task for a todo mentioned in chat and email', async () => {
      const { pipeline, model, store } = setup({ items: [budgetChat, budgetEmail] });
      model.replyJson('todo-extraction', {
        todos: [
          { task: 'Send the Q3 budget report to finance', source_ids: [0], confidence: 0.9, assigned_to: 'Alex Kim' },
          { task: 'send Q3 budget report to finance.', source_ids: [1], confidence: 0.7 },
        ],
      });

      const report = await pipeline.run(configInput);

      expect(report.status).toBe('succeeded');
      expect(report.summary).toMatchObject({ created: 1, skippedDuplicates: 1, contentUnits: 2 });
      expect(report.operations).toHaveLength(1);
      expect(store.allTasks()).toHaveLength(1);
      expect(store.getTask('task-1')).toMatchObject({
        task: 'Send the Q3 budget report to finance',
        assignee: 'Alex Kim',
        confidence: 0.9,
        sources: [chatRef, emailRef],
      });
      expect(model.callsFor('completion-detection')).toHaveLength(0);
    });

    test('should leave a task without related content untouched', async () => {
      const { pipeline, model, store } = setup({
        items: [chatMessage('Lunch at noon?')],
        existing: [makeTask({ id: 'task-a', task: 'Renew the parking permit' })],
      });
      model.replyJson('todo-extraction', { todos: [] });

      const report = await pipeline.run(configInput);

      expect(report.operations).toEqual([
        { action: OperationAction.NO_OP, taskId: 'task-a', confidence: 0, additionalSources: [] },
      ]);
      expect(report.summary).toMatchObject({ created: 0, unchanged: 1 });
      expect(store.getTask('task-a')?.status).toBe('open');
      expect(model.callsFor('completion-detection')).toHaveLength(0);
    });

    test('should attach a repeated todo to the existing task instead of creating it', async () => {
      const { pipeline, model, store } = setup({
        items: [budgetEmail],
        existing: [makeTask({ id: 'task-a', task: 'Send the Q3 budget report to finance' })],
      });
      model.replyJson('todo-extraction', {
        todos: [{ task: 'send the q3 budget report to finance', source_ids: [0] }],
      });
      model.replyJson('completion-detection', {
        completions: [{ todo_id: 'task-a', is_completed: false, confidence: 0 }],
      });

      const report = await pipeline.run(configInput);

      expect(report.operations).toEqual([
        { action: OperationAction.NO_OP, taskId: 'task-a', confidence: 0, additionalSources: [emailRef] },
      ]);
      expect(report.summary).toMatchObject({ created: 0, skippedDuplicates: 1, unchanged: 1 });
      expect(store.getTask('task-a')?.sources).toEqual([emailRef]);
      expect(store.getTask('task-a')?.comments).toEqual(['Also mentioned in: email <m1@example.com>']);
    });

    test('should still detect completions when extraction runs out of retries', async () => {
      const { pipeline, model, store } = setup({
        items: [chatMessage('I sent the Q3 budget report to finance this morning')],
        existing: [makeTask({ id: 'task-a', task: 'Send the Q3 budget report to finance' })],
      });
      const overloaded = () => new ModelInvocationError('503 overloaded', 'transient', { status: 503 });
      model.reply('todo-extraction', overloaded(), overloaded(), overloaded());
      model.replyJson('completion-detection', {
        completions: [
          { todo_id: 'task-a', is_completed: true, confidence: 0.9, evidence: 'I sent the Q3 budget report' },
        ],
      });

      const report = await pipeline.run(configInput);

      expect(report.status).toBe('succeeded');
      expect(model.callsFor('todo-extraction')).toHaveLength(3);
      expect(report.warnings).toHaveLength(1);
      expect(report.warnings[0]?.stage).toBe('extraction');
      expect(report.warnings[0]?.error).toBeInstanceOf(ExtractionFailed);
      expect(report.warnings[0]?.message).toBe('model call failed after 3 attempt(s): 503 overloaded');
      expect(report.summary).toMatchObject({ created: 0, completed: 1 });
      expect(store.getTask('task-a')).toMatchObject({ status: 'done', completedAt: '2024-06-10' });
    });

    test('should warn with ExtractionFailed when no extracted item is usable', async () => {
      const { pipeline, model, store } = setup({ items: [budgetChat] });
      model.reply('todo-extraction', JSON.stringify([{ title: 'Send report' }, { description: 'x' }]));

      const report = await pipeline.run(configInput);

      expect(report.status).toBe('succeeded');
      expect(report.warnings).toHaveLength(1);
      expect(report.warnings[0]?.stage).toBe('extraction');
      expect(report.warnings[0]?.error).toBeInstanceOf(ExtractionFailed);
      expect(report.summary.created).toBe(0);
      expect(store.allTasks()).toEqual([]);
    });

    test('should create a todo the model gave no source marker for', async () => {
      const { pipeline, model, store } = setup({ items: [budgetChat, budgetEmail] });
      model.replyJson('todo-extraction', {
        todos: [{ task: 'Send the Q3 budget report to finance', source: 'email' }],
      });

      const report = await pipeline.run(configInput);

      expect(report.summary.created).toBe(1);
      expect(store.getTask('task-1')?.sources).toEqual([emailRef]);
    });

    test('should complete or tentatively complete tasks by confidence', async () => {
      const { pipeline, model, store } = setup({
        items: [chatMessage('Sent the Q3 budget report, and the offsite venue is almost booked')],
        existing: [
          makeTask({ id: 'task-a', task: 'Send the Q3 budget report' }),
          makeTask({ id: 'task-b', task: 'Book the team offsite venue' }),
        ],
      });
      model.replyJson('todo-extraction', { todos: [] });
      model.replyJson('completion-detection', {
        completions: [
          { todo_id: 'task-a', is_completed: true, confidence: 0.9, evidence: 'Sent the Q3 budget report' },
          { todo_id: 'task-b', is_completed: true, confidence: 0.6, evidence: 'almost booked' },
        ],
      });

      const report = await pipeline.run(configInput);

      expect(report.operations.map((op) => op.action)).toEqual([
        OperationAction.COMPLETE,
        OperationAction.TENTATIVELY_COMPLETE,
      ]);
      expect(report.summary).toMatchObject({ completed: 1, tentativelyCompleted: 1 });
      expect(store.getTask('task-a')?.status).toBe('done');
      expect(store.getTask('task-b')?.status).toBe('tentatively_done');
      expect(store.getTask('task-b')?.comments).toEqual(['Needs review (60%): "almost booked"']);
    });

    test('should drop todos assigned to someone else', async () => {
      const { pipeline, model, store } = setup({ items: [budgetChat] });
      model.replyJson('todo-extraction', {
        todos: [
          { task: 'Send the Q3 budget report to finance', source_ids: [0], assigned_to: 'Alex Kim' },
          { task: 'Review the hiring plan', source_ids: [0], assigned_to: 'Jordan Lee' },
        ],
      });

      const report = await pipeline.run(configInput);

      expect(report.summary.created).toBe(1);
      expect(store.allTasks().map((task) => task.task)).toEqual(['Send the Q3 budget report to finance']);
    });

    test('should keep todos of others when the ownership filter is off', async () => {
      const { pipeline, model, store } = setup({ items: [budgetChat] });
      model.replyJson('todo-extraction', {
        todos: [{ task: 'Review the hiring plan', source_ids: [0], assigned_to: 'Jordan Lee' }],
      });

      await pipeline.run({ ...configInput, features: { ownershipFilter: false } });

      expect(store.allTasks().map((task) => task.assignee)).toEqual(['Jordan Lee']);
    });
  });

  describe('report', () => {
    test('should count units per source and time the run', async () => {
      const { pipeline, model } = setup({ items: [budgetChat, budgetEmail, chatMessage('Thanks!', '1718011000.000100')] });
      model.replyJson('todo-extraction', { todos: [] });

      const report = await pipeline.run(configInput);

      expect(report.startedAt).toBe('2024-06-10T12:00:00.000Z');
      expect(report.summary).toEqual({
        created: 0,
        skippedDuplicates: 0,
        completed: 0,
        tentativelyCompleted: 0,
        unchanged: 0,
        failedOperations: 0,
        contentUnits: 3,
        unitsBySource: { chat: 2, email: 1, meeting: 0, 'store-note': 0 },
        durationMs: 0,
      });
      expect(report.operations).toEqual([]);
      expect(report.results).toEqual([]);
    });

    test('should hand the report to the notifier', async () => {
      const notify = jest.fn<RunNotifier['notify']>().mockResolvedValue(undefined);
      const { pipeline, model } = setup({ notifier: { notify } });
      model.replyJson('todo-extraction', { todos: [] });

      const report = await pipeline.run(configInput);

      expect(notify).toHaveBeenCalledWith(report);
    });

    test('should return the report when the notifier fails', async () => {
      const notify = jest.fn<RunNotifier['notify']>().mockRejectedValue(new Error('webhook down'));
      const { pipeline } = setup({ notifier: { notify } });

      const report = await pipeline.run(configInput);

      expect(report.status).toBe('succeeded');
      expect(notify).toHaveBeenCalledTimes(1);
    });
  });

  describe('failures', () => {
    test('should fail on invalid configuration before any I/O', async () => {
      const collect = jest.fn<ContentCollector['collect']>().mockResolvedValue([]);
      const { pipeline, model, store } = setup({ collectors: [{ source: 'chat', collect }] });
      const listOpenTasks = jest.spyOn(store, 'listOpenTasks');

      const report = await pipeline.run({ identity: { names: [] } });

      expect(report.status).toBe('failed');
      expect(report.failures[0]).toBeInstanceOf(ConfigurationError);
      expect(collect).not.toHaveBeenCalled();
      expect(listOpenTasks).not.toHaveBeenCalled();
      expect(model.requests).toHaveLength(0);
    });

    test('should carry on without a collector that fails', async () => {
      const broken: ContentCollector = {
        source: 'email',
        collect: async () => {
          throw new Error('mailbox offline');
        },
      };
      const { pipeline, model } = setup({
        collectors: [new StaticContentCollector('chat', [budgetChat]), broken],
      });
      model.replyJson('todo-extraction', { todos: [] });

      const report = await pipeline.run(configInput);

      expect(report.status).toBe('succeeded');
      expect(report.summary.contentUnits).toBe(1);
      expect(report.warnings).toHaveLength(1);
      expect(report.warnings[0]).toMatchObject({
        stage: 'collection',
        message: 'email collector failed: mailbox offline',
      });
      expect(report.warnings[0]?.error).toBeInstanceOf(CollectionError);
    });

    test('should fail when the open tasks cannot be read', async () => {
      const { pipeline, model, store } = setup({ items: [budgetChat] });
      model.replyJson('todo-extraction', { todos: [] });
      jest.spyOn(store, 'listOpenTasks').mockRejectedValue(new Error('database offline'));
      const applyOps = jest.spyOn(store, 'applyOps');

      const report = await pipeline.run(configInput);

      expect(report.status).toBe('failed');
      expect(report.failures[0]).toBeInstanceOf(SnapshotUnavailableError);
      expect(report.failures[0]?.message).toBe('could not read open tasks: database offline');
      expect(applyOps).not.toHaveBeenCalled();
    });

    test('should stop before touching anything when aborted up front', async () => {
      const { pipeline, model, store } = setup({ items: [budgetChat] });
      const controller = new AbortController();
      controller.abort();

      const report = await pipeline.run(configInput, { signal: controller.signal });

      expect(report.status).toBe('failed');
      expect(report.failures[0]).toBeInstanceOf(RunAbortedError);
      expect(model.requests).toHaveLength(0);
      expect(store.allTasks()).toEqual([]);
    });

    test('should apply nothing when aborted during extraction', async () => {
      const controller = new AbortController();
      const model: ModelClient = {
        complete: async () => {
          controller.abort();
          return JSON.stringify({ todos: [{ task: 'Send the Q3 budget report', source_ids: [0] }] });
        },
      };
      const { pipeline, store } = setup({ items: [budgetChat], model });
      const applyOps = jest.spyOn(store, 'applyOps');

      const report = await pipeline.run(configInput, { signal: controller.signal });

      expect(report.failures[0]).toBeInstanceOf(RunAbortedError);
      expect(applyOps).not.toHaveBeenCalled();
      expect(store.allTasks()).toEqual([]);
    });

    test('should mark every op failed when the store rejects the batch', async () => {
      const { pipeline, model, store } = setup({ items: [budgetChat] });
      model.replyJson('todo-extraction', {
        todos: [{ task: 'Send the Q3 budget report to finance', source_ids: [0] }],
      });
      jest.spyOn(store, 'applyOps').mockRejectedValue(new Error('store offline'));

      const report = await pipeline.run(configInput);

      expect(report.status).toBe('succeeded');
      expect(report.summary).toMatchObject({ created: 0, failedOperations: 1 });
      const [result] = report.results;
      expect(result?.status).toBe('failed');
      if (result?.status === 'failed') {
        expect(result.error).toBeInstanceOf(StoreApplyError);
        expect(result.error.message).toBe('batch apply failed: store offline');
        expect(result.error.taskId).toBeNull();
      }
    });
  });
});
