import { describe, test, expect } from '@jest/globals';
import { classifyCompletion, detectCompletions } from '../completion/completionDetector';
import { CompletionDetectionFailed, ModelInvocationError } from '../errors';
import { makeTask, makeUnit, testConfig } from './helpers/fixtures';
import { noSleep, ScriptedModelClient } from './helpers/scriptedModelClient';

const report = makeTask({ id: 'task-a', task: 'Send the budget report' });
const flights = makeTask({ id: 'task-b', task: 'Book flights to Berlin' });
const closed = makeTask({ id: 'task-c', task: 'Send the budget report', status: 'done' });
const passport = makeTask({ id: 'task-d', task: 'Renew passport' });

const sentUnit = makeUnit({ sourceId: 'general:1', text: 'I sent the budget report to finance' });
const bookedUnit = makeUnit({
  source: 'email',
  sourceId: '<m2@example.com>',
  text: 'Flights to Berlin are booked',
});

function deps(model: ScriptedModelClient, configOverrides: Record<string, unknown> = {}) {
  return { model, config: testConfig(configOverrides), sleep: noSleep };
}

describe('classifyCompletion', () => {
  const thresholds = { done: 0.85, tentative: 0.5 };

  test('should treat the done threshold as done', () => {
    expect(classifyCompletion(0.85, thresholds)).toBe('done');
    expect(classifyCompletion(1, thresholds)).toBe('done');
  });

  test('should treat the tentative floor as tentative', () => {
    expect(classifyCompletion(0.5, thresholds)).toBe('tentative');
    expect(classifyCompletion(0.84, thresholds)).toBe('tentative');
  });

  test('should keep anything below the floor open', () => {
    expect(classifyCompletion(0.49, thresholds)).toBe('still_open');
    expect(classifyCompletion(0, thresholds)).toBe('still_open');
  });
});

describe('detectCompletions', () => {
  test('should classify every open task in one model call', async () => {
    const model = new ScriptedModelClient().replyJson('completion-detection', {
      completions: [
        { todo_id: 'task-a', is_completed: true, confidence: 0.9, evidence: 'I sent the budget report' },
        { todo_id: 'task-b', is_completed: true, confidence: 0.5, evidence: '  booked  ' },
        { todo_id: 'task-zzz', is_completed: true, confidence: 0.99 },
        { todo_id: 'task-a', is_completed: true, confidence: 0.1 },
      ],
    });

    const outcome = await detectCompletions(
      [report, flights, closed, passport],
      [sentUnit, bookedUnit],
      deps(model)
    );

    expect(model.requests).toHaveLength(1);
    expect(outcome.failure).toBeNull();
    expect(outcome.verdicts).toEqual([
      { taskId: 'task-a', verdict: 'done', confidence: 0.9, evidence: 'I sent the budget report', relatedUnits: 1 },
      { taskId: 'task-b', verdict: 'tentative', confidence: 0.5, evidence: 'booked', relatedUnits: 1 },
      { taskId: 'task-d', verdict: 'still_open', confidence: 0, evidence: null, relatedUnits: 0 },
    ]);
    expect(outcome.warnings).toEqual([
      'completion for unknown todo "task-zzz" ignored',
      'repeated completion for todo "task-a" ignored',
    ]);
  });

  test('should only send tasks that have related content', async () => {
    const model = new ScriptedModelClient().replyJson('completion-detection', { completions: [] });

    await detectCompletions([report, passport], [sentUnit], deps(model));

    const prompt = model.requests[0]?.prompt ?? '';
    expect(prompt).toContain(
      `### Todo task-a\nTask: Send the budget report\n\nRelated content:\n--- chat general:1 ---\n${sentUnit.text}`
    );
    expect(prompt).not.toContain('task-d');
  });

  test('should classify a confidence equal to the done threshold as done', async () => {
    const model = new ScriptedModelClient().replyJson('completion-detection', {
      completions: [{ todo_id: 'task-a', is_completed: true, confidence: 0.7 }],
    });

    const outcome = await detectCompletions(
      [report],
      [sentUnit],
      deps(model, { thresholds: { done: 0.7, tentative: 0.4 } })
    );

    expect(outcome.verdicts[0]?.verdict).toBe('done');
  });

  test('should keep a task open when the model says it is not completed', async () => {
    const model = new ScriptedModelClient().replyJson('completion-detection', {
      completions: [{ todo_id: 'task-a', is_completed: false, confidence: 0.95 }],
    });

    const outcome = await detectCompletions([report], [sentUnit], deps(model));

    expect(outcome.verdicts).toEqual([
      { taskId: 'task-a', verdict: 'still_open', confidence: 0, evidence: null, relatedUnits: 1 },
    ]);
  });

  test('should skip the model when no task has related content', async () => {
    const model = new ScriptedModelClient();

    const outcome = await detectCompletions([passport], [sentUnit], deps(model));

    expect(model.requests).toEqual([]);
    expect(outcome.modelCalls).toBe(0);
    expect(outcome.verdicts).toEqual([
      { taskId: 'task-d', verdict: 'still_open', confidence: 0, evidence: null, relatedUnits: 0 },
    ]);
  });

  test('should leave every task open when the model fails', async () => {
    const model = new ScriptedModelClient().reply(
      'completion-detection',
      new ModelInvocationError('invalid api key', 'permanent', { status: 401 })
    );

    const outcome = await detectCompletions([report, flights], [sentUnit, bookedUnit], deps(model));

    expect(outcome.failure).toBeInstanceOf(CompletionDetectionFailed);
    expect(outcome.failure?.attempts).toBe(1);
    expect(outcome.verdicts.map((verdict) => verdict.verdict)).toEqual(['still_open', 'still_open']);
  });
});
