import type { ContentUnit, ExistingTask } from '../types';

export interface CompletionCheck {
  task: ExistingTask;
  relatedUnits: readonly ContentUnit[];
}

/**
 * Build the batched completion detection prompt.
 *
 * Every task is listed with the content judged related to it; the model
 * answers for all of them in one response.
 */
export function buildCompletionDetectionPrompt(checks: readonly CompletionCheck[]): {
  system: string;
  prompt: string;
} {
  const system = `
You are analyzing recent messages to detect whether open todos have ACTUALLY been completed.

**BE CONSERVATIVE.** Only report a todo as completed when there is clear evidence that the deliverable was sent, finished or received.

Valid completion signals:
- The owner saying they DID the action: "I sent it", "Done!", "Just finished", "Attached"
- The recipient confirming RECEIPT of the deliverable: "Got it, thanks!", "Received the document"
- Explicit status: "Done", "Completed", "Finished"

NOT valid completion signals:
- Acknowledging a commitment or timeline: "Thanks for the update", "Sounds good"
- Future tense: "I'll send it tomorrow", "Will do"
- Someone else doing a related but different task
- General thank-yous that don't confirm receipt of the specific deliverable

Return ONLY a JSON object of this shape, no additional text:
{
  "completions": [
    {
      "todo_id": "id of the todo",
      "is_completed": true,
      "confidence": 0.9,
      "evidence": "Quote from the content showing completion"
    }
  ]
}
Use a confidence between 0.0 and 1.0. Todos without completion evidence may be omitted.
When in doubt, do NOT mark a todo as completed.
`.trim();

  const blocks = checks.map(({ task, relatedUnits }) => {
    const content = relatedUnits
      .map((unit) => `--- ${unit.source} ${unit.sourceId} ---\n${unit.text}`)
      .join('\n');
    return `### Todo ${task.id}\nTask: ${task.task}${
      task.assignee ? `\nAssignee: ${task.assignee}` : ''
    }\n\nRelated content:\n${content}`;
  });

  return {
    system,
    prompt: `Open todos and recent related content:\n\n${blocks.join('\n\n')}`,
  };
}
