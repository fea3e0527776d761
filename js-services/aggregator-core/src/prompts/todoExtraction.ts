import type { FeatureFlags } from '../config';
import type { ContentSource, ContentUnit, IdentityFilters } from '../types';
import { CONTENT_SOURCES } from '../types';
import { primaryName } from '../utils/identity';

const SOURCE_HEADINGS: Record<ContentSource, string> = {
  chat: 'CHAT',
  email: 'EMAIL',
  meeting: 'MEETINGS',
  'store-note': 'NOTES',
};

const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

export interface TodoExtractionPromptInput {
  units: readonly ContentUnit[];
  identity: IdentityFilters;
  features: FeatureFlags;
  highPriorityKeywords: readonly string[];
  now: Date;
}

export interface TodoExtractionPrompt {
  system: string;
  prompt: string;
  /** markers[n] is the unit tagged [SOURCE:n] */
  markers: ContentUnit[];
}

function buildIdentitySection(identity: IdentityFilters): string {
  const name = primaryName(identity);
  const lines = [`- Name variations: ${identity.names.join(', ')}`];
  if (identity.chatHandle) {
    lines.push(
      `- Chat handle: @${identity.chatHandle} (messages from this handle are ${name}'s own words)`
    );
  }
  if (identity.email) {
    lines.push(`- Email: ${identity.email}`);
  }
  return lines.join('\n');
}

function buildFieldInstructions(
  features: FeatureFlags,
  highPriorityKeywords: readonly string[],
  now: Date
): string {
  const today = now.toISOString().slice(0, 10);
  const dayName = WEEKDAYS[now.getUTCDay()] ?? '';

  const dueDate = features.dueDateInference
    ? `- due_date: Extract or infer the date in YYYY-MM-DD format:
  - "today" -> ${today}
  - "tomorrow" -> the next day
  - "by end of week" -> Friday of the current week
  - "next Monday", "within 2 days" -> the specific date
  - null when no date is mentioned
  (Today is ${today}, ${dayName})`
    : '- due_date: YYYY-MM-DD when a date is stated explicitly, otherwise null';

  const priority = features.priorityScoring
    ? `- priority: Urgency level:
  - "high": urgency signals (${highPriorityKeywords.join(', ')}), due within 48 hours, or asked by leadership
  - "medium": due within a week, normal requests
  - "low": no urgency signals, flexible timeline`
    : '- priority: always "medium"';

  const category = features.categoryTagging
    ? `- category: Array of applicable tags:
  - "follow-up": waiting on someone else, need to check in
  - "review": documents, PRs, designs to review or approve
  - "meeting": schedule or prepare for meetings and calls
  - "finance": budget, invoices, expenses, payments
  - "hr": hiring, onboarding, team management
  - "technical": code, bugs, infrastructure, deployments
  - "communication": emails, messages, calls to make`
    : '- category: always []';

  return [
    '- task: Clear, concise imperative description',
    '- assigned_to: Name of the person who owns the todo, or null if unspecified',
    dueDate,
    priority,
    category,
    '- source_ids: Array of the [SOURCE:N] numbers the todo was found in (e.g. [5])',
    '- source: Platform the todo came from: "chat", "email", "meeting" or "store-note"',
    '- source_context: Brief excerpt of the message the todo came from',
    '- confidence: Certainty that the todo belongs to the user, 0.0 to 1.0',
    '- type: "explicit" (direct request) or "implicit" (self-commitment)',
  ].join('\n');
}

/**
 * Build the todo extraction prompt for one run
 *
 * Units are grouped by source and each one is tagged [SOURCE:n] so the model
 * can point back to where a todo was found.
 */
export function buildTodoExtractionPrompt(input: TodoExtractionPromptInput): TodoExtractionPrompt {
  const { identity } = input;
  const name = primaryName(identity);
  const handle = identity.chatHandle ? `@${identity.chatHandle}` : name;

  const markers: ContentUnit[] = [];
  const sections: string[] = [];

  for (const source of CONTENT_SOURCES) {
    const units = input.units.filter((unit) => unit.source === source);
    if (units.length === 0) continue;

    sections.push(`=== ${SOURCE_HEADINGS[source]} ===`);
    for (const unit of units) {
      sections.push(`[SOURCE:${markers.length}]\n${unit.text}`);
      markers.push(unit);
    }
    sections.push('');
  }

  const system = `
You are extracting todos specifically for ${name}.

## User Identity
${buildIdentitySection(identity)}

## Message Format
- **Chat**: "[timestamp] @handle: message" shows WHO sent each message
- **Email**: subject, sender and recipients, then the body
- **Meetings**: transcript segments with the attendee list
- **Notes**: pages from ${name}'s own task workspace

## Your Task

Analyze each conversation or email thread as a whole. Consider who is talking to whom, what commitments are made, and who is responsible for what.

**Only return a todo if ${name} is clearly the intended owner**, either because:
- ${name} agreed to do something (messages FROM ${handle})
- ${name} was clearly the recipient of a request or assignment
- An email or message is directly addressed to ${name} with an actionable ask

**Do not extract todos that belong to other people.** When ${name} asks someone else to do something, the task belongs to the other person.

**Do NOT create todos for:**
- Calendar invites or "attend [meeting]"
- Requests already resolved within the same thread ("thanks, got it")
- Automated notifications from noreply@, notifications@ or bulk mailers

For each todo, provide:
${buildFieldInstructions(input.features, input.highPriorityKeywords, input.now)}

## Output

Return ONLY a JSON object of this shape, no additional text:
{
  "todos": [
    {
      "task": "Send the Q3 budget draft to finance",
      "assigned_to": null,
      "due_date": "YYYY-MM-DD or null",
      "priority": "high",
      "category": ["finance"],
      "source_ids": [0],
      "source": "chat",
      "source_context": "Can you send the budget draft by Friday?",
      "confidence": 0.85,
      "type": "explicit"
    }
  ]
}
Return {"todos": []} when there is nothing actionable for ${name}.
`.trim();

  const prompt = `Content to analyze:\n\n${sections.join('\n')}`;

  return { system, prompt, markers };
}
