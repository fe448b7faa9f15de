/**
 * Prompt templates for the remote endpoint.
 * Compiled at import, so a template/slot mismatch stops the process at startup.
 */

import { compileTemplate } from '../lib/template.js';
import { CATEGORIES, URGENCIES } from '../types/models.js';

const categoryList = CATEGORIES.join(', ');
const urgencyList = URGENCIES.join(', ');

export const CLASSIFY_SYSTEM = `You triage civic feedback submitted by citizens to their city.
Answer with a single JSON object and nothing else:
{"category": string, "urgency": string, "isSpam": boolean, "confidence": number}
- category: exactly one of ${categoryList}
- urgency: exactly one of ${urgencyList}
  (critical = immediate danger to people; high = essential service failing;
  medium = significant inconvenience; low = cosmetic or routine)
- isSpam: true for advertising, gibberish or text unrelated to civic issues
- confidence: your confidence in the category, from 0 to 1`;

export const classifyPrompt = compileTemplate(
  'classify',
  'Feedback:\n"""\n{{text}}\n"""',
  ['text']
);

export const GUIDANCE_SYSTEM = `You write responses to citizens on behalf of a city administration,
and short action plans for the officials who will handle the report.
Answer with a single JSON object and nothing else:
{"citizenMessage": string, "actionPlan": string[]}
- citizenMessage: 2-3 sentences that acknowledge the issue, give immediate guidance
  and set expectations. No specific timeline promises unless urgency is critical.
- actionPlan: ordered, concrete steps for officials (assignment, inspection,
  resources, follow-up), at most 8 steps.`;

export const guidancePrompt = compileTemplate(
  'guidance',
  [
    'Category: {{category}}',
    'Urgency: {{urgency}}',
    'Submitted: {{submittedOn}}',
    'Feedback:',
    '"""',
    '{{text}}',
    '"""',
  ].join('\n'),
  ['category', 'urgency', 'submittedOn', 'text']
);

export const NARRATIVE_SYSTEM = `You write executive summaries of civic feedback for city officials.
Answer with a single JSON object and nothing else:
{"narrative": string}
The narrative covers the main areas of concern, urgency trends, resolution
performance and recommended actions, in at most 200 words.`;

export const narrativePrompt = compileTemplate(
  'narrative',
  [
    'Period: {{periodStart}} to {{periodEnd}}',
    'Total feedback: {{totalCount}} ({{spamCount}} flagged as spam)',
    'Resolved: {{resolvedCount}} (resolution rate {{resolutionRate}})',
    'By category: {{categoryCounts}}',
    'By urgency: {{urgencyDistribution}}',
  ].join('\n'),
  [
    'periodStart',
    'periodEnd',
    'totalCount',
    'spamCount',
    'resolvedCount',
    'resolutionRate',
    'categoryCounts',
    'urgencyDistribution',
  ]
);
