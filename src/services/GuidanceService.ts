/**
 * Guidance and action-plan generator.
 *
 * Remote generation first; otherwise a fixed table (data/guidance.json)
 * keyed by category, with one citizen message per urgency and an action-plan
 * skeleton whose urgent steps are prepended for high and critical items.
 * Spam gets a resubmission request and no action plan, without a remote call.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { ICompletionProvider } from '../providers/ICompletionProvider.js';
import {
  CATEGORIES,
  urgencyRank,
  type Category,
  type Classification,
  type FeedbackItem,
  type Guidance,
  type Urgency,
} from '../types/models.js';
import { compileTemplate, type Template } from '../lib/template.js';
import { withDeadline } from '../lib/deadline.js';
import { TemplateError } from '../errors.js';
import { GUIDANCE_SYSTEM, guidancePrompt } from './prompts.js';
import { malformed } from './RemoteClassificationClient.js';
import type { RemoteRunner } from './RemoteRunner.js';

export const GUIDANCE_SLOTS = ['department', 'timeline', 'reference', 'submittedOn'] as const;

export type GuidanceSlot = (typeof GUIDANCE_SLOTS)[number];

/** Used for `reference` when the item has no citizen reference. */
export const DEFAULT_REFERENCE = 'your report';
/** Used for `submittedOn` when the timestamp is not a valid date. */
export const DEFAULT_SUBMITTED_ON = 'recently';

interface CategoryGuidance {
  department: string;
  messages: Record<Urgency, Template<GuidanceSlot>>;
  urgentSteps: Template<GuidanceSlot>[];
  steps: Template<GuidanceSlot>[];
}

export interface GuidanceTable {
  timelines: Record<Urgency, string>;
  spamMessage: Template<GuidanceSlot>;
  categories: ReadonlyMap<Category, CategoryGuidance>;
}

const Text = z.string().trim().min(1);
const PerUrgency = z.object({ low: Text, medium: Text, high: Text, critical: Text });

const GuidanceFileSchema = z.object({
  timelines: PerUrgency,
  spam: z.object({ message: Text }),
  categories: z.record(
    z.enum(CATEGORIES),
    z.object({
      department: Text,
      messages: PerUrgency,
      urgentSteps: z.array(Text),
      steps: z.array(Text).min(1),
    })
  ),
});

export const RemoteGuidanceSchema = z.object({
  citizenMessage: Text,
  actionPlan: z.array(Text).max(12),
});

function compile(name: string, source: string): Template<GuidanceSlot> {
  return compileTemplate(name, source, GUIDANCE_SLOTS, { requireAll: false });
}

/** Validate raw table data and compile every template in it. */
export function compileGuidanceTable(data: unknown): GuidanceTable {
  const file = GuidanceFileSchema.parse(data);
  const categories = new Map<Category, CategoryGuidance>();

  for (const category of CATEGORIES) {
    const entry = file.categories[category];
    if (!entry) {
      throw new TemplateError(`guidance.${category}`, 'category has no guidance entry');
    }
    const prefix = `guidance.${category}`;
    categories.set(category, {
      department: entry.department,
      messages: {
        low: compile(`${prefix}.messages.low`, entry.messages.low),
        medium: compile(`${prefix}.messages.medium`, entry.messages.medium),
        high: compile(`${prefix}.messages.high`, entry.messages.high),
        critical: compile(`${prefix}.messages.critical`, entry.messages.critical),
      },
      urgentSteps: entry.urgentSteps.map((s, i) => compile(`${prefix}.urgentSteps.${i}`, s)),
      steps: entry.steps.map((s, i) => compile(`${prefix}.steps.${i}`, s)),
    });
  }

  return {
    timelines: file.timelines,
    spamMessage: compile('guidance.spam', file.spam.message),
    categories,
  };
}

const DEFAULT_TABLE_URL = new URL('../../data/guidance.json', import.meta.url);

let cached: GuidanceTable | null = null;

/** The table shipped in data/guidance.json, loaded on first use. */
export function defaultGuidanceTable(): GuidanceTable {
  if (cached) return cached;
  const raw: unknown = JSON.parse(readFileSync(DEFAULT_TABLE_URL, 'utf8'));
  cached = compileGuidanceTable(raw);
  return cached;
}

export class GuidanceService {
  constructor(
    private readonly runner: RemoteRunner,
    private readonly provider: ICompletionProvider | null,
    private readonly table: GuidanceTable = defaultGuidanceTable()
  ) {}

  async generateGuidance(
    item: FeedbackItem,
    classification: Classification,
    signal?: AbortSignal
  ): Promise<Guidance> {
    const provider = this.provider;
    const call =
      provider && !classification.isSpam
        ? (timeoutMs: number, callSignal: AbortSignal) =>
            this.generateRemote(provider, item, classification, timeoutMs, callSignal)
        : null;

    return this.runner.run(
      'guidance',
      call,
      () => this.fallbackGuidance(item, classification),
      signal
    );
  }

  /** Deterministic guidance from the template table. */
  fallbackGuidance(item: FeedbackItem, classification: Classification): Guidance {
    const entry = this.entryFor(classification.category);
    const values: Record<GuidanceSlot, string> = {
      department: entry.department,
      timeline: this.table.timelines[classification.urgency],
      reference: item.citizenRef ? `your report (citizen ${item.citizenRef})` : DEFAULT_REFERENCE,
      submittedOn: formatDate(item.timestamp),
    };

    if (classification.isSpam) {
      return {
        citizenMessage: capitalize(this.table.spamMessage.render(values)),
        actionPlan: [],
        source: 'fallback',
      };
    }

    const urgent = urgencyRank(classification.urgency) >= urgencyRank('high');
    const steps = urgent ? [...entry.urgentSteps, ...entry.steps] : entry.steps;

    return {
      citizenMessage: capitalize(entry.messages[classification.urgency].render(values)),
      actionPlan: steps.map((step) => step.render(values)),
      source: 'fallback',
    };
  }

  private async generateRemote(
    provider: ICompletionProvider,
    item: FeedbackItem,
    classification: Classification,
    timeoutMs: number,
    signal: AbortSignal
  ): Promise<Guidance> {
    const prompt = guidancePrompt.render({
      category: classification.category,
      urgency: classification.urgency,
      submittedOn: formatDate(item.timestamp),
      text: item.text,
    });

    const raw = await withDeadline(
      (callSignal) => provider.completeJson({ system: GUIDANCE_SYSTEM, prompt }, callSignal),
      timeoutMs,
      signal
    );

    const parsed = RemoteGuidanceSchema.safeParse(raw);
    if (!parsed.success) {
      throw malformed('guidance', parsed.error);
    }

    return { ...parsed.data, source: 'remote' };
  }

  private entryFor(category: Category): CategoryGuidance {
    const entry = this.table.categories.get(category);
    if (!entry) {
      // compileGuidanceTable guarantees an entry per category
      throw new TemplateError(`guidance.${category}`, 'category has no guidance entry');
    }
    return entry;
  }
}

function formatDate(date: Date): string {
  return Number.isNaN(date.getTime()) ? DEFAULT_SUBMITTED_ON : date.toISOString().slice(0, 10);
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
