/**
 * Summary aggregator.
 * Pure reduction over a reporting window; only the narrative may come from
 * the remote endpoint, with a phrase-template fallback built from the same
 * statistics.
 */

import { z } from 'zod';
import type { ICompletionProvider } from '../providers/ICompletionProvider.js';
import {
  CATEGORIES,
  URGENCIES,
  urgencyRank,
  type Category,
  type ClassifiedFeedback,
  type ResultSource,
  type SummaryReport,
  type Urgency,
} from '../types/models.js';
import { withDeadline } from '../lib/deadline.js';
import { NARRATIVE_SYSTEM, narrativePrompt } from './prompts.js';
import { malformed } from './RemoteClassificationClient.js';
import type { RemoteRunner } from './RemoteRunner.js';

/** Resolution rate considered on target. */
export const RESOLUTION_TARGET = 0.7;

export interface SummaryStatistics {
  totalCount: number;
  resolvedCount: number;
  spamCount: number;
  categoryCounts: Partial<Record<Category, number>>;
  urgencyDistribution: Partial<Record<Urgency, number>>;
  resolutionRate: number;
}

interface Narrative {
  text: string;
  source: ResultSource;
}

const RemoteNarrativeSchema = z.object({
  narrative: z.string().trim().min(1),
});

/** Items whose timestamp falls inside [periodStart, periodEnd]. */
export function selectWindow(
  items: readonly ClassifiedFeedback[],
  periodStart: Date,
  periodEnd: Date
): ClassifiedFeedback[] {
  const start = periodStart.getTime();
  const end = periodEnd.getTime();
  return items.filter(({ item }) => {
    const at = item.timestamp.getTime();
    return at >= start && at <= end;
  });
}

export function computeStatistics(items: readonly ClassifiedFeedback[]): SummaryStatistics {
  const categoryTally = new Map<Category, number>();
  const urgencyTally = new Map<Urgency, number>();
  let resolvedCount = 0;
  let spamCount = 0;

  for (const { classification, status } of items) {
    categoryTally.set(classification.category, (categoryTally.get(classification.category) ?? 0) + 1);
    urgencyTally.set(classification.urgency, (urgencyTally.get(classification.urgency) ?? 0) + 1);
    if (status === 'resolved') resolvedCount++;
    if (classification.isSpam) spamCount++;
  }

  // Keys in enumeration order so serialized reports are stable.
  const categoryCounts: Partial<Record<Category, number>> = {};
  for (const category of CATEGORIES) {
    const count = categoryTally.get(category);
    if (count) categoryCounts[category] = count;
  }
  const urgencyDistribution: Partial<Record<Urgency, number>> = {};
  for (const urgency of URGENCIES) {
    const count = urgencyTally.get(urgency);
    if (count) urgencyDistribution[urgency] = count;
  }

  const totalCount = items.length;
  return {
    totalCount,
    resolvedCount,
    spamCount,
    categoryCounts,
    urgencyDistribution,
    resolutionRate: totalCount === 0 ? 0 : resolvedCount / totalCount,
  };
}

export class SummaryService {
  constructor(
    private readonly runner: RemoteRunner,
    private readonly provider: ICompletionProvider | null
  ) {}

  async summarize(
    items: readonly ClassifiedFeedback[],
    periodStart: Date,
    periodEnd: Date,
    signal?: AbortSignal
  ): Promise<SummaryReport> {
    const stats = computeStatistics(selectWindow(items, periodStart, periodEnd));

    const provider = this.provider;
    const call =
      provider && stats.totalCount > 0
        ? (timeoutMs: number, callSignal: AbortSignal) =>
            this.narrateRemote(provider, stats, periodStart, periodEnd, timeoutMs, callSignal)
        : null;

    const narrative = await this.runner.run<Narrative>(
      'summary',
      call,
      () => ({ text: fallbackNarrative(stats, periodStart, periodEnd), source: 'fallback' }),
      signal
    );

    return Object.freeze({
      periodStart: new Date(periodStart.getTime()),
      periodEnd: new Date(periodEnd.getTime()),
      ...stats,
      narrative: narrative.text,
      source: narrative.source,
    });
  }

  private async narrateRemote(
    provider: ICompletionProvider,
    stats: SummaryStatistics,
    periodStart: Date,
    periodEnd: Date,
    timeoutMs: number,
    signal: AbortSignal
  ): Promise<Narrative> {
    const prompt = narrativePrompt.render({
      periodStart: formatDay(periodStart),
      periodEnd: formatDay(periodEnd),
      totalCount: String(stats.totalCount),
      spamCount: String(stats.spamCount),
      resolvedCount: String(stats.resolvedCount),
      resolutionRate: `${percent(stats.resolutionRate)}%`,
      categoryCounts: JSON.stringify(stats.categoryCounts),
      urgencyDistribution: JSON.stringify(stats.urgencyDistribution),
    });

    const raw = await withDeadline(
      (callSignal) => provider.completeJson({ system: NARRATIVE_SYSTEM, prompt }, callSignal),
      timeoutMs,
      signal
    );

    const parsed = RemoteNarrativeSchema.safeParse(raw);
    if (!parsed.success) {
      throw malformed('narrative', parsed.error);
    }
    return { text: parsed.data.narrative, source: 'remote' };
  }
}

/** Narrative from fixed phrase templates over the statistics. */
export function fallbackNarrative(
  stats: SummaryStatistics,
  periodStart: Date,
  periodEnd: Date
): string {
  const period = `between ${formatDay(periodStart)} and ${formatDay(periodEnd)}`;
  if (stats.totalCount === 0) {
    return `No feedback was received ${period}.`;
  }

  const top = topCategory(stats.categoryCounts);
  const topCount = stats.categoryCounts[top] ?? 0;
  const urgentCount = URGENCIES.filter((u) => urgencyRank(u) >= urgencyRank('high')).reduce(
    (sum, u) => sum + (stats.urgencyDistribution[u] ?? 0),
    0
  );

  const sentences = [
    `${items(stats.totalCount)} received ${period}.`,
    `${percent(topCount / stats.totalCount)}% of feedback this period was ${top}.`,
    `${stats.resolvedCount} of ${stats.totalCount} resolved (${percent(stats.resolutionRate)}% resolution rate).`,
  ];
  if (urgentCount > 0) {
    sentences.push(`${items(urgentCount)} rated high or critical urgency.`);
  }
  if (stats.spamCount > 0) {
    sentences.push(`${items(stats.spamCount)} flagged as spam.`);
  }
  sentences.push(
    stats.resolutionRate >= RESOLUTION_TARGET
      ? `Resolution performance meets the ${percent(RESOLUTION_TARGET)}% target.`
      : `Resolution performance is below the ${percent(RESOLUTION_TARGET)}% target; prioritise ${top} issues.`
  );

  return sentences.join(' ');
}

/** Most frequent category; ties go to the category listed first. */
function topCategory(counts: Partial<Record<Category, number>>): Category {
  let best: Category = 'other';
  let bestCount = 0;
  for (const category of CATEGORIES) {
    const count = counts[category] ?? 0;
    if (count > bestCount) {
      best = category;
      bestCount = count;
    }
  }
  return best;
}

function items(n: number): string {
  return n === 1 ? '1 item was' : `${n} items were`;
}

function percent(ratio: number): number {
  return Math.round(ratio * 100);
}

function formatDay(date: Date): string {
  return Number.isNaN(date.getTime()) ? 'an unknown date' : date.toISOString().slice(0, 10);
}
