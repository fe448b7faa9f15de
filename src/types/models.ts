/**
 * Domain models: core entities as the triage pipeline understands them.
 * Decoupled from both API shapes and database row shapes.
 */

// ── Closed enumerations ──

/**
 * Feedback categories, highest priority first.
 * The order doubles as the tie-break when two categories score the same.
 */
export const CATEGORIES = [
  'safety',
  'water',
  'electricity',
  'infrastructure',
  'traffic',
  'sanitation',
  'other',
] as const;

export type Category = (typeof CATEGORIES)[number];

/** Urgency scale, lowest first. */
export const URGENCIES = ['low', 'medium', 'high', 'critical'] as const;

export type Urgency = (typeof URGENCIES)[number];

export const FEEDBACK_STATUSES = ['pending', 'in_progress', 'resolved', 'rejected'] as const;

export type FeedbackStatus = (typeof FEEDBACK_STATUSES)[number];

/** Which path produced a result. */
export type ResultSource = 'remote' | 'fallback';

export function isCategory(value: unknown): value is Category {
  return typeof value === 'string' && (CATEGORIES as readonly string[]).includes(value);
}

export function isUrgency(value: unknown): value is Urgency {
  return typeof value === 'string' && (URGENCIES as readonly string[]).includes(value);
}

export function isFeedbackStatus(value: unknown): value is FeedbackStatus {
  return typeof value === 'string' && (FEEDBACK_STATUSES as readonly string[]).includes(value);
}

/** Position on the urgency scale, 0 for `low`. */
export function urgencyRank(urgency: Urgency): number {
  return URGENCIES.indexOf(urgency);
}

// ── Core Entities ──

/** Citizen submission. Owned by the caller; never mutated by the core. */
export interface FeedbackItem {
  readonly text: string;
  readonly timestamp: Date;
  readonly citizenRef?: string;
}

export interface Classification {
  category: Category;
  urgency: Urgency;
  isSpam: boolean;
  /** In [0, 1]. */
  confidence: number;
  source: ResultSource;
}

export interface Guidance {
  citizenMessage: string;
  /** Ordered steps for officials. Empty for spam. */
  actionPlan: string[];
  source: ResultSource;
}

export interface ClassifiedFeedback {
  item: FeedbackItem;
  classification: Classification;
  status: FeedbackStatus;
}

export interface SummaryReport {
  readonly periodStart: Date;
  readonly periodEnd: Date;
  readonly totalCount: number;
  readonly resolvedCount: number;
  readonly spamCount: number;
  /** Non-zero counts only. */
  readonly categoryCounts: Partial<Record<Category, number>>;
  /** Non-zero counts only. */
  readonly urgencyDistribution: Partial<Record<Urgency, number>>;
  /** resolvedCount / totalCount, 0 when the window is empty. */
  readonly resolutionRate: number;
  readonly narrative: string;
  readonly source: ResultSource;
}

/** Stored feedback record, as the intake facade returns it. */
export interface FeedbackRecord {
  id: string;
  item: FeedbackItem;
  classification: Classification;
  guidance: Guidance;
  priorityScore: number;
  status: FeedbackStatus;
}
