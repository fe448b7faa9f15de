/**
 * Feedback data access interface.
 */

import type { FeedbackRow, NewFeedbackRow } from '../types/database.js';

export interface IFeedbackRepository {
  insert(row: NewFeedbackRow): Promise<FeedbackRow>;

  findById(id: string): Promise<FeedbackRow | null>;

  /** Returns null when no row has this id. */
  updateStatus(id: string, status: string): Promise<FeedbackRow | null>;

  /** Number of stored rows submitted under this citizen reference. */
  countByCitizen(citizenRef: string): Promise<number>;

  /** Rows with `submitted_at` in [start, end] (ISO-8601), oldest first. */
  findSubmittedBetween(start: string, end: string): Promise<FeedbackRow[]>;
}
