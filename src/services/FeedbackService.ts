/**
 * Feedback intake: precondition checks, classification, guidance, priority
 * and storage, plus status updates and summaries over stored feedback.
 */

import type { IFeedbackRepository } from '../repositories/IFeedbackRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { FeedbackRow } from '../types/database.js';
import type { Result } from '../types/common.js';
import {
  isCategory,
  isFeedbackStatus,
  isUrgency,
  type ClassifiedFeedback,
  type FeedbackItem,
  type FeedbackRecord,
  type FeedbackStatus,
  type ResultSource,
  type SummaryReport,
} from '../types/models.js';
import { InputError, NotFoundError } from '../errors.js';
import type { ClassificationService } from './ClassificationService.js';
import type { GuidanceService } from './GuidanceService.js';
import type { SummaryService } from './SummaryService.js';
import { priorityScore } from './priority.js';

/** Longest text even the fallback will process. */
export const MAX_TEXT_LENGTH = 5000;

export interface SubmitFeedbackInput {
  text: string;
  timestamp: Date | string;
  citizenRef?: string;
}

export class FeedbackService {
  constructor(
    private readonly classification: ClassificationService,
    private readonly guidance: GuidanceService,
    private readonly summary: SummaryService,
    private readonly feedbackRepo: IFeedbackRepository,
    private readonly logger: ILogProvider
  ) {}

  /** Build an immutable FeedbackItem, or the InputError that prevents it. */
  toItem(input: SubmitFeedbackInput): Result<FeedbackItem, InputError> {
    if (input.text.length > MAX_TEXT_LENGTH) {
      return {
        ok: false,
        error: new InputError(
          'text_too_long',
          `text must be ${MAX_TEXT_LENGTH} characters or less`,
          { length: input.text.length, max: MAX_TEXT_LENGTH }
        ),
      };
    }

    const timestamp = input.timestamp instanceof Date ? input.timestamp : new Date(input.timestamp);
    if (Number.isNaN(timestamp.getTime())) {
      return {
        ok: false,
        error: new InputError('invalid_timestamp', 'timestamp must be a valid date'),
      };
    }

    return {
      ok: true,
      value: Object.freeze({
        text: input.text,
        timestamp: new Date(timestamp.getTime()),
        ...(input.citizenRef ? { citizenRef: input.citizenRef } : {}),
      }),
    };
  }

  async submit(
    input: SubmitFeedbackInput,
    signal?: AbortSignal
  ): Promise<Result<FeedbackRecord, InputError>> {
    const checked = this.toItem(input);
    if (!checked.ok) return checked;
    const item = checked.value;

    const classification = await this.classification.classify(item.text, signal);
    const guidance = await this.guidance.generateGuidance(item, classification, signal);
    const priorSubmissions = item.citizenRef
      ? await this.feedbackRepo.countByCitizen(item.citizenRef)
      : 0;
    const score = priorityScore(classification, item.text, priorSubmissions);

    const row = await this.feedbackRepo.insert({
      text: item.text,
      submitted_at: item.timestamp.toISOString(),
      citizen_ref: item.citizenRef ?? null,
      category: classification.category,
      urgency: classification.urgency,
      is_spam: classification.isSpam,
      confidence: classification.confidence,
      classification_source: classification.source,
      citizen_message: guidance.citizenMessage,
      action_plan: guidance.actionPlan,
      guidance_source: guidance.source,
      priority_score: score,
      status: 'pending',
    });

    this.logger.info('feedback classified', {
      id: row.id,
      category: classification.category,
      urgency: classification.urgency,
      isSpam: classification.isSpam,
      classificationSource: classification.source,
      guidanceSource: guidance.source,
    });

    return { ok: true, value: rowToRecord(row) };
  }

  async updateStatus(id: string, status: FeedbackStatus): Promise<FeedbackRecord> {
    const row = await this.feedbackRepo.updateStatus(id, status);
    if (!row) {
      throw new NotFoundError(`Feedback "${id}" not found`);
    }
    return rowToRecord(row);
  }

  /** Summary over stored feedback; rows written after this call starts are not included. */
  async summarizeStored(
    periodStart: Date,
    periodEnd: Date,
    signal?: AbortSignal
  ): Promise<SummaryReport> {
    const rows = await this.feedbackRepo.findSubmittedBetween(
      periodStart.toISOString(),
      periodEnd.toISOString()
    );
    const items: ClassifiedFeedback[] = rows.map((row) => {
      const record = rowToRecord(row);
      return { item: record.item, classification: record.classification, status: record.status };
    });
    return this.summary.summarize(items, periodStart, periodEnd, signal);
  }
}

function toSource(value: string): ResultSource {
  return value === 'remote' ? 'remote' : 'fallback';
}

export function rowToRecord(row: FeedbackRow): FeedbackRecord {
  const { category, urgency, status } = row;
  if (!isCategory(category) || !isUrgency(urgency) || !isFeedbackStatus(status)) {
    throw new Error(`Feedback row "${row.id}" has values outside the known enumerations`);
  }

  return {
    id: row.id,
    item: {
      text: row.text,
      timestamp: new Date(row.submitted_at),
      ...(row.citizen_ref ? { citizenRef: row.citizen_ref } : {}),
    },
    classification: {
      category,
      urgency,
      isSpam: row.is_spam,
      confidence: row.confidence,
      source: toSource(row.classification_source),
    },
    guidance: {
      citizenMessage: row.citizen_message,
      actionPlan: row.action_plan,
      source: toSource(row.guidance_source),
    },
    priorityScore: row.priority_score,
    status,
  };
}
