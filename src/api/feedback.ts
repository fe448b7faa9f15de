/**
 * Feedback endpoints.
 * POST /api/v1/feedback       Classify a submission and return guidance
 * PUT  /api/v1/feedback/:id   Change the status of stored feedback
 */

import { pipeline, SOURCE_HEADER } from '../middleware/index.js';
import {
  readOptionalString,
  readString,
  requireBody,
  validateBody,
} from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { FeedbackResponse } from '../types/api.js';
import { FEEDBACK_STATUSES, isFeedbackStatus, type FeedbackRecord } from '../types/models.js';
import { ValidationError } from '../errors.js';

const submitSchema: BodySchema = {
  text: { type: 'string', required: true },
  timestamp: { type: 'string', required: true },
  citizenRef: { type: 'string', required: false, maxLength: 200 },
};

const statusSchema: BodySchema = {
  status: { type: 'string', required: true, enum: FEEDBACK_STATUSES },
};

export function toFeedbackResponse(record: FeedbackRecord): FeedbackResponse {
  const { classification, guidance } = record;
  return {
    id: record.id,
    category: classification.category,
    urgency: classification.urgency,
    isSpam: classification.isSpam,
    confidence: classification.confidence,
    source: classification.source,
    priorityScore: record.priorityScore,
    status: record.status,
    guidance: {
      citizenMessage: guidance.citizenMessage,
      actionPlan: guidance.actionPlan,
      source: guidance.source,
    },
  };
}

export function createFeedbackHandlers(container: Container) {
  const submit: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.rateLimit.submitFeedback,
    validateBody(submitSchema)
  )(async (req, ctx) => {
    const body = requireBody(ctx.body);

    // A client disconnect aborts the remote call and falls through to the fallback.
    const result = await container.feedbackService.submit(
      {
        text: readString(body, 'text'),
        timestamp: readString(body, 'timestamp'),
        citizenRef: readOptionalString(body, 'citizenRef'),
      },
      req.signal
    );

    if (!result.ok) {
      throw result.error;
    }

    return new Response(JSON.stringify(toFeedbackResponse(result.value)), {
      status: 201,
      headers: {
        'Content-Type': 'application/json',
        [SOURCE_HEADER]: result.value.classification.source,
      },
    });
  });

  const updateStatus: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.rateLimit.updateStatus,
    validateBody(statusSchema)
  )(async (req, ctx) => {
    const parts = new URL(req.url).pathname.split('/').filter(Boolean);
    const id = decodeURIComponent(parts[parts.length - 1] ?? '');

    const status = readString(requireBody(ctx.body), 'status');
    if (!isFeedbackStatus(status)) {
      throw new ValidationError(`status must be one of: ${FEEDBACK_STATUSES.join(', ')}`);
    }

    const record = await container.feedbackService.updateStatus(id, status);

    return new Response(JSON.stringify(toFeedbackResponse(record)), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  return { submit, updateStatus };
}
