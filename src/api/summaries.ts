/**
 * Summary endpoints.
 * POST /api/v1/summaries  Summarise the items sent in the body
 * GET  /api/v1/summaries?periodStart=&periodEnd=  Summarise stored feedback
 */

import { z } from 'zod';
import { pipeline, SOURCE_HEADER } from '../middleware/index.js';
import { readString, requireBody, validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { SummaryResponse } from '../types/api.js';
import {
  CATEGORIES,
  FEEDBACK_STATUSES,
  URGENCIES,
  type ClassifiedFeedback,
  type SummaryReport,
} from '../types/models.js';
import { ValidationError } from '../errors.js';

const MAX_ITEMS = 10_000;

const summarySchema: BodySchema = {
  periodStart: { type: 'string', required: true, date: true },
  periodEnd: { type: 'string', required: true, date: true },
  items: { type: 'array', required: true, maxLength: MAX_ITEMS },
};

const IsoDate = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
  message: 'must be an ISO-8601 date',
});

const SummaryItemSchema = z.object({
  text: z.string(),
  timestamp: IsoDate,
  citizenRef: z.string().optional(),
  category: z.enum(CATEGORIES),
  urgency: z.enum(URGENCIES),
  isSpam: z.boolean(),
  confidence: z.number().min(0).max(1),
  source: z.enum(['remote', 'fallback']),
  status: z.enum(FEEDBACK_STATUSES),
});

function parseItems(raw: unknown): ClassifiedFeedback[] {
  const parsed = z.array(SummaryItemSchema).safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues.map(
      (issue) => `items.${issue.path.join('.')}: ${issue.message}`
    );
    throw new ValidationError(fields.join('; '), { fields });
  }

  return parsed.data.map((entry) => ({
    item: {
      text: entry.text,
      timestamp: new Date(entry.timestamp),
      ...(entry.citizenRef ? { citizenRef: entry.citizenRef } : {}),
    },
    classification: {
      category: entry.category,
      urgency: entry.urgency,
      isSpam: entry.isSpam,
      confidence: entry.confidence,
      source: entry.source,
    },
    status: entry.status,
  }));
}

function parsePeriod(start: string | null, end: string | null): { periodStart: Date; periodEnd: Date } {
  if (!start || !end) {
    throw new ValidationError('periodStart and periodEnd are required');
  }
  const periodStart = new Date(start);
  const periodEnd = new Date(end);
  if (Number.isNaN(periodStart.getTime()) || Number.isNaN(periodEnd.getTime())) {
    throw new ValidationError('periodStart and periodEnd must be ISO-8601 dates');
  }
  if (periodStart.getTime() > periodEnd.getTime()) {
    throw new ValidationError('periodStart must not be after periodEnd');
  }
  return { periodStart, periodEnd };
}

export function toSummaryResponse(report: SummaryReport): SummaryResponse {
  return {
    periodStart: report.periodStart.toISOString(),
    periodEnd: report.periodEnd.toISOString(),
    totalCount: report.totalCount,
    resolvedCount: report.resolvedCount,
    spamCount: report.spamCount,
    categoryCounts: report.categoryCounts,
    urgencyDistribution: report.urgencyDistribution,
    resolutionRate: report.resolutionRate,
    narrative: report.narrative,
    source: report.source,
  };
}

function reportResponse(report: SummaryReport): Response {
  return new Response(JSON.stringify(toSummaryResponse(report)), {
    status: 200,
    headers: {
      'Content-Type': 'application/json',
      [SOURCE_HEADER]: report.source,
    },
  });
}

export function createSummaryHandlers(container: Container) {
  const summarizeItems: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.rateLimit.summaries,
    validateBody(summarySchema)
  )(async (req, ctx) => {
    const body = requireBody(ctx.body);
    const { periodStart, periodEnd } = parsePeriod(
      readString(body, 'periodStart'),
      readString(body, 'periodEnd')
    );
    const items = parseItems(body.items);

    const report = await container.summaryService.summarize(items, periodStart, periodEnd, req.signal);
    return reportResponse(report);
  });

  const summarizeStored: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.rateLimit.summaries
  )(async (req, _ctx) => {
    const params = new URL(req.url).searchParams;
    const { periodStart, periodEnd } = parsePeriod(
      params.get('periodStart'),
      params.get('periodEnd')
    );

    const report = await container.feedbackService.summarizeStored(periodStart, periodEnd, req.signal);
    return reportResponse(report);
  });

  return { summarizeItems, summarizeStored };
}
