/**
 * API types: shapes for request/response payloads.
 * Decoupled from domain models so the API can evolve independently.
 * Dates cross the wire as ISO-8601 strings.
 */

import type { Category, FeedbackStatus, ResultSource, Urgency } from './models.js';

// ── Requests ──

export interface SubmitFeedbackRequest {
  text: string;
  timestamp: string;
  citizenRef?: string;
}

export interface UpdateStatusRequest {
  status: FeedbackStatus;
}

export interface SummaryItemPayload {
  text: string;
  timestamp: string;
  citizenRef?: string;
  category: Category;
  urgency: Urgency;
  isSpam: boolean;
  confidence: number;
  source: ResultSource;
  status: FeedbackStatus;
}

export interface SummaryRequest {
  periodStart: string;
  periodEnd: string;
  items: SummaryItemPayload[];
}

// ── Responses ──

export interface GuidanceResponse {
  citizenMessage: string;
  actionPlan: string[];
  source: ResultSource;
}

export interface FeedbackResponse {
  id: string;
  category: Category;
  urgency: Urgency;
  isSpam: boolean;
  confidence: number;
  source: ResultSource;
  priorityScore: number;
  status: FeedbackStatus;
  guidance: GuidanceResponse;
}

export interface SummaryResponse {
  periodStart: string;
  periodEnd: string;
  totalCount: number;
  resolvedCount: number;
  spamCount: number;
  categoryCounts: Partial<Record<Category, number>>;
  urgencyDistribution: Partial<Record<Urgency, number>>;
  resolutionRate: number;
  narrative: string;
  source: ResultSource;
}

// ── Errors ──

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'NOT_FOUND'
  | 'RATE_LIMITED'
  | 'INTERNAL_ERROR';

export interface ApiErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}
