import { describe, it, expect, beforeEach } from 'vitest';
import { createContainer } from '../../src/container.js';
import { FeedbackService, MAX_TEXT_LENGTH, rowToRecord } from '../../src/services/FeedbackService.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { InMemoryRateLimitStore } from '../../src/stores/InMemoryRateLimitStore.js';
import { InputError, NotFoundError } from '../../src/errors.js';
import type { FeedbackRecord } from '../../src/types/models.js';
import type { FeedbackRow } from '../../src/types/database.js';
import { MockFeedbackRepository } from '../mocks/MockFeedbackRepository.js';
import { MockCompletionProvider } from '../mocks/MockCompletionProvider.js';
import { priorityScore } from '../../src/services/priority.js';

const GAS_LEAK = 'Gas leak on Main Street near the school, very dangerous!!';

describe('FeedbackService', () => {
  let repo: MockFeedbackRepository;
  let logger: ConsoleLogProvider;
  let service: FeedbackService;

  function build(provider: MockCompletionProvider | null): FeedbackService {
    return createContainer({
      feedbackRepo: repo,
      completionProvider: provider,
      logProvider: logger,
      rateLimitStore: new InMemoryRateLimitStore(),
      remotePolicy: { timeoutMs: 100, maxRetries: 0, retryBackoffMs: 0, deadlineMs: 200 },
    }).feedbackService;
  }

  async function submitOk(text: string, timestamp: string, citizenRef?: string): Promise<FeedbackRecord> {
    const result = await service.submit({ text, timestamp, citizenRef });
    if (!result.ok) throw result.error;
    return result.value;
  }

  beforeEach(() => {
    repo = new MockFeedbackRepository();
    logger = new ConsoleLogProvider();
    service = build(null);
  });

  // --- submit ---

  it('should classify, guide, score and store a submission', async () => {
    const record = await submitOk(GAS_LEAK, '2026-03-02T09:30:00Z');

    expect(record.classification).toEqual({
      category: 'safety',
      urgency: 'critical',
      isSpam: false,
      confidence: 0.6,
      source: 'fallback',
    });
    expect(record.guidance.source).toBe('fallback');
    expect(record.guidance.actionPlan[0]).toBe(
      'Notify emergency services and dispatch the on-call safety officer'
    );
    expect(record.priorityScore).toBe(1);
    expect(record.status).toBe('pending');
    expect(record.item.timestamp.toISOString()).toBe('2026-03-02T09:30:00.000Z');

    const stored = await repo.findById(record.id);
    expect(stored?.category).toBe('safety');
    expect(stored?.submitted_at).toBe('2026-03-02T09:30:00.000Z');
  });

  it('should log each classified submission', async () => {
    const record = await submitOk(GAS_LEAK, '2026-03-02T09:30:00Z');

    const event = logger.events.find((e) => e.message === 'feedback classified');
    expect(event?.fields).toEqual({
      id: record.id,
      category: 'safety',
      urgency: 'critical',
      isSpam: false,
      classificationSource: 'fallback',
      guidanceSource: 'fallback',
    });
  });

  it('should keep the citizen reference', async () => {
    const record = await submitOk('Overflowing bins near the bus stop', '2026-03-02T09:30:00Z', 'C-77');

    expect(record.item.citizenRef).toBe('C-77');
    expect(record.guidance.citizenMessage).toContain('your report (citizen C-77)');
  });

  it('should damp the priority of a citizen with a long history', async () => {
    const text = 'Broken streetlight on Elm Street, not working since Monday';
    const records: FeedbackRecord[] = [];
    for (let i = 0; i < 12; i++) {
      records.push(await submitOk(text, '2026-03-02T09:30:00Z', 'citizen-7'));
    }
    const other = await submitOk(text, '2026-03-02T09:30:00Z', 'citizen-8');

    const [first] = records;
    expect(first.priorityScore).toBeGreaterThan(0);
    // 10 prior submissions: not damped yet
    expect(records[10].priorityScore).toBe(first.priorityScore);
    expect(records[11].priorityScore).toBe(priorityScore(first.classification, text, 11));
    expect(records[11].priorityScore).toBeLessThan(first.priorityScore);
    expect(other.priorityScore).toBe(first.priorityScore);
    expect(await repo.countByCitizen('citizen-7')).toBe(12);
  });

  it('should classify empty text rather than reject it', async () => {
    const record = await submitOk('', '2026-03-02T09:30:00Z');

    expect(record.classification).toMatchObject({ category: 'other', urgency: 'low', confidence: 0.3 });
    expect(record.priorityScore).toBe(0.14);
  });

  it('should score spam 0 and store it', async () => {
    const record = await submitOk('asdkjf asdkjf', '2026-03-02T09:30:00Z');

    expect(record.classification.isSpam).toBe(true);
    expect(record.priorityScore).toBe(0);
    expect(record.guidance.actionPlan).toEqual([]);
    expect(repo.size).toBe(1);
  });

  it('should accept text at the length limit', async () => {
    const result = await service.submit({
      text: 'a'.repeat(MAX_TEXT_LENGTH),
      timestamp: '2026-03-02T09:30:00Z',
    });

    expect(result.ok).toBe(true);
  });

  it('should return an InputError for oversized text', async () => {
    const result = await service.submit({
      text: 'a'.repeat(MAX_TEXT_LENGTH + 1),
      timestamp: '2026-03-02T09:30:00Z',
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(InputError);
    expect(result.error.reason).toBe('text_too_long');
    expect(result.error.details).toEqual({ reason: 'text_too_long', length: 5001, max: 5000 });
    expect(repo.size).toBe(0);
  });

  it('should return an InputError for an invalid timestamp', async () => {
    const result = await service.submit({ text: 'Pothole on Elm Street', timestamp: 'yesterday' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.reason).toBe('invalid_timestamp');
  });

  it('should not share the caller timestamp', async () => {
    const timestamp = new Date('2026-03-02T09:30:00Z');
    const result = await service.submit({ text: 'Pothole on Elm Street', timestamp });
    timestamp.setUTCFullYear(2000);

    expect(result.ok && result.value.item.timestamp.getUTCFullYear()).toBe(2026);
  });

  it('should carry remote results through to the record', async () => {
    repo = new MockFeedbackRepository();
    service = build(
      new MockCompletionProvider(
        { reply: { category: 'water', urgency: 'high', isSpam: false, confidence: 0.9 } },
        { reply: { citizenMessage: 'Crews are on the way.', actionPlan: ['Dispatch crew'] } }
      )
    );

    const record = await submitOk('No water in the building since Monday', '2026-03-02T09:30:00Z');

    expect(record.classification.source).toBe('remote');
    expect(record.guidance).toEqual({
      citizenMessage: 'Crews are on the way.',
      actionPlan: ['Dispatch crew'],
      source: 'remote',
    });
    expect(record.priorityScore).toBe(0.88);
  });

  // --- updateStatus ---

  it('should update the status of stored feedback', async () => {
    const record = await submitOk(GAS_LEAK, '2026-03-02T09:30:00Z');

    const updated = await service.updateStatus(record.id, 'resolved');

    expect(updated.status).toBe('resolved');
    expect((await repo.findById(record.id))?.status).toBe('resolved');
  });

  it('should throw NotFoundError for an unknown id', async () => {
    await expect(service.updateStatus('missing', 'resolved')).rejects.toThrow(NotFoundError);
  });

  // --- summarizeStored ---

  it('should summarise stored feedback in a window', async () => {
    const first = await submitOk(GAS_LEAK, '2026-03-02T09:30:00Z');
    await submitOk('Overflowing bins near the bus stop', '2026-03-10T12:00:00Z');
    await submitOk('The streetlight on my road is broken', '2026-04-05T12:00:00Z');
    await service.updateStatus(first.id, 'resolved');

    const report = await service.summarizeStored(
      new Date('2026-03-01T00:00:00Z'),
      new Date('2026-03-31T23:59:59Z')
    );

    expect(report.totalCount).toBe(2);
    expect(report.resolvedCount).toBe(1);
    expect(report.categoryCounts).toEqual({ safety: 1, sanitation: 1 });
    expect(report.resolutionRate).toBe(0.5);
  });
});

describe('rowToRecord', () => {
  const row: FeedbackRow = {
    id: 'f-1',
    text: 'Tap drips',
    submitted_at: '2026-03-02T09:30:00.000Z',
    citizen_ref: null,
    category: 'water',
    urgency: 'low',
    is_spam: false,
    confidence: 0.6,
    classification_source: 'fallback',
    citizen_message: 'Thanks.',
    action_plan: ['Assign'],
    guidance_source: 'remote',
    priority_score: 0.22,
    status: 'pending',
    created_at: '2026-03-02T09:30:01.000Z',
    updated_at: '2026-03-02T09:30:01.000Z',
  };

  it('should map a row to a record', () => {
    const record = rowToRecord(row);

    expect(record.item).toEqual({ text: 'Tap drips', timestamp: new Date('2026-03-02T09:30:00.000Z') });
    expect(record.classification.category).toBe('water');
    expect(record.guidance.source).toBe('remote');
  });

  it('should reject values outside the enumerations', () => {
    expect(() => rowToRecord({ ...row, category: 'parks' })).toThrow(
      'Feedback row "f-1" has values outside the known enumerations'
    );
  });
});
