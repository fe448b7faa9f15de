import { describe, it, expect, beforeEach } from 'vitest';
import { ZodError } from 'zod';
import {
  compileGuidanceTable,
  defaultGuidanceTable,
  GuidanceService,
} from '../../src/services/GuidanceService.js';
import { RemoteRunner } from '../../src/services/RemoteRunner.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { TemplateError } from '../../src/errors.js';
import { CATEGORIES, type Classification, type FeedbackItem } from '../../src/types/models.js';
import { MockCompletionProvider } from '../mocks/MockCompletionProvider.js';

const SUBMITTED = new Date('2026-03-02T09:30:00Z');

function classification(overrides: Partial<Classification> = {}): Classification {
  return {
    category: 'safety',
    urgency: 'critical',
    isSpam: false,
    confidence: 0.6,
    source: 'fallback',
    ...overrides,
  };
}

function item(overrides: Partial<FeedbackItem> = {}): FeedbackItem {
  return { text: 'Gas leak near the school', timestamp: SUBMITTED, ...overrides };
}

/** A valid guidance table in which every category uses the same entry. */
function tableData(entry: Record<string, unknown>) {
  const categories: Record<string, unknown> = {};
  for (const category of CATEGORIES) categories[category] = entry;
  return {
    timelines: { low: '1 week', medium: '3 days', high: '1 day', critical: '2 hours' },
    spam: { message: 'Please resubmit {{reference}}.' },
    categories,
  };
}

const ENTRY = {
  department: 'Parks Office',
  messages: {
    low: 'Thanks for {{reference}}.',
    medium: 'Thanks for {{reference}}.',
    high: 'Thanks for {{reference}}.',
    critical: 'Thanks for {{reference}}.',
  },
  urgentSteps: [],
  steps: ['Assign to the {{department}}'],
};

describe('GuidanceService', () => {
  let runner: RemoteRunner;

  beforeEach(() => {
    runner = new RemoteRunner(
      { timeoutMs: 100, maxRetries: 0, retryBackoffMs: 0, deadlineMs: 200 },
      new ConsoleLogProvider()
    );
  });

  // --- fallback table ---

  it('should prepend urgent steps for critical items', async () => {
    const service = new GuidanceService(runner, null);

    const guidance = await service.generateGuidance(item(), classification());

    expect(guidance).toEqual({
      citizenMessage:
        'Your report describes an immediate danger and has been escalated to the Public Safety Department. ' +
        'Move away from the area and call emergency services now; responders aim to be on site within 4 hours.',
      actionPlan: [
        'Notify emergency services and dispatch the on-call safety officer',
        'Secure or cordon off the affected area',
        'Assign to the Public Safety Department',
        'Assess the site and identify the hazard within 4 hours',
        'Coordinate with police or utilities where needed',
        'Report findings and actions taken to the citizen',
        'Schedule a follow-up check of the location',
      ],
      source: 'fallback',
    });
  });

  it('should use only the base steps below high urgency', async () => {
    const service = new GuidanceService(runner, null);

    const guidance = await service.generateGuidance(
      item({ text: 'Tap drips', citizenRef: 'C-1042' }),
      classification({ category: 'water', urgency: 'low' })
    );

    expect(guidance.citizenMessage).toBe(
      'Thank you for your report (citizen C-1042). The Water Utilities Department will review it in the next maintenance cycle.'
    );
    expect(guidance.actionPlan).toHaveLength(5);
    expect(guidance.actionPlan[0]).toBe('Assign to the Water Utilities Department');
    expect(guidance.actionPlan[1]).toBe(
      'Inspect the supply, pipes and drainage at the location within 1-2 weeks'
    );
  });

  it('should default the reference when no citizen reference is given', async () => {
    const service = new GuidanceService(runner, null);

    const guidance = await service.generateGuidance(
      item({ text: '' }),
      classification({ category: 'other', urgency: 'low', confidence: 0.3 })
    );

    expect(guidance.citizenMessage).toBe(
      'Thank you for your report. It has been received and will be reviewed by the appropriate department.'
    );
  });

  it('should ask spam submitters to resubmit, with no action plan', async () => {
    const provider = MockCompletionProvider.replying({ citizenMessage: 'x', actionPlan: [] });
    const service = new GuidanceService(runner, provider);

    const guidance = await service.generateGuidance(
      item({ text: 'asdkjf asdkjf' }),
      classification({ category: 'other', urgency: 'low', isSpam: true })
    );

    expect(guidance).toEqual({
      citizenMessage:
        'We could not identify a civic issue in your report of 2026-03-02. ' +
        'Please resubmit with a short description of the problem and where it is.',
      actionPlan: [],
      source: 'fallback',
    });
    expect(provider.calls).toHaveLength(0);
  });

  it('should fall back to a default date for an invalid timestamp', () => {
    const service = new GuidanceService(runner, null);

    const guidance = service.fallbackGuidance(
      item({ timestamp: new Date('not a date') }),
      classification({ isSpam: true })
    );

    expect(guidance.citizenMessage).toContain('in your report of recently.');
  });

  // --- remote path ---

  it('should use remote guidance when it validates', async () => {
    const provider = MockCompletionProvider.replying({
      citizenMessage: 'Please leave the area; the gas company has been alerted.',
      actionPlan: ['Call the gas company', 'Evacuate the school'],
    });
    const service = new GuidanceService(runner, provider);

    const guidance = await service.generateGuidance(item(), classification());

    expect(guidance).toEqual({
      citizenMessage: 'Please leave the area; the gas company has been alerted.',
      actionPlan: ['Call the gas company', 'Evacuate the school'],
      source: 'remote',
    });
    expect(provider.calls[0].prompt).toBe(
      [
        'Category: safety',
        'Urgency: critical',
        'Submitted: 2026-03-02',
        'Feedback:',
        '"""',
        'Gas leak near the school',
        '"""',
      ].join('\n')
    );
  });

  it('should fall back when the remote message is empty', async () => {
    const provider = MockCompletionProvider.replying({ citizenMessage: '  ', actionPlan: [] });
    const service = new GuidanceService(runner, provider);

    const guidance = await service.generateGuidance(item(), classification());

    expect(guidance.source).toBe('fallback');
    expect(guidance.actionPlan).toHaveLength(7);
  });

  it('should fall back when the action plan is not a string array', async () => {
    const provider = MockCompletionProvider.replying({
      citizenMessage: 'On it.',
      actionPlan: 'Send a crew',
    });
    const service = new GuidanceService(runner, provider);

    expect((await service.generateGuidance(item(), classification())).source).toBe('fallback');
  });
});

describe('compileGuidanceTable', () => {
  it('should compile a complete table', () => {
    const table = compileGuidanceTable(tableData(ENTRY));
    expect(table.categories.size).toBe(CATEGORIES.length);
    expect(table.timelines.critical).toBe('2 hours');
  });

  it('should reject a table missing a category', () => {
    const data = tableData(ENTRY);
    delete data.categories.traffic;

    expect(() => compileGuidanceTable(data)).toThrow(
      'Template "guidance.traffic": category has no guidance entry'
    );
  });

  it('should reject an unknown placeholder', () => {
    const data = tableData({ ...ENTRY, steps: ['Call {{manager}}'] });

    expect(() => compileGuidanceTable(data)).toThrow(TemplateError);
  });

  it('should reject a category without steps', () => {
    expect(() => compileGuidanceTable(tableData({ ...ENTRY, steps: [] }))).toThrow(ZodError);
  });

  it('should load the shipped table', () => {
    expect(defaultGuidanceTable().categories.get('sanitation')?.department).toBe(
      'Waste Management Department'
    );
  });
});
