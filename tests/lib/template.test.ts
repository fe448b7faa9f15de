import { describe, it, expect } from 'vitest';
import { compileTemplate } from '../../src/lib/template.js';
import { TemplateError } from '../../src/errors.js';

describe('compileTemplate', () => {
  it('should render every placeholder', () => {
    const template = compileTemplate(
      'ack',
      'Thanks for {{reference}}; the {{ department }} will reply within {{timeline}}.',
      ['reference', 'department', 'timeline']
    );

    expect(
      template.render({
        reference: 'your report',
        department: 'Water Authority',
        timeline: '24 hours',
      })
    ).toBe('Thanks for your report; the Water Authority will reply within 24 hours.');
  });

  it('should render repeated placeholders', () => {
    const template = compileTemplate('twice', '{{x}} and {{x}}', ['x']);
    expect(template.render({ x: 'A' })).toBe('A and A');
  });

  it('should not interpret replacement patterns in values', () => {
    const template = compileTemplate('literal', 'Text: {{text}}', ['text']);
    expect(template.render({ text: 'costs $& and $1' })).toBe('Text: costs $& and $1');
  });

  it('should reject unknown slots', () => {
    expect(() => compileTemplate('bad', 'Hello {{name}}', ['reference'])).toThrow(
      new TemplateError('bad', 'unknown slot "name"')
    );
  });

  it('should reject unbalanced braces', () => {
    expect(() => compileTemplate('open', 'Hello {{reference', ['reference'])).toThrow(
      'Template "open": unbalanced placeholder braces'
    );
    expect(() => compileTemplate('close', 'Hello reference}}', [], { requireAll: false })).toThrow(
      TemplateError
    );
  });

  it('should reject declared slots that are never used', () => {
    expect(() => compileTemplate('unused', 'Hello {{a}}', ['a', 'b', 'c'])).toThrow(
      'Template "unused": slot(s) never used: b, c'
    );
  });

  it('should allow unused slots when requireAll is false', () => {
    const template = compileTemplate('partial', 'Hello {{a}}', ['a', 'b'], { requireAll: false });
    expect(template.render({ a: 'there', b: 'ignored' })).toBe('Hello there');
  });
});
