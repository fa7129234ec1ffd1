/**
 * Tests for the template engine.
 * Covers variables, conditionals and whitespace handling.
 */
import { describe, it, expect } from 'vitest';
import { applyTemplate } from '../../../../src/core/templates/template-engine.js';

describe('applyTemplate', () => {
  describe('variables', () => {
    it('substitutes variables', () => {
      expect(applyTemplate('Hello {{NAME}}!', { NAME: 'World' })).toBe('Hello World!\n');
    });

    it('tolerates whitespace inside the braces', () => {
      expect(applyTemplate('Hello {{ NAME }}!', { NAME: 'World' })).toBe('Hello World!\n');
    });

    it('replaces unknown variables with nothing', () => {
      expect(applyTemplate('A{{MISSING}}B', {})).toBe('AB\n');
    });

    it('joins arrays one item per line', () => {
      expect(applyTemplate('{{LIST}}', { LIST: ['a', 'b'] })).toBe('a\nb\n');
    });

    it('does not rescan substituted values', () => {
      expect(applyTemplate('{{TITLE}}', { TITLE: '{{OTHER}}', OTHER: 'x' })).toBe('{{OTHER}}\n');
      expect(applyTemplate('{{TITLE}}', { TITLE: '{{#if ON}}y{{/if}}', ON: true })).toBe('{{#if ON}}y{{/if}}\n');
    });

    it('leaves single-brace attributes alone', () => {
      expect(applyTemplate('[id="{{ID}}_{context}"]', { ID: 'con_a' })).toBe('[id="con_a_{context}"]\n');
    });
  });

  describe('conditionals', () => {
    const template = 'a\n{{#if ON}}\nb\n{{/if}}\nc';

    it('keeps a block when the value is truthy', () => {
      expect(applyTemplate(template, { ON: true })).toBe('a\nb\nc\n');
    });

    it('drops a block and its tag lines when the value is falsy', () => {
      expect(applyTemplate(template, { ON: false })).toBe('a\nc\n');
      expect(applyTemplate(template, { ON: '' })).toBe('a\nc\n');
      expect(applyTemplate(template, { ON: [] })).toBe('a\nc\n');
      expect(applyTemplate(template, {})).toBe('a\nc\n');
    });
  });

  describe('whitespace', () => {
    it('collapses runs of blank lines', () => {
      expect(applyTemplate('a\n\n\n\nb', {})).toBe('a\n\nb\n');
    });

    it('trims and ends with one newline', () => {
      expect(applyTemplate('\n\n  body  \n\n', {})).toBe('body\n');
    });
  });
});
