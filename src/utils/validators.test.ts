import { describe, expect, it } from 'vitest';
import { extractFinalBlock, extractJsonFromResponse, parsePredictionText, stripCodeFence, validator } from './validators.js';

describe('validators', () => {
  describe('extractFinalBlock', () => {
    it('returns the last final block', () => {
      expect(extractFinalBlock('<final>[1]</final> draft <FINAL>[2]</FINAL>')).toBe('[2]');
    });

    it('returns the whole text without a final block', () => {
      expect(extractFinalBlock('[3]')).toBe('[3]');
    });
  });

  describe('stripCodeFence', () => {
    it('removes a json fence', () => {
      expect(stripCodeFence('```json\n[1, 2]\n```')).toBe('[1, 2]');
    });

    it('trims unfenced text', () => {
      expect(stripCodeFence('  {"a": 1}\n')).toBe('{"a": 1}');
    });
  });

  describe('extractJsonFromResponse', () => {
    it('parses fenced JSON inside a final block', () => {
      expect(extractJsonFromResponse('思考\n<final>\n```json\n{"a": 1}\n```\n</final>')).toEqual({ a: 1 });
    });

    it('slices JSON out of surrounding prose', () => {
      expect(extractJsonFromResponse('Here:\n```json\n{"a": 1}\n```\nDone.')).toEqual({ a: 1 });
    });

    it('throws when nothing parses', () => {
      expect(() => extractJsonFromResponse('{ broken')).toThrow('Could not extract valid JSON');
    });
  });

  describe('parsePredictionText', () => {
    it('returns null instead of throwing', () => {
      expect(parsePredictionText('no json')).toBeNull();
      expect(parsePredictionText('[]')).toEqual([]);
    });
  });

  describe('SchemaValidator', () => {
    const validate = validator.compileSchema<{ a: number }>({
      type: 'object',
      required: ['a'],
      properties: { a: { type: 'number' } },
    });

    it('compiles a type guard', () => {
      expect(validate({ a: 1 })).toBe(true);
      expect(validate({})).toBe(false);
    });

    it('formats errors with their location', () => {
      validate({});
      expect(validator.formatErrors(validate.errors)).toBe(
        `  • root: must have required property 'a' {"missingProperty":"a"}`
      );
      expect(validator.formatErrors(null)).toBe('No errors');
    });

    it('truncates long error lists', () => {
      validate({ a: 'x' });
      const errors = validate.errors ?? [];
      expect(validator.formatErrors([...errors, ...errors, ...errors], 2).split('\n')).toEqual([
        `  • /a: must be number {"type":"number"}`,
        `  • /a: must be number {"type":"number"}`,
        '  … and 1 more',
      ]);
    });
  });
});
