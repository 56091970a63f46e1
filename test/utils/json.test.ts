import { describe, it, expect } from 'vitest';
import { extractJson, safeParse } from '../../src/utils/json.js';

describe('extractJson', () => {
    it('prefers a fenced block', () => {
        expect(extractJson('Result:\n```json\n{"a": 1}\n```\nThanks')).toBe('{"a": 1}');
    });

    it('cuts surrounding prose from an array or object', () => {
        expect(extractJson('Here you go:\n["x", "y"]\nHope that helps.')).toBe('["x", "y"]');
        expect(extractJson('Answer: {"b": [2]} done')).toBe('{"b": [2]}');
    });

    it('returns plain text trimmed', () => {
        expect(extractJson('  no json here  ')).toBe('no json here');
    });
});

describe('safeParse', () => {
    it('parses JSON after a line of prose', () => {
        expect(safeParse('Sure, here you go:\n[\n  "One?",\n  "Two?"\n]')).toEqual(['One?', 'Two?']);
    });

    it('repairs a trailing comma inside an extracted object', () => {
        expect(safeParse('Result: {"a": 1,}')).toEqual({ a: 1 });
    });

    it('throws on empty input', () => {
        expect(() => safeParse('  ')).toThrow('JSON input is empty');
    });
});
