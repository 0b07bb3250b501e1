/**
 * Tests for JSON parsing of model replies
 * Covers: size limits, malformed JSON, schema validation, JSON extraction
 */

jest.mock('../utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

import { z } from 'zod';
import { extractJsonObject, safeJsonParse } from '../utils/json-parser';

const schema = z.object({ reply: z.string(), count: z.number().default(0) });
const fallback = { reply: 'fallback', count: -1 };

describe('safeJsonParse', () => {
  it('returns validated data', () => {
    expect(safeJsonParse('{"reply":"hi"}', fallback, { schema })).toEqual({ reply: 'hi', count: 0 });
  });

  it('returns the fallback for empty input', () => {
    expect(safeJsonParse(null, fallback, { schema })).toBe(fallback);
    expect(safeJsonParse('', fallback, { schema })).toBe(fallback);
  });

  it('returns the fallback for malformed JSON', () => {
    expect(safeJsonParse('{"reply":', fallback, { schema })).toBe(fallback);
  });

  it('returns the fallback when the schema rejects the value', () => {
    expect(safeJsonParse('{"reply":42}', fallback, { schema })).toBe(fallback);
  });

  it('rejects input over the size limit before parsing', () => {
    const json = JSON.stringify({ reply: 'x'.repeat(50) });
    expect(safeJsonParse(json, fallback, { schema, maxSize: 20 })).toBe(fallback);
  });
});

describe('extractJsonObject', () => {
  it('takes the body of a json fence', () => {
    const text = 'Sure!\n```json\n{"reply":"ok"}\n```\nanything else';
    expect(extractJsonObject(text)).toBe('{"reply":"ok"}');
  });

  it('takes the outermost braces of unfenced text', () => {
    expect(extractJsonObject('Here: {"a":{"b":1}} done')).toBe('{"a":{"b":1}}');
  });

  it('returns null when there is no object', () => {
    expect(extractJsonObject('Just a plain answer.')).toBeNull();
    expect(extractJsonObject('} backwards {')).toBeNull();
  });
});
