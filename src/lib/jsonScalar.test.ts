import { describe, it, expect } from 'vitest';
import { parseValue } from 'graphql';
import { JSONObject } from './jsonScalar.js';

describe('JSONObject scalar', () => {
  it('should serialize flat objects', () => {
    expect(JSONObject.serialize({ week: 3, opponent: 'B', won: true, diff: null })).toEqual({
      week: 3,
      opponent: 'B',
      won: true,
      diff: null,
    });
  });

  it('should reject nested values', () => {
    expect(() => JSONObject.serialize({ nested: { a: 1 } })).toThrow(
      'JSONObject values must be strings, finite numbers, booleans or null'
    );
  });

  it('should reject non-objects', () => {
    expect(() => JSONObject.parseValue([1, 2])).toThrow('JSONObject must be an object');
  });

  it('should parse object literals', () => {
    expect(JSONObject.parseLiteral(parseValue('{ week: 5, name: "Best QB", won: false, note: null, pct: 33.3 }'))).toEqual({
      week: 5,
      name: 'Best QB',
      won: false,
      note: null,
      pct: 33.3,
    });
  });
});
