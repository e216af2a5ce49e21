import { describe, it, expect } from 'vitest';
import { compactJsonFormatter, formatterFor, jsonFormatter } from './formatters.js';

describe('Report formatters', () => {
  const report = { phase: 'Final', week: 5 };

  it('should pretty-print JSON', () => {
    expect(jsonFormatter.format(report)).toBe('{\n  "phase": "Final",\n  "week": 5\n}');
  });

  it('should print compact JSON', () => {
    expect(compactJsonFormatter.format(report)).toBe('{"phase":"Final","week":5}');
  });

  it('should look formatters up by name', () => {
    expect(formatterFor('json')).toBe(jsonFormatter);
    expect(formatterFor('compact')).toBe(compactJsonFormatter);
    expect(formatterFor('html')).toBeUndefined();
  });
});
