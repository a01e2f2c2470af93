import { describe, it, expect } from 'vitest';
import { estimateAiLines } from '../estimate.js';
import { sampleHeader } from './fixtures.js';

describe('estimateAiLines', () => {
  it('should count every line of a WHOLE file', () => {
    expect(estimateAiLines(sampleHeader({ coverageType: 'WHOLE' }), 120)).toBe(120);
  });

  it('should use 75% or 25% when no line ranges are given', () => {
    const methods = [{ name: 'run', extent: { kind: 'whole' as const } }];

    expect(estimateAiLines(sampleHeader({ coverageType: 'ABOVE_HALF', methods }), 101)).toBe(75);
    expect(estimateAiLines(sampleHeader({ coverageType: 'BELOW_HALF', methods }), 101)).toBe(25);
  });

  it('should sum line ranges plus an allowance per whole symbol', () => {
    // 3~18 is 16 lines, plus 20 for parseConfig
    expect(estimateAiLines(sampleHeader(), 200)).toBe(36);
  });

  it('should cap the estimate at the file size', () => {
    expect(estimateAiLines(sampleHeader(), 30)).toBe(30);
  });
});
