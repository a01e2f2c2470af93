import type { HeaderModel } from './types.js';

/** Lines credited per whole symbol once any line range is known */
export const WHOLE_SYMBOL_LINE_ESTIMATE = 20;

const COVERAGE_RATIOS = {
  ABOVE_HALF: 0.75,
  BELOW_HALF: 0.25,
} as const;

/**
 * Rough count of AI-written lines in a file of `totalLines` lines.
 *
 * `WHOLE` files count every line. Otherwise explicit line ranges win: their
 * sum plus a flat allowance per whole symbol, capped at the file's size. With
 * no ranges the coverage ratio is applied.
 */
export function estimateAiLines(header: HeaderModel, totalLines: number): number {
  if (header.coverageType === 'WHOLE') {
    return totalLines;
  }

  let rangeLines = 0;
  let wholeSymbols = 0;
  for (const entry of [...header.methods, ...header.structs, ...header.traits]) {
    if (entry.extent.kind === 'lines') {
      rangeLines += entry.extent.end - entry.extent.start + 1;
    } else {
      wholeSymbols++;
    }
  }

  if (rangeLines > 0) {
    return Math.min(rangeLines + wholeSymbols * WHOLE_SYMBOL_LINE_ESTIMATE, totalLines);
  }

  return Math.floor(totalLines * COVERAGE_RATIOS[header.coverageType]);
}
