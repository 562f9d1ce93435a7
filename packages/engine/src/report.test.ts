import { describe, expect, it } from 'vitest';

import { computeReductionPercent, computeSizeReport, formatSizeReport, toMegabytes } from './report';

describe('computeSizeReport', () => {
  it('converts bytes to megabytes and computes the reduction', () => {
    expect(computeSizeReport(10_485_760, 2_621_440)).toEqual({
      originalBytes: 10_485_760,
      newBytes: 2_621_440,
      originalMegabytes: 10,
      newMegabytes: 2.5,
      reductionPercent: 75
    });
  });

  it('rounds the reduction to two decimals', () => {
    expect(computeReductionPercent(3, 1)).toBe(66.67);
    expect(computeReductionPercent(3, 2)).toBe(33.33);
  });

  it('reports zero reduction for an empty original', () => {
    expect(computeReductionPercent(0, 0)).toBe(0);
    expect(computeSizeReport(0, 1024).reductionPercent).toBe(0);
  });

  it('reports growth as a negative reduction', () => {
    expect(computeReductionPercent(100, 150)).toBe(-50);
  });

  it('rejects negative sizes', () => {
    expect(() => computeSizeReport(-1, 0)).toThrow(RangeError);
  });

  it('uses binary megabytes', () => {
    expect(toMegabytes(1_048_576)).toBe(1);
  });
});

describe('formatSizeReport', () => {
  it('prints the summary lines', () => {
    expect(formatSizeReport('/out/clip-edited-HD.mp4', computeSizeReport(10_485_760, 2_621_440))).toEqual([
      '-------------------------------------',
      'Video created successfully: /out/clip-edited-HD.mp4',
      'Original size: 10.00 MB',
      'New size: 2.50 MB',
      'Size reduction: 75.00%',
      '-------------------------------------'
    ]);
  });
});
