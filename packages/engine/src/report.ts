import type { SizeReport } from './types';

const BYTES_PER_MEGABYTE = 1024 * 1024;

const roundTo = (value: number, decimals: number): number => {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
};

export const toMegabytes = (bytes: number): number => bytes / BYTES_PER_MEGABYTE;

export const computeReductionPercent = (originalBytes: number, newBytes: number): number => {
  if (originalBytes <= 0) {
    return 0;
  }
  return roundTo((1 - newBytes / originalBytes) * 100, 2);
};

export const computeSizeReport = (originalBytes: number, newBytes: number): SizeReport => {
  if (originalBytes < 0 || newBytes < 0) {
    throw new RangeError('File sizes must be non-negative');
  }
  return {
    originalBytes,
    newBytes,
    originalMegabytes: toMegabytes(originalBytes),
    newMegabytes: toMegabytes(newBytes),
    reductionPercent: computeReductionPercent(originalBytes, newBytes)
  };
};

export const formatSizeReport = (outputPath: string, report: SizeReport): string[] => [
  '-------------------------------------',
  `Video created successfully: ${outputPath}`,
  `Original size: ${report.originalMegabytes.toFixed(2)} MB`,
  `New size: ${report.newMegabytes.toFixed(2)} MB`,
  `Size reduction: ${report.reductionPercent.toFixed(2)}%`,
  '-------------------------------------'
];
