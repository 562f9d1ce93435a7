import path from 'node:path';

import { ORIGINAL_SIZE } from './presets';
import type { ResolvedParameters } from './types';

export const OUTPUT_EXTENSION = '.mp4';
export const EDITED_SUFFIX = '-edited';

export const buildSuffixTokens = (resolved: ResolvedParameters): string[] => {
  const tokens: string[] = [];
  if (resolved.startTime > 0) tokens.push(`-s${resolved.startTime}`);
  if (resolved.duration !== null) tokens.push(`-d${resolved.duration}`);
  if (resolved.speedModifier !== 1) tokens.push(`-speed${resolved.speedModifier}`);
  if (resolved.rotation !== 0) tokens.push(`-r${resolved.rotation}`);
  if (resolved.cropRatio !== 'none') tokens.push(`-crop${resolved.cropRatio.replace(/:/g, '')}`);
  if (resolved.targetSize !== ORIGINAL_SIZE) tokens.push(`-${resolved.targetSize}`);
  if (resolved.quality !== 'medium') tokens.push(`-q${resolved.quality}`);
  return tokens;
};

export const buildOutputName = (baseName: string, resolved: ResolvedParameters): string =>
  `${baseName}${EDITED_SUFFIX}${buildSuffixTokens(resolved).join('')}${OUTPUT_EXTENSION}`;

export const deriveOutputPath = (resolved: ResolvedParameters, outputDir: string): string => {
  const parsed = path.parse(resolved.inputPath);
  return path.join(outputDir, buildOutputName(parsed.name, resolved));
};
