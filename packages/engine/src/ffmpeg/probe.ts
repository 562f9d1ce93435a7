import { execa } from 'execa';

import { DimensionProbeError } from '../errors';
import type { DimensionProber } from '../geometry/dimension-oracle';
import type { SourceDimensions } from '../types';

export const DEFAULT_PROBE_TIMEOUT_MS = 10_000;

export interface FfprobeProberOptions {
  ffprobePath: string;
  timeoutMs?: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isPositiveInteger = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value) && value > 0;

export const parseProbeOutput = (filePath: string, stdout: string): SourceDimensions => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch {
    throw new DimensionProbeError(filePath, 'invalid_json');
  }
  if (!isRecord(parsed)) {
    throw new DimensionProbeError(filePath, 'invalid_json');
  }

  const stream: unknown = Array.isArray(parsed.streams) ? parsed.streams[0] : undefined;
  if (!isRecord(stream)) {
    throw new DimensionProbeError(filePath, 'missing_stream');
  }
  const { width, height } = stream;
  if (!isPositiveInteger(width) || !isPositiveInteger(height)) {
    throw new DimensionProbeError(filePath, 'invalid_dimensions', {
      width: width ?? null,
      height: height ?? null
    });
  }

  return { width, height };
};

export const createFfprobeProber = (options: FfprobeProberOptions): DimensionProber => ({
  async probe(filePath: string): Promise<SourceDimensions> {
    const result = await execa(
      options.ffprobePath,
      [
        '-v',
        'error',
        '-select_streams',
        'v:0',
        '-show_entries',
        'stream=width,height',
        '-of',
        'json',
        filePath
      ],
      {
        reject: false,
        timeout: options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS
      }
    );

    if (result.failed) {
      throw new DimensionProbeError(filePath, result.timedOut ? 'timeout' : 'ffprobe_failed', {
        exitCode: result.exitCode ?? null,
        stderr: typeof result.stderr === 'string' ? result.stderr.slice(0, 256) : null
      });
    }

    return parseProbeOutput(filePath, result.stdout);
  }
});
