import fs from 'node:fs/promises';
import path from 'node:path';

import {
  createFfmpegEncoder,
  createFfprobeProber,
  describeCropOptions,
  describeQualityPresets,
  describeRotationOptions,
  describeSizePresets,
  resolveParameters,
  runEdit,
  type DimensionProber,
  type EditLogger,
  type EditResult,
  type Encoder,
  type FfmpegEncoderOptions,
  type FfprobeProberOptions,
  type RawParameters,
  type ResolvedParameters
} from '@reelcut/engine';
import { type ReelcutSettings } from '@reelcut/settings';
import { detectFFmpeg, type FFmpegDetectionResult } from '@reelcut/system-check';

import { createConsoleLogger } from './logger';
import { createTerminalPrompt, type PromptSession } from './prompt';

export interface ReelcutContext {
  settings: ReelcutSettings;
  logger: EditLogger;
  prompt: PromptSession;
  detectFFmpeg: typeof detectFFmpeg;
  createProber: (options: FfprobeProberOptions) => DimensionProber;
  createEncoder: (options: FfmpegEncoderOptions) => Encoder;
  fileExists: (filePath: string) => Promise<boolean>;
  statSize: (filePath: string) => Promise<number>;
  cwd: () => string;
}

export const fileExists = async (filePath: string): Promise<boolean> => {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }
};

export const statSize = async (filePath: string): Promise<number> => (await fs.stat(filePath)).size;

/* c8 ignore start */
export const createReelcutContext = (settings: ReelcutSettings): ReelcutContext => ({
  settings,
  logger: createConsoleLogger(settings.logLevel),
  prompt: createTerminalPrompt(),
  detectFFmpeg,
  createProber: createFfprobeProber,
  createEncoder: options => createFfmpegEncoder({ ...options, echo: process.stderr }),
  fileExists,
  statSize,
  cwd: () => process.cwd()
});
/* c8 ignore end */

export interface EditActionInput extends RawParameters {
  outputDir?: string | null;
}

export const editAction = async (input: EditActionInput, ctx: ReelcutContext): Promise<EditResult> => {
  const { outputDir, ...raw } = input;
  let resolved: ResolvedParameters;
  try {
    resolved = await resolveParameters(raw, {
      prompt: ctx.prompt.ask,
      fileExists: ctx.fileExists,
      logger: ctx.logger
    });
  } finally {
    ctx.prompt.close();
  }

  const binaries = await ctx.detectFFmpeg({
    ffmpegPath: ctx.settings.ffmpegPath,
    ffprobePath: ctx.settings.ffprobePath,
    skipVersion: true
  });
  ctx.logger.debug(`Using ffmpeg at ${binaries.ffmpeg.path}, ffprobe at ${binaries.ffprobe.path}`);

  return runEdit(
    resolved,
    {
      prober: ctx.createProber({ ffprobePath: binaries.ffprobe.path, timeoutMs: ctx.settings.probeTimeoutMs }),
      encoder: ctx.createEncoder({ ffmpegPath: binaries.ffmpeg.path }),
      fileExists: ctx.fileExists,
      statSize: ctx.statSize,
      logger: ctx.logger
    },
    { outputDir: path.resolve(ctx.cwd(), outputDir ?? '.') }
  );
};

export interface PresetListing {
  sizes: string[];
  qualities: string[];
  rotations: string[];
  crops: string[];
}

export const presetsAction = (): PresetListing => ({
  sizes: describeSizePresets(),
  qualities: describeQualityPresets(),
  rotations: describeRotationOptions(),
  crops: describeCropOptions()
});

export const doctorAction = async (ctx: ReelcutContext): Promise<FFmpegDetectionResult> =>
  ctx.detectFFmpeg({
    ffmpegPath: ctx.settings.ffmpegPath,
    ffprobePath: ctx.settings.ffprobePath
  });
