import { constants as fsConstants } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';

import { execa } from 'execa';

const VERSION_TIMEOUT_MS = 2000;

export interface BinaryInfo {
  path: string;
  version: string | null;
}

export interface FFmpegDetectionResult {
  ffmpeg: BinaryInfo;
  ffprobe: BinaryInfo;
}

export interface FFmpegDetectionOptions {
  ffmpegPath?: string | null;
  ffprobePath?: string | null;
  /** Skip running `-version` on the resolved binaries. */
  skipVersion?: boolean;
}

export class BinaryNotFoundError extends Error {
  constructor(public readonly binaryName: string) {
    super(`${binaryName} was not found in PATH or provided location`);
    this.name = 'BinaryNotFoundError';
  }
}

const isWindowsRuntime = () => process.platform === 'win32' || process.env.REELCUT_FORCE_WINDOWS === '1';
const getExecutableExtensions = () => (isWindowsRuntime() ? ['.exe', '.cmd', '.bat'] : ['']);

const getCandidatePaths = (binaryName: string, explicit?: string | null): string[] => {
  const candidates: string[] = [];

  if (explicit) {
    candidates.push(explicit);
  }

  const segments = (process.env.PATH ?? '').split(path.delimiter).filter(Boolean);
  for (const segment of segments) {
    for (const ext of getExecutableExtensions()) {
      candidates.push(path.join(segment, `${binaryName}${ext}`));
    }
  }

  return candidates;
};

const isExecutable = async (filePath: string): Promise<boolean> => {
  try {
    const stat = await fs.stat(filePath);
    if (!stat.isFile()) {
      return false;
    }

    /* c8 ignore next 3 */
    if (isWindowsRuntime()) {
      return getExecutableExtensions().some(ext => filePath.toLowerCase().endsWith(ext));
    }

    await fs.access(filePath, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
};

export const resolveBinary = async (binaryName: string, explicit?: string | null): Promise<string> => {
  for (const candidate of getCandidatePaths(binaryName, explicit)) {
    if (await isExecutable(candidate)) {
      return candidate;
    }
  }

  throw new BinaryNotFoundError(binaryName);
};

export const parseVersion = (output: string): string | null => {
  const firstLine = output.split('\n')[0]?.trim();
  return firstLine?.length ? firstLine : null;
};

const readVersion = async (binaryPath: string): Promise<string | null> => {
  const { stdout, failed } = await execa(binaryPath, ['-version'], {
    reject: false,
    timeout: VERSION_TIMEOUT_MS
  });
  return failed ? null : parseVersion(stdout);
};

export async function detectFFmpeg(options: FFmpegDetectionOptions = {}): Promise<FFmpegDetectionResult> {
  const ffmpegPath = await resolveBinary('ffmpeg', options.ffmpegPath);
  const ffprobePath = await resolveBinary('ffprobe', options.ffprobePath);
  if (options.skipVersion) {
    return {
      ffmpeg: { path: ffmpegPath, version: null },
      ffprobe: { path: ffprobePath, version: null }
    };
  }

  return {
    ffmpeg: { path: ffmpegPath, version: await readVersion(ffmpegPath) },
    ffprobe: { path: ffprobePath, version: await readVersion(ffprobePath) }
  };
}
