import { execa } from 'execa';

import { EncodeError } from '../errors';
import type { EncodeRequest } from '../types';
import { buildEncodeArgs } from './builder';

const STDERR_TAIL_BYTES = 2048;

export interface Encoder {
  readonly binary: string;
  encode(request: EncodeRequest): Promise<void>;
}

export interface FfmpegEncoderOptions {
  ffmpegPath: string;
  /** Receives ffmpeg's progress output while it runs. */
  echo?: NodeJS.WritableStream;
}

export const createFfmpegEncoder = (options: FfmpegEncoderOptions): Encoder => ({
  binary: options.ffmpegPath,
  async encode(request: EncodeRequest): Promise<void> {
    const subprocess = execa(options.ffmpegPath, buildEncodeArgs(request), { reject: false });
    if (options.echo) {
      subprocess.stderr?.pipe(options.echo, { end: false });
    }

    const result = await subprocess;
    if (result.failed) {
      const stderr = typeof result.stderr === 'string' ? result.stderr : '';
      throw new EncodeError(result.exitCode ?? null, stderr.slice(-STDERR_TAIL_BYTES));
    }
  }
});
