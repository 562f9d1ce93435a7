import path from 'node:path';

export type SettingsLogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ReelcutSettings {
  ffmpegPath: string | null;
  ffprobePath: string | null;
  probeTimeoutMs: number;
  logLevel: SettingsLogLevel;
}

export type SettingsEnv = Record<string, string | undefined>;

const DEFAULT_PROBE_TIMEOUT_MS = 10_000;
const LOG_LEVELS: readonly SettingsLogLevel[] = ['debug', 'info', 'warn', 'error'];

export const defaultSettings = (): ReelcutSettings => ({
  ffmpegPath: null,
  ffprobePath: null,
  probeTimeoutMs: DEFAULT_PROBE_TIMEOUT_MS,
  logLevel: 'info'
});

export class SettingsValidationError extends Error {
  constructor(
    public readonly variable: string,
    public readonly value: string
  ) {
    super(`Invalid value for ${variable}: ${value}`);
    this.name = 'SettingsValidationError';
  }
}

const readString = (env: SettingsEnv, name: string): string | null => {
  const value = env[name]?.trim();
  return value ? value : null;
};

const readBinaryPath = (env: SettingsEnv, name: string): string | null => {
  const value = readString(env, name);
  return value ? path.resolve(value) : null;
};

const readTimeout = (env: SettingsEnv, name: string, fallback: number): number => {
  const value = readString(env, name);
  if (value === null) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new SettingsValidationError(name, value);
  }
  return parsed;
};

const isLogLevel = (value: string): value is SettingsLogLevel =>
  LOG_LEVELS.some(level => level === value);

const readLogLevel = (env: SettingsEnv, name: string, fallback: SettingsLogLevel): SettingsLogLevel => {
  const value = readString(env, name)?.toLowerCase() ?? null;
  if (value === null) {
    return fallback;
  }
  if (!isLogLevel(value)) {
    throw new SettingsValidationError(name, value);
  }
  return value;
};

export function loadSettings(env: SettingsEnv = process.env): ReelcutSettings {
  const defaults = defaultSettings();
  return {
    ffmpegPath: readBinaryPath(env, 'REELCUT_FFMPEG_PATH'),
    ffprobePath: readBinaryPath(env, 'REELCUT_FFPROBE_PATH'),
    probeTimeoutMs: readTimeout(env, 'REELCUT_PROBE_TIMEOUT_MS', defaults.probeTimeoutMs),
    logLevel: readLogLevel(env, 'REELCUT_LOG_LEVEL', defaults.logLevel)
  };
}

export const shouldLog = (threshold: SettingsLogLevel, level: SettingsLogLevel): boolean =>
  LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
