import type { EditLogger } from '@reelcut/engine';
import { shouldLog, type SettingsLogLevel } from '@reelcut/settings';
import pc from 'picocolors';

export interface LogSink {
  log(message: string): void;
  error(message: string): void;
}

export const createConsoleLogger = (threshold: SettingsLogLevel, sink: LogSink = console): EditLogger => ({
  debug(message) {
    if (shouldLog(threshold, 'debug')) sink.log(pc.dim(message));
  },
  info(message) {
    if (shouldLog(threshold, 'info')) sink.log(message);
  },
  warn(message) {
    if (shouldLog(threshold, 'warn')) sink.error(pc.yellow(message));
  },
  error(message) {
    if (shouldLog(threshold, 'error')) sink.error(pc.red(message));
  }
});
