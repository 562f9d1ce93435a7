import { createInterface, type Interface } from 'node:readline';

import type { PromptFn } from '@reelcut/engine';
import pc from 'picocolors';

export class PromptClosedError extends Error {
  constructor() {
    super('Input closed before a value was entered');
    this.name = 'PromptClosedError';
  }
}

export interface PromptSession {
  ask: PromptFn;
  close: () => void;
}

interface PendingAnswer {
  resolve: (answer: string) => void;
  reject: (error: Error) => void;
}

export const formatQuestion = (label: string, defaultValue: string): string =>
  `${label} [default: ${defaultValue}]: `;

/**
 * One readline interface serves every question of a run. Lines that arrive
 * before their question is asked (piped answers) are queued, not dropped.
 * The interface opens on the first question, so runs that never prompt
 * leave the input stream alone.
 */
export const createTerminalPrompt = (
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): PromptSession => {
  let rl: Interface | null = null;
  let closed = false;
  const buffered: string[] = [];
  const pending: PendingAnswer[] = [];

  const open = (): void => {
    if (rl || closed) {
      return;
    }
    rl = createInterface({ input, terminal: false });
    rl.on('line', line => {
      const waiter = pending.shift();
      if (waiter) {
        waiter.resolve(line);
      } else {
        buffered.push(line);
      }
    });
    rl.on('close', () => {
      closed = true;
      for (const waiter of pending.splice(0)) {
        waiter.reject(new PromptClosedError());
      }
    });
  };

  const ask: PromptFn = async request => {
    open();
    if (request.options.length) {
      output.write(`${pc.bold('Options:')}\n`);
      for (const line of request.options) {
        output.write(`  ${line}\n`);
      }
    }
    output.write(formatQuestion(request.label, request.defaultValue));

    const next = buffered.shift();
    if (next !== undefined) {
      return next;
    }
    if (closed) {
      throw new PromptClosedError();
    }
    return new Promise<string>((resolve, reject) => {
      pending.push({ resolve, reject });
    });
  };

  return {
    ask,
    close: () => {
      closed = true;
      rl?.close();
    }
  };
};
