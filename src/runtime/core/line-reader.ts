/**
 * Line Reader
 *
 * Pull-based line source over a readable stream. The stream stays
 * paused while nobody is waiting for a line, so an idle reader on
 * stdin does not keep the process alive.
 */

import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';

export interface LineReader {
  /** Next line without its terminator, or null once the stream has ended */
  readLine(): Promise<string | null>;
  close(): void;
}

interface PendingRead {
  resolve: (line: string | null) => void;
  reject: (error: Error) => void;
}

export function createLineReader(input: Readable): LineReader {
  const buffered: string[] = [];
  const pending: PendingRead[] = [];
  let ended = false;
  let failure: Error | undefined;

  const rl = createInterface({ input, crlfDelay: Infinity, terminal: false });
  rl.pause();

  rl.on('line', (line) => {
    const reader = pending.shift();
    if (reader) {
      reader.resolve(line);
    } else {
      buffered.push(line);
    }
    if (pending.length === 0) rl.pause();
  });

  rl.on('close', () => {
    ended = true;
    for (const reader of pending.splice(0)) reader.resolve(null);
  });

  input.on('error', (error: Error) => {
    failure = error;
    for (const reader of pending.splice(0)) reader.reject(error);
  });

  return {
    readLine(): Promise<string | null> {
      const line = buffered.shift();
      if (line !== undefined) return Promise.resolve(line);
      if (failure) return Promise.reject(failure);
      if (ended) return Promise.resolve(null);
      return new Promise<string | null>((resolve, reject) => {
        pending.push({ resolve, reject });
        rl.resume();
      });
    },
    close(): void {
      rl.close();
    },
  };
}
