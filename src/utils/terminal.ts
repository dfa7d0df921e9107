import readline from 'node:readline';
import { InputClosedError } from './errors';
import type { Terminal } from '../interfaces/terminal';

/**
 * Terminal backed by readline. A prompt pending when input ends rejects
 * with InputClosedError.
 */
export function createConsoleTerminal(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Terminal {
  const rl = readline.createInterface({ input, output });
  const pending = new Set<(error: Error) => void>();
  let closed = false;

  rl.on('close', () => {
    closed = true;
    for (const reject of pending) {
      reject(new InputClosedError());
    }
    pending.clear();
  });

  const ask = (question: string): Promise<string> =>
    new Promise((resolve, reject) => {
      if (closed) {
        reject(new InputClosedError());
        return;
      }
      pending.add(reject);
      rl.question(question, (answer) => {
        pending.delete(reject);
        resolve(answer);
      });
    });

  const print = (message: string): void => {
    output.write(message.endsWith('\n') ? message : message + '\n');
  };

  const close = (): void => {
    if (!closed) {
      rl.close();
    }
  };

  return { ask, print, close };
}
