import { createInterface } from 'readline';
import type { QaIo } from '../../core/index.js';

export interface ConsoleIo extends QaIo {
  close(): void;
}

/**
 * stdin/stdout for the query loop. Closing stdin (Ctrl-D) reads as an empty
 * line, which ends the session.
 */
export function createConsoleIo(): ConsoleIo {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  rl.once('close', () => {
    closed = true;
  });

  return {
    question: (prompt) =>
      new Promise((resolve) => {
        if (closed) {
          resolve('');
          return;
        }
        const onClose = () => resolve('');
        rl.once('close', onClose);
        rl.question(prompt, (answer) => {
          rl.off('close', onClose);
          resolve(answer);
        });
      }),
    print: (line) => console.log(line),
    close: () => rl.close(),
  };
}
