import readline from 'readline';

/**
 * Line-based input source for the menu.
 * `ask` resolves null once input is closed (Ctrl+D, end of piped stdin).
 */
export interface Prompter {
  ask(question: string): Promise<string | null>;
  close(): void;
}

export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  const rl = readline.createInterface({ input, output });
  let closed = false;
  let pending: ((answer: string | null) => void) | null = null;

  rl.on('close', () => {
    closed = true;
    pending?.(null);
    pending = null;
  });

  return {
    ask(question: string): Promise<string | null> {
      if (closed) {
        return Promise.resolve(null);
      }

      return new Promise((resolve) => {
        pending = resolve;
        rl.question(question, (answer) => {
          pending = null;
          resolve(answer);
        });
      });
    },
    close() {
      rl.close();
    },
  };
}
