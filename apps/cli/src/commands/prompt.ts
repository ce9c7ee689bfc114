import { createInterface } from "node:readline";

export interface Prompter {
  /** Resolves with the typed line, or null once input is closed. */
  ask(prompt: string): Promise<string | null>;
  close(): void;
}

export function createPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  const rl = createInterface({ input, output });
  let closed = false;
  // Settles the question currently waiting for an answer, if any.
  let pending: ((answer: string | null) => void) | null = null;

  rl.once("close", () => {
    closed = true;
    pending?.(null);
    pending = null;
  });

  return {
    ask(prompt: string): Promise<string | null> {
      if (closed) return Promise.resolve(null);
      return new Promise((resolve) => {
        pending = resolve;
        rl.question(prompt, (answer) => {
          pending = null;
          resolve(answer);
        });
      });
    },
    close() {
      if (!closed) rl.close();
    },
  };
}
