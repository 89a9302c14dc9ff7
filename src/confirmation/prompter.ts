import { createInterface } from "node:readline";

export interface Prompter {
  /** Resolves with the operator's answer, or null once input has ended. */
  ask(question: string): Promise<string | null>;
  close(): void;
}

export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  const rl = createInterface({ input, output });
  let closed = false;
  const waiting = new Set<(answer: string | null) => void>();

  rl.on("close", () => {
    closed = true;
    for (const resolve of waiting) resolve(null);
    waiting.clear();
  });

  return {
    ask(question) {
      if (closed) return Promise.resolve(null);
      return new Promise((resolve) => {
        waiting.add(resolve);
        rl.question(question, (answer) => {
          waiting.delete(resolve);
          resolve(answer);
        });
      });
    },
    close() {
      rl.close();
    },
  };
}
