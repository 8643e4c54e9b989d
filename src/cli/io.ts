/**
 * Terminal input and output for the chat CLI.
 *
 * @packageDocumentation
 */

/**
 * Interface for reading user input.
 * Abstracted for testability.
 */
export interface InputReader {
  /** Read a line of input. Resolves `undefined` once input has ended. */
  readLine(prompt: string): Promise<string | undefined>;
  /** Close the reader. */
  close(): void;
}

/**
 * Interface for writing output.
 * Abstracted for testability.
 */
export interface OutputWriter {
  /** Write a line of text. */
  writeLine(text: string): void;
  /** Write text without newline. */
  write(text: string): void;
}

/**
 * Default output writer using process.stdout.
 */
export const defaultOutputWriter: OutputWriter = {
  writeLine(text: string): void {
    process.stdout.write(text + '\n');
  },
  write(text: string): void {
    process.stdout.write(text);
  },
};

/**
 * Creates a readline-based input reader.
 *
 * @returns A Promise resolving to an InputReader using Node's readline.
 */
export async function createReadlineReader(): Promise<InputReader> {
  // Loaded lazily so tests never open stdin.
  const readline = await import('node:readline');

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  let closed = false;
  const waiting = new Set<(answer: string | undefined) => void>();
  rl.on('close', () => {
    closed = true;
    for (const resolve of waiting) {
      resolve(undefined);
    }
    waiting.clear();
  });

  return {
    readLine(prompt: string): Promise<string | undefined> {
      if (closed) {
        return Promise.resolve(undefined);
      }
      return new Promise((resolve) => {
        waiting.add(resolve);
        rl.question(prompt, (answer) => {
          waiting.delete(resolve);
          resolve(answer);
        });
      });
    },
    close(): void {
      rl.close();
    },
  };
}
