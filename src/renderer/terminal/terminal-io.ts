import readline from 'node:readline/promises';

export type TerminalIo = {
  ask: (prompt: string) => Promise<string | null>;
  print: (line?: string) => void;
  close: () => void;
};

/**
 * `ask` devolve null quando a entrada termina (Ctrl+D ou pipe fechado).
 */
export function createReadlineIo(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): TerminalIo {
  const rl = readline.createInterface({ input, output, terminal: false });
  let closed = false;
  const closedSignal = new Promise<null>((resolve) => {
    rl.once('close', () => {
      closed = true;
      resolve(null);
    });
  });

  const ask = async (prompt: string): Promise<string | null> => {
    if (closed) {
      return null;
    }

    const answer = rl.question(prompt).catch((error: unknown) => {
      if (closed) {
        return null;
      }
      throw error;
    });
    return Promise.race([answer, closedSignal]);
  };

  const print = (line = ''): void => {
    output.write(`${line}\n`);
  };

  const close = (): void => {
    rl.close();
  };

  return { ask, print, close };
}
