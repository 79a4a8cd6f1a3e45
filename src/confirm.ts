import { createInterface } from "readline";
import { InterruptedError } from "./errors.js";

export interface PromptIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Ask a y/n question until the answer is one of y/yes/n/no.
 * End of input counts as "no"; Ctrl+C or an aborted `signal` rejects with
 * InterruptedError.
 */
export function confirmAction(
  message: string,
  io: PromptIO = { input: process.stdin, output: process.stdout },
  signal?: AbortSignal,
): Promise<boolean> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new InterruptedError());
      return;
    }

    const rl = createInterface({ input: io.input, output: io.output });
    let settled = false;

    const finish = (outcome: boolean | InterruptedError): void => {
      if (settled) return;
      settled = true;
      signal?.removeEventListener("abort", onAbort);
      rl.close();
      if (outcome instanceof InterruptedError) reject(outcome);
      else resolve(outcome);
    };
    const onAbort = (): void => finish(new InterruptedError());
    const ask = (): void => {
      io.output.write(`${message} (y/n): `);
    };

    rl.on("line", (line) => {
      const answer = line.trim().toLowerCase();
      if (answer === "y" || answer === "yes") {
        finish(true);
      } else if (answer === "n" || answer === "no") {
        finish(false);
      } else {
        io.output.write("Please enter 'y' or 'n'\n");
        ask();
      }
    });
    rl.on("SIGINT", onAbort);
    rl.on("close", () => finish(false));
    signal?.addEventListener("abort", onAbort, { once: true });

    ask();
  });
}
