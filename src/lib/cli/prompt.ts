import { createInterface } from "node:readline";

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Asks one question on the given streams.
 * Resolves "" when the input ends before a line arrives (closed stdin, cron, pipes).
 */
export function askQuestion(question: string, streams: PromptStreams): Promise<string> {
  const rl = createInterface({ input: streams.input, output: streams.output });

  return new Promise<string>((resolve) => {
    let answered = false;

    rl.once("close", () => {
      if (!answered) {
        resolve("");
      }
    });
    rl.question(question, (answer) => {
      answered = true;
      resolve(answer);
      rl.close();
    });
  });
}
