import { createInterface } from "node:readline";
import type { InteractionFn } from "../types/run.js";

/** Empty answer takes the default; anything other than y/yes is a no. */
export function parseAnswer(answer: string, defaultAnswer: boolean): boolean {
  const a = answer.trim();
  if (a === "") return defaultAnswer;
  return /^y(es)?$/i.test(a);
}

export function promptSuffix(defaultAnswer: boolean): string {
  return defaultAnswer ? "[Y/n]" : "[y/N]";
}

/**
 * Terminal yes/no prompts on a single readline interface.
 * Lines that arrive before a question is asked are queued, so piped answers are not lost.
 * End of input answers every pending and later question with its default.
 */
export function createTerminalPrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): { interact: InteractionFn; close(): void } {
  const rl = createInterface({ input, terminal: false });
  const queued: string[] = [];
  let waiting: ((line: string | null) => void) | undefined;
  let closed = false;

  const deliver = (line: string | null): void => {
    const resolve = waiting;
    waiting = undefined;
    resolve?.(line);
  };
  rl.on("line", (line) => {
    if (waiting) deliver(line);
    else queued.push(line);
  });
  rl.on("close", () => {
    closed = true;
    deliver(null);
  });

  const nextLine = (): Promise<string | null> => {
    const line = queued.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (closed) return Promise.resolve(null);
    return new Promise((resolve) => { waiting = resolve; });
  };

  const interact: InteractionFn = async (question) => {
    output.write(`${question.message} ${promptSuffix(question.defaultAnswer)} `);
    const answer = await nextLine();
    return answer === null ? question.defaultAnswer : parseAnswer(answer, question.defaultAnswer);
  };

  return { interact, close: () => rl.close() };
}
