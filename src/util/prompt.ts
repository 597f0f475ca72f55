/**
 * Yes/no confirmation on the terminal. Prompts go to stderr so stdout and
 * the delta descriptor stay clean.
 */

import { createInterface } from "node:readline";

export function isInteractive(): boolean {
  return Boolean(process.stdin.isTTY && process.stderr.isTTY);
}

export function confirm(question: string, defaultAnswer = false): Promise<boolean> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stderr,
  });

  const hint = defaultAnswer ? "Y/n" : "y/N";
  return new Promise(resolve => {
    rl.question(`${question} (${hint}): `, answer => {
      rl.close();
      const normalized = answer.trim().toLowerCase();
      resolve(normalized === "" ? defaultAnswer : normalized.startsWith("y"));
    });
  });
}
