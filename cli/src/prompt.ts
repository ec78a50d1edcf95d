/**
 * flakedesk CLI — Confirmation Prompts
 */

import * as readline from "readline";

export type ConfirmFn = (question: string, defaultYes: boolean) => Promise<boolean>;

/**
 * Interpret a reply by its first character.
 * Default yes: only n/N declines. Default no: only y/Y accepts.
 */
export function interpretAnswer(answer: string, defaultYes: boolean): boolean {
  const first = answer.trim().charAt(0);
  return defaultYes ? first !== "n" && first !== "N" : first === "y" || first === "Y";
}

/**
 * Ask on the terminal. A closed stdin counts as an empty reply.
 */
export const confirm: ConfirmFn = (question, defaultYes) => {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise<boolean>((resolve) => {
    let answered = false;
    rl.on("close", () => {
      if (!answered) {
        process.stdout.write("\n");
        resolve(interpretAnswer("", defaultYes));
      }
    });
    rl.question(question, (answer) => {
      answered = true;
      rl.close();
      resolve(interpretAnswer(answer, defaultYes));
    });
  });
};
