import fs from "fs-extra";
import inquirer from "inquirer";
import path from "path";

import { expandHome } from "./paths";
import { Prompter } from "./types";

export type Ask = (message: string) => Promise<string>;

export const askQuestion: Ask = async message => {
  const { answer } = await inquirer.prompt<{ answer: string }>([{ name: "answer", type: "input", message }]);
  return answer;
};

export function parseYesNo(answer: string): boolean | "quit" | undefined {
  switch (answer.trim().toLowerCase()) {
    case "y":
    case "yes":
      return true;
    case "n":
    case "no":
      return false;
    case "q":
    case "quit":
      return "quit";
    default:
      return undefined;
  }
}

/**
 * Asks a yes/no question until it gets an answer. A blank answer returns
 * `defaultAnswer`, "q" or "quit" exits the process.
 */
export async function yesno(message: string, defaultAnswer: boolean, ask: Ask = askQuestion): Promise<boolean> {
  const question = `${message} ${defaultAnswer ? "[Y/n]" : "[N/y]"}`;

  for (;;) {
    const answer = await ask(question);
    if (!answer.trim()) {
      return defaultAnswer;
    }

    const parsed = parseYesNo(answer);
    if (parsed === "quit") {
      console.log("Exit");
      process.exit(0);
    }
    if (parsed !== undefined) {
      return parsed;
    }

    console.log("Please answer YES or NO.");
  }
}

export async function askForPath(defaultPath: string, ask: Ask = askQuestion): Promise<string> {
  const fallback = path.resolve(expandHome(defaultPath));

  for (;;) {
    const answer = (await ask(`Please give Dropbox folder location or press enter for default [${fallback}]:`))
      .trim()
      .replace(/^'+|'+$/g, "");

    if (!answer) {
      return fallback;
    }

    const chosen = path.resolve(expandHome(answer));
    if (!(await fs.pathExists(chosen))) {
      return chosen;
    }

    if (await yesno(`Directory '${chosen}' already exists. Should we overwrite?`, true, ask)) {
      return chosen;
    }
  }
}

export const consolePrompter: Prompter = {
  yesno: (message, defaultAnswer) => yesno(message, defaultAnswer),
  askForPath: defaultPath => askForPath(defaultPath),
};
