/**
 * Operator input. Resolution logic only sees this interface, so it runs the
 * same with a terminal, a script, or a test.
 */

import inquirer from "inquirer";

export interface AskOptions {
  message: string;
  /** Editable suggestion. For secrets it is taken on empty input, never shown. */
  default?: string;
  secret?: boolean;
}

export interface InputProvider {
  readonly interactive: boolean;
  confirm(message: string, defaultValue: boolean): Promise<boolean>;
  /** Returns the entered value, or undefined when left empty. */
  ask(options: AskOptions): Promise<string | undefined>;
}

export class InquirerInputProvider implements InputProvider {
  readonly interactive = true;

  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    const { answer } = await inquirer.prompt<{ answer: boolean }>([
      {
        type: "confirm",
        name: "answer",
        message,
        default: defaultValue,
      },
    ]);
    return answer === true;
  }

  async ask(options: AskOptions): Promise<string | undefined> {
    const { answer } = await inquirer.prompt<{ answer: string }>([
      options.secret
        ? {
            type: "password",
            name: "answer",
            message: `${options.message}:`,
            mask: "*",
          }
        : {
            type: "input",
            name: "answer",
            message: `${options.message}:`,
            default: options.default,
          },
    ]);
    const value = typeof answer === "string" ? answer.trim() : "";
    return value || options.default || undefined;
  }
}

/** Answers nothing; the resolver turns every open question into an error. */
export class NonInteractiveInputProvider implements InputProvider {
  readonly interactive = false;

  async confirm(_message: string, defaultValue: boolean): Promise<boolean> {
    return defaultValue;
  }

  async ask(options: AskOptions): Promise<string | undefined> {
    return options.default;
  }
}
