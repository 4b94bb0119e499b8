/**
 * Prompter
 * The questions the wizard asks, behind an interface so flows can be
 * driven by inquirer in a terminal or by a script in tests
 */

import inquirer from 'inquirer';

/**
 * One entry of a numbered menu over a closed set of options
 */
export interface MenuOption<T> {
  label: string;
  value: T;
}

export interface InputOptions {
  /** Returned when the answer is left blank */
  default?: string;
  /** Return true to accept, or a message explaining the problem */
  validate?: (value: string) => true | string;
}

export interface Prompter {
  input(message: string, options?: InputOptions): Promise<string>;
  confirm(message: string, defaultValue: boolean): Promise<boolean>;
  /**
   * Numbered menu; `defaultIndex` is zero-based
   */
  select<T>(message: string, options: readonly MenuOption<T>[], defaultIndex?: number): Promise<T>;
}

/**
 * Terminal prompts backed by inquirer
 */
export class InquirerPrompter implements Prompter {
  public async input(message: string, options: InputOptions = {}): Promise<string> {
    const check = options.validate;
    const { value } = await inquirer.prompt<{ value: string }>([
      {
        type: 'input',
        name: 'value',
        message,
        default: options.default,
        validate: check ? (answer: string) => check(answer.trim() || options.default || '') : undefined,
      },
    ]);
    return value.trim() || options.default || '';
  }

  public async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    const { value } = await inquirer.prompt<{ value: boolean }>([
      {
        type: 'confirm',
        name: 'value',
        message,
        default: defaultValue,
      },
    ]);
    return value;
  }

  public async select<T>(message: string, options: readonly MenuOption<T>[], defaultIndex = 0): Promise<T> {
    // rawlist numbers the entries and accepts the number as the answer
    const { index } = await inquirer.prompt<{ index: number }>([
      {
        type: 'rawlist',
        name: 'index',
        message,
        choices: options.map((option, position) => ({ name: option.label, value: position })),
        default: defaultIndex,
      },
    ]);

    const selected = options[index];
    if (!selected) {
      throw new Error(`Invalid menu selection: ${index}`);
    }
    return selected.value;
  }
}
