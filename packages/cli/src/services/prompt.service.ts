/**
 * Interactive prompts
 *
 * Setup steps ask through this interface so tests can answer for the user.
 */

import inquirer from 'inquirer';

export interface Prompter {
  confirm(message: string, defaultValue: boolean): Promise<boolean>;
  input(message: string, defaultValue?: string): Promise<string>;
}

export const inquirerPrompter: Prompter = {
  async confirm(message, defaultValue) {
    const { answer } = await inquirer.prompt<{ answer: boolean }>([
      {
        type: 'confirm',
        name: 'answer',
        message,
        default: defaultValue,
      },
    ]);
    return answer;
  },

  async input(message, defaultValue) {
    const { answer } = await inquirer.prompt<{ answer: string }>([
      {
        type: 'input',
        name: 'answer',
        message,
        default: defaultValue,
      },
    ]);
    return answer ?? '';
  },
};
