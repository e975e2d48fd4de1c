import inquirer from 'inquirer';

/**
 * Thin interactive I/O surface. Workflows only talk to the terminal through it.
 */
export interface Prompter {
  ask(message: string, options?: { default?: string }): Promise<string>;
  askSecret(message: string): Promise<string>;
  say(message: string): void;
}

export class InquirerPrompter implements Prompter {
  async ask(message: string, options?: { default?: string }): Promise<string> {
    const { value } = await inquirer.prompt<{ value: string }>([{
      type: 'input',
      name: 'value',
      message,
      default: options?.default,
    }]);
    return value.trim();
  }

  async askSecret(message: string): Promise<string> {
    const { value } = await inquirer.prompt<{ value: string }>([{
      type: 'password',
      name: 'value',
      message,
      mask: '*',
    }]);
    return value;
  }

  say(message: string): void {
    console.log(message);
  }
}
