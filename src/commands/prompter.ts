import { PromptInterruptedError } from '../errors.js';

// One line of input per question
export interface Prompter {
  ask(message: string): Promise<string>;
}

export class EnquirerPrompter implements Prompter {
  async ask(message: string): Promise<string> {
    const { default: Enquirer } = await import('enquirer');
    const enquirer = new Enquirer();

    let response: object;
    try {
      response = await enquirer.prompt({ type: 'input', name: 'answer', message });
    } catch (error) {
      // Enquirer rejects when the prompt is cancelled with Ctrl+C
      throw new PromptInterruptedError(error);
    }

    if (!('answer' in response)) return '';
    return typeof response.answer === 'string' ? response.answer : '';
  }
}
