import inquirer from 'inquirer';
import { createLogger, errorMessage } from './logger.js';

const log = createLogger('auth');

export async function askOperator(): Promise<void> {
  await inquirer.prompt([
    {
      type: 'input',
      name: 'ready',
      message: 'Finish the login or challenge in the browser window, then press Enter to continue'
    }
  ]);
}

/** inquirer rejects with ExitPromptError when stdin closes or the prompt is interrupted. */
export function isPromptClosed(error: unknown): boolean {
  return error instanceof Error && error.name === 'ExitPromptError';
}

/** A closed prompt counts as "continue"; the session is saved either way. */
export function createOperatorWait(ask: () => Promise<unknown> = askOperator): () => Promise<void> {
  return async () => {
    try {
      await ask();
    } catch (error) {
      if (!isPromptClosed(error)) {
        throw error;
      }
      log.warn(`Operator prompt closed (${errorMessage(error)}); continuing`);
    }
  };
}
