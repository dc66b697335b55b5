import inquirer from 'inquirer';
import { errorMessage } from './errors';
import { logger } from './Logger';

export type ConfirmFn = (message: string) => Promise<boolean>;

/**
 * Yes/no question on the terminal. Answers "no" when there is no terminal to ask.
 */
export const promptConfirm: ConfirmFn = async message => {
  if (!process.stdin.isTTY) {
    logger.debug(`No terminal, declining: ${message}`);
    return false;
  }

  try {
    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
      {
        type: 'confirm',
        name: 'confirmed',
        message,
        default: false,
      },
    ]);
    return confirmed;
  } catch (error) {
    logger.warn(`Could not prompt for confirmation, defaulting to no: ${errorMessage(error)}`);
    return false;
  }
};

export const declineAll: ConfirmFn = async () => false;
