import inquirer from 'inquirer';
import type { Logger } from '@mender/shared';

export interface ConfirmOptions {
  yes?: boolean;
  nonInteractive?: boolean;
  logger?: Logger;
}

/**
 * Prompts the user for confirmation.
 *
 * `--yes` answers yes without asking. Without a TTY (or with `nonInteractive`)
 * the default answer is taken.
 *
 * @param action The question, e.g. "Keep the fixes on branch autofix-run-1700000000?"
 * @param details Optional context printed above the question
 * @param defaultNo Whether the default choice should be 'No' (default: true)
 */
export async function confirm(
  action: string,
  details?: string,
  defaultNo: boolean = true,
  options: ConfirmOptions = {},
): Promise<boolean> {
  const { logger } = options;

  if (options.yes) {
    await logger?.debug(`Auto-approved: ${action}`);
    return true;
  }

  if (options.nonInteractive || !process.stdin.isTTY) {
    await logger?.debug(`No terminal to ask "${action}"; answering ${defaultNo ? 'no' : 'yes'}`);
    return !defaultNo;
  }

  const response = await inquirer.prompt<{ confirmed: boolean }>([
    {
      type: 'confirm',
      name: 'confirmed',
      message: details ? `${action}\n${details}` : action,
      default: !defaultNo,
    },
  ]);

  await logger?.debug(`${action} ${response.confirmed ? 'yes' : 'no'}`);
  return response.confirmed;
}
