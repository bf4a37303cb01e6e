import chalk from 'chalk';
import inquirer from 'inquirer';

export function validateAppKey(input: string): true | string {
  const value = input.trim();
  if (!value) {
    return 'App key is required.';
  }
  if (!/^[a-z0-9]+$/i.test(value)) {
    return 'App key should only contain letters and digits.';
  }
  return true;
}

export function maskToken(token: string): string {
  const value = token.trim();
  if (value.length <= 12) {
    return '*'.repeat(value.length);
  }

  return `${value.slice(0, 4)}...${value.slice(-4)}`;
}

/**
 * Ask for the Dropbox app key (the OAuth client id) when neither an option
 * nor the environment supplied one.
 */
export async function promptAppKey(): Promise<string> {
  console.log(chalk.yellow('\n  Dropbox App Setup'));
  console.log(chalk.gray('  ─────────────────────────────────────────────────────────'));
  console.log(chalk.gray('  1) Create an app in the Dropbox App Console.'));
  console.log(chalk.gray('  2) Allow the implicit grant and add the redirect URI shown above.'));
  console.log(chalk.gray('  3) Paste the app key below, or set DBXKIT_CLIENT_ID.\n'));

  const answers = await inquirer.prompt<{ clientId: string }>([
    {
      type: 'input',
      name: 'clientId',
      message: 'Dropbox app key:',
      validate: validateAppKey,
      filter: (value: string) => value.trim(),
    },
  ]);

  return answers.clientId.trim();
}
