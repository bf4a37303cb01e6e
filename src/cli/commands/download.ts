import chalk from 'chalk';
import ora from 'ora';
import fs from 'fs/promises';
import path from 'path';
import { downloadFile } from '../../dropbox/index.js';
import { cliTransport, reportFailure, resolveAuth, type TokenOptions } from '../output.js';

export interface DownloadOptions extends TokenOptions {
  output?: string;
}

/**
 * Download a Dropbox file to `--output`, or to stdout when no output file
 * is given. Spinner output goes to stderr either way.
 */
export async function downloadCommand(dropboxPath: string, options: DownloadOptions = {}): Promise<void> {
  const auth = resolveAuth(options);
  if (!auth) {
    return;
  }

  const spinner = ora(`Downloading ${dropboxPath}...`).start();
  const result = await downloadFile(auth, { path: dropboxPath }, cliTransport(options));
  if (!result.ok) {
    reportFailure(spinner, 'Download failed', result.error);
    return;
  }

  if (!options.output) {
    spinner.stop();
    process.stdout.write(result.value);
    return;
  }

  try {
    const outputPath = path.resolve(options.output);
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, result.value);
    spinner.succeed(`Saved ${result.value.byteLength} bytes to ${outputPath}`);
  } catch (error) {
    spinner.fail('Could not write the downloaded file');
    if (error instanceof Error) {
      console.log(chalk.red(`  ${error.message}\n`));
    }
    process.exitCode = 1;
  }
}
