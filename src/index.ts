#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { createRequire } from 'module';
import {
  authUrlCommand,
  loginCommand,
  revokeCommand,
  downloadCommand,
  uploadCommand,
} from './cli/commands/index.js';

// Get version from package.json
const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../package.json');
const VERSION = pkg.version;

const program = new Command();

program
  .name('dbxkit')
  .description('Dropbox from the terminal: implicit-grant login, token revoke, file download and upload')
  .version(VERSION, '-v, --version', 'Show version number');

// Authorization URL
program
  .command('authorize-url')
  .alias('url')
  .description('Print the Dropbox implicit-grant authorization URL')
  .option('-c, --client-id <key>', 'Dropbox app key (defaults to DBXKIT_CLIENT_ID)')
  .option('-r, --redirect-uri <uri>', 'Redirect URI, used exactly as given')
  .action(async (options) => {
    await authUrlCommand(options);
  });

// Login command
program
  .command('login')
  .description('Authorize in the browser and capture the access token locally')
  .option('-c, --client-id <key>', 'Dropbox app key (defaults to DBXKIT_CLIENT_ID)')
  .option('-r, --redirect-uri <uri>', 'Loopback redirect URI (defaults to DBXKIT_REDIRECT_URI)')
  .option('-p, --port <port>', 'Port of the local callback server')
  .option('-t, --timeout <seconds>', 'How long to wait for the redirect')
  .option('--no-open', 'Print the authorization URL instead of opening a browser')
  .option('-m, --mask-token', 'Mask the access token in the output')
  .action(async (options) => {
    await loginCommand(options);
  });

// Revoke command
program
  .command('revoke')
  .description('Revoke an access token')
  .option('-T, --token <token>', 'Access token (defaults to DBXKIT_ACCESS_TOKEN)')
  .option('--verbose', 'Print each HTTP request')
  .action(async (options) => {
    await revokeCommand(options);
  });

// Download command
program
  .command('download <path>')
  .alias('dl')
  .description('Download a file from Dropbox')
  .option('-o, --output <file>', 'Write to a file instead of stdout')
  .option('-T, --token <token>', 'Access token (defaults to DBXKIT_ACCESS_TOKEN)')
  .option('--verbose', 'Print each HTTP request')
  .action(async (dropboxPath, options) => {
    await downloadCommand(dropboxPath, options);
  });

// Upload command
program
  .command('upload <file> <path>')
  .alias('up')
  .description('Upload a local file to a Dropbox path')
  .option('--mode <mode>', 'Conflict behaviour: add, overwrite or update', 'add')
  .option('--rev <revision>', 'Revision to update (with --mode update)')
  .option('--autorename', 'Let Dropbox rename the file on conflict')
  .option('--client-modified <timestamp>', 'Client modification time (ISO 8601)')
  .option('--mute', 'Do not notify the user\'s desktop clients')
  .option('-T, --token <token>', 'Access token (defaults to DBXKIT_ACCESS_TOKEN)')
  .option('--verbose', 'Print each HTTP request')
  .action(async (file, dropboxPath, options) => {
    await uploadCommand(file, dropboxPath, options);
  });

// Version command (explicit)
program
  .command('version')
  .description('Show version number')
  .action(() => {
    console.log(chalk.cyan(`\n  dbxkit v${VERSION}\n`));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(`\n  ${error instanceof Error ? error.message : String(error)}\n`));
  process.exitCode = 1;
});
