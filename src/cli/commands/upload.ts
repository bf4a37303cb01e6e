import chalk from 'chalk';
import ora from 'ora';
import fs from 'fs/promises';
import { z } from 'zod';
import { uploadFile, WriteMode, type UploadRequest } from '../../dropbox/index.js';
import { cliTransport, formatUploadResponse, reportFailure, resolveAuth, type TokenOptions } from '../output.js';

export interface UploadOptions extends TokenOptions {
  mode?: string;
  rev?: string;
  autorename?: boolean;
  clientModified?: string;
  mute?: boolean;
}

const UploadOptionsSchema = z
  .object({
    mode: z.enum(['add', 'overwrite', 'update']).default('add'),
    rev: z.string().trim().min(1).optional(),
    autorename: z.boolean().default(false),
    clientModified: z
      .string()
      .refine((value) => !Number.isNaN(Date.parse(value)), 'Expected an ISO 8601 timestamp')
      .transform((value) => new Date(value))
      .optional(),
    mute: z.boolean().default(false),
  })
  .refine((options) => options.mode !== 'update' || options.rev !== undefined, {
    message: 'Mode "update" needs --rev <revision>',
    path: ['rev'],
  });

/**
 * Turn command-line options into the upload parameters, or an error
 * message.
 */
export function parseUploadOptions(
  dropboxPath: string,
  content: Uint8Array,
  options: UploadOptions,
): { ok: true; upload: UploadRequest } | { ok: false; message: string } {
  const parsed = UploadOptionsSchema.safeParse({
    mode: options.mode,
    rev: options.rev,
    autorename: options.autorename,
    clientModified: options.clientModified,
    mute: options.mute,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return { ok: false, message: `${where}${issue.message}` };
  }

  const { mode, rev, autorename, clientModified, mute } = parsed.data;
  return {
    ok: true,
    upload: {
      path: dropboxPath,
      mode: mode === 'update' && rev !== undefined
        ? WriteMode.update(rev)
        : mode === 'overwrite' ? WriteMode.overwrite : WriteMode.add,
      autorename,
      clientModified,
      mute,
      content,
    },
  };
}

export async function uploadCommand(
  localFile: string,
  dropboxPath: string,
  options: UploadOptions = {},
): Promise<void> {
  const auth = resolveAuth(options);
  if (!auth) {
    return;
  }

  let content: Uint8Array;
  try {
    content = await fs.readFile(localFile);
  } catch (error) {
    console.log(chalk.red(`  Could not read ${localFile}`));
    if (error instanceof Error) {
      console.log(chalk.gray(`  ${error.message}\n`));
    }
    process.exitCode = 1;
    return;
  }

  const parsed = parseUploadOptions(dropboxPath, content, options);
  if (!parsed.ok) {
    console.log(chalk.red(`  ${parsed.message}\n`));
    process.exitCode = 1;
    return;
  }

  const spinner = ora(`Uploading ${localFile} (${content.byteLength} bytes)...`).start();
  const result = await uploadFile(auth, parsed.upload, cliTransport(options));
  if (!result.ok) {
    reportFailure(spinner, 'Upload failed', result.error);
    return;
  }

  spinner.succeed('Upload complete');
  console.log();
  for (const line of formatUploadResponse(result.value)) {
    console.log(chalk.gray(`  ${line}`));
  }
  console.log();
}
