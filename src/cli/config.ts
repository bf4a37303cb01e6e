import dotenv from 'dotenv';
import { z } from 'zod';

export const DEFAULT_CALLBACK_PORT = 53682;

const EnvSchema = z.object({
  DBXKIT_CLIENT_ID: z.string().trim().min(1).optional(),
  DBXKIT_REDIRECT_URI: z.string().trim().min(1).optional(),
  DBXKIT_ACCESS_TOKEN: z.string().trim().min(1).optional(),
  DBXKIT_CALLBACK_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_CALLBACK_PORT),
});

export interface CliConfig {
  clientId?: string;
  redirectUri?: string;
  accessToken?: string;
  callbackPort: number;
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Read configuration from the environment, after loading `.env` from the
 * working directory when one exists.
 */
export function loadConfig(env: NodeJS.ProcessEnv = loadDotenv()): CliConfig {
  const parsed = EnvSchema.safeParse({
    DBXKIT_CLIENT_ID: blankToUndefined(env.DBXKIT_CLIENT_ID),
    DBXKIT_REDIRECT_URI: blankToUndefined(env.DBXKIT_REDIRECT_URI),
    DBXKIT_ACCESS_TOKEN: blankToUndefined(env.DBXKIT_ACCESS_TOKEN),
    DBXKIT_CALLBACK_PORT: blankToUndefined(env.DBXKIT_CALLBACK_PORT),
  });

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  return {
    clientId: parsed.data.DBXKIT_CLIENT_ID,
    redirectUri: parsed.data.DBXKIT_REDIRECT_URI,
    accessToken: parsed.data.DBXKIT_ACCESS_TOKEN,
    callbackPort: parsed.data.DBXKIT_CALLBACK_PORT,
  };
}

function loadDotenv(): NodeJS.ProcessEnv {
  dotenv.config();
  return process.env;
}
