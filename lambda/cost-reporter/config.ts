import { z } from 'zod';
import { ConfigError, describeError } from './errors';
import { isBase64 } from './secrets';
import { Decrypter, InvocationMode, ReporterConfig } from './types';

const DEFAULT_COST_EXPLORER_REGION = 'us-east-1';

const EnvSchema = z.object({
  WEBHOOK_ENDPOINT: z.string({ required_error: 'WEBHOOK_ENDPOINT is required' }).min(1, 'WEBHOOK_ENDPOINT must not be empty'),
  CHANNEL_NAME: z.string({ required_error: 'CHANNEL_NAME is required' }).min(1, 'CHANNEL_NAME must not be empty'),
  AWS_LAMBDA_FUNCTION_NAME: z.string().optional(),
  SECRETS_ENCRYPTED: z
    .enum(['true', 'false'], {
      errorMap: () => ({ message: "SECRETS_ENCRYPTED must be 'true' or 'false'" }),
    })
    .optional(),
  COST_EXPLORER_REGION: z.string().min(1).default(DEFAULT_COST_EXPLORER_REGION),
});

type Env = Record<string, string | undefined>;

export function detectMode(env: Env): InvocationMode {
  return env.AWS_LAMBDA_FUNCTION_NAME ? 'lambda' : 'local';
}

async function decryptSecret(decrypter: Decrypter, name: string, value: string): Promise<string> {
  if (!isBase64(value)) {
    throw new ConfigError(`Failed to decode ${name} as Base64`);
  }

  try {
    return await decrypter.decrypt(value);
  } catch (error) {
    throw new ConfigError(`Failed to decrypt ${name}: ${describeError(error)}`, { cause: error });
  }
}

/**
 * Validates the environment and resolves the webhook secrets.
 *
 * In Lambda the secrets are expected as base64 KMS ciphertext unless
 * `SECRETS_ENCRYPTED=false`; locally they are plaintext unless
 * `SECRETS_ENCRYPTED=true`. The decrypter is only called for encrypted values.
 *
 * `mode` only picks that default; the returned value is informational and
 * nothing downstream branches on it.
 */
export async function loadConfig(env: Env, decrypter?: Decrypter): Promise<ReporterConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.errors.map((err) => err.message).join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`, { cause: parsed.error });
  }

  const vars = parsed.data;
  const mode = detectMode(env);
  const encrypted = vars.SECRETS_ENCRYPTED ? vars.SECRETS_ENCRYPTED === 'true' : mode === 'lambda';

  let webhookEndpoint = vars.WEBHOOK_ENDPOINT;
  let channelName = vars.CHANNEL_NAME;

  if (encrypted) {
    if (!decrypter) {
      throw new ConfigError('Secrets are encrypted but no decrypter is available');
    }
    webhookEndpoint = await decryptSecret(decrypter, 'WEBHOOK_ENDPOINT', webhookEndpoint);
    channelName = await decryptSecret(decrypter, 'CHANNEL_NAME', channelName);
  }

  console.log('Configuration loaded', {
    mode,
    encrypted,
    channelName,
    costExplorerRegion: vars.COST_EXPLORER_REGION,
  });

  return {
    webhookEndpoint,
    channelName,
    mode,
    costExplorerRegion: vars.COST_EXPLORER_REGION,
  };
}
