import { Redacted } from '@control-plane/utils';
import { z } from 'zod';
import { SecretResolutionError } from '../errors';

export const SecretRefSchema = z
  .strictObject({
    env: z
      .string()
      .trim()
      .nonempty()
      .optional()
      .describe('Name of the environment variable holding the secret'),
    value: z
      .string()
      .nonempty()
      .transform((secret) => new Redacted(secret))
      .optional()
      .describe('Inline secret. Local development only'),
    keyVaultSecretUri: z.url().optional().describe('Azure Key Vault secret URI'),
  })
  .refine(
    (ref) => ref.env !== undefined || ref.value !== undefined || ref.keyVaultSecretUri !== undefined,
    { message: 'A secret reference needs one of env, value or keyVaultSecretUri' },
  )
  .readonly();

export type SecretRef = z.infer<typeof SecretRefSchema>;

/**
 * Resolves a secret reference to its raw value. Precedence is `env`, then the
 * inline `value`, then `keyVaultSecretUri`.
 */
export function resolveSecret(ref: SecretRef, env: NodeJS.ProcessEnv = process.env): string {
  if (ref.env !== undefined) {
    const secret = env[ref.env];
    if (!secret) {
      throw new SecretResolutionError(`Environment variable ${ref.env} is not set`);
    }
    return secret;
  }

  if (ref.value !== undefined) {
    return ref.value.value;
  }

  if (ref.keyVaultSecretUri !== undefined) {
    throw new SecretResolutionError(
      `Key Vault resolution is not supported (${ref.keyVaultSecretUri}). Use env or value instead`,
    );
  }

  throw new SecretResolutionError('Secret reference is empty');
}
