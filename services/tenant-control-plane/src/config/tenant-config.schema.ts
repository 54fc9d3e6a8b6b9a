import { z } from 'zod';
import { requiredStringSchema, urlWithoutTrailingSlashSchema } from '../utils/zod.util';
import { SecretRefSchema } from './secret-ref.schema';

export const DEFAULT_AUTHORITY_HOST = 'https://login.microsoftonline.com';
export const DEFAULT_GRAPH_BASE_URL = 'https://graph.microsoft.com';
export const DEFAULT_GRAPH_SCOPE = 'https://graph.microsoft.com/.default';

export const AuthType = {
  CLIENT_SECRET: 'client_secret',
  CERTIFICATE: 'certificate',
  MANAGED_IDENTITY: 'managed_identity',
} as const;

export type AuthType = (typeof AuthType)[keyof typeof AuthType];

const authorityHostSchema = urlWithoutTrailingSlashSchema(
  'Entra ID authority host',
  'authorityHost must not end with a trailing slash',
).default(DEFAULT_AUTHORITY_HOST);

const ClientSecretAuthSchema = z.strictObject({
  type: z.literal(AuthType.CLIENT_SECRET),
  clientId: requiredStringSchema.describe('App registration client ID'),
  clientSecret: SecretRefSchema,
  authorityHost: authorityHostSchema,
});

const CertificateAuthSchema = z.strictObject({
  type: z.literal(AuthType.CERTIFICATE),
  clientId: requiredStringSchema.describe('App registration client ID'),
  certificatePath: requiredStringSchema.describe(
    'Path to a PEM file holding the private key and the certificate',
  ),
  certificatePassword: SecretRefSchema.optional(),
  authorityHost: authorityHostSchema,
});

const ManagedIdentityAuthSchema = z.strictObject({
  type: z.literal(AuthType.MANAGED_IDENTITY),
  clientId: requiredStringSchema.optional().describe('Client ID of a user-assigned identity'),
});

export const AuthConfigSchema = z
  .discriminatedUnion('type', [ClientSecretAuthSchema, CertificateAuthSchema, ManagedIdentityAuthSchema])
  .readonly();

export type AuthConfig = z.infer<typeof AuthConfigSchema>;
export type ClientSecretAuthConfig = z.infer<typeof ClientSecretAuthSchema>;
export type CertificateAuthConfig = z.infer<typeof CertificateAuthSchema>;
export type ManagedIdentityAuthConfig = z.infer<typeof ManagedIdentityAuthSchema>;

export const TenantConfigSchema = z
  .strictObject({
    tenantId: requiredStringSchema.describe('Entra ID tenant ID'),
    displayName: z.string().optional(),
    auth: AuthConfigSchema,
    defaultScopes: z
      .array(requiredStringSchema)
      .min(1, { message: 'At least one scope must be provided per tenant' })
      .default([DEFAULT_GRAPH_SCOPE])
      .readonly(),
    graphBaseUrl: urlWithoutTrailingSlashSchema(
      'Microsoft Graph base URL',
      'graphBaseUrl must not end with a trailing slash',
    ).default(DEFAULT_GRAPH_BASE_URL),
    requiredApplicationRoles: z.array(requiredStringSchema).default([]).readonly(),
    requiredDelegatedPermissions: z.array(requiredStringSchema).default([]).readonly(),
  })
  .readonly();

export type TenantConfig = z.infer<typeof TenantConfigSchema>;
export type TenantConfigInput = z.input<typeof TenantConfigSchema>;

export const ControlPlaneConfigSchema = z.strictObject({
  tenants: z.array(TenantConfigSchema),
});
