export { type AppConfig, AppConfigSchema, appConfig } from './app.config';
export { resolveSecret, type SecretRef, SecretRefSchema } from './secret-ref.schema';
export { loadTenantConfigs } from './tenant-config-loader';
export {
  type AuthConfig,
  AuthConfigSchema,
  AuthType,
  type CertificateAuthConfig,
  type ClientSecretAuthConfig,
  ControlPlaneConfigSchema,
  DEFAULT_GRAPH_SCOPE,
  type ManagedIdentityAuthConfig,
  type TenantConfig,
  type TenantConfigInput,
  TenantConfigSchema,
} from './tenant-config.schema';
