export { VezorClient, normalizeTags } from './client.js';
export { createClient, resolveConfig, DEFAULT_BASE_URL } from './config.js';
export { VERSION } from './version.js';
export type {
  VezorClientConfig,
  VezorDefaults,
  JsonValue,
  JsonObject,
  Tags,
  SecretValueType,
  GroupSecretsFormat,
  ListSecretsOptions,
  CreateSecretInput,
  UpdateSecretInput,
  AuditLogOptions,
  HealthResponse,
  Organization,
  OrganizationList,
  Secret,
  SecretList,
  SecretVersion,
  SecretVersionList,
  DeleteResult,
  TagMap,
  ImportResult,
  Group,
  GroupList,
  GroupSecretCount,
  GroupSecrets,
  ValidationResult,
  AuditEntry,
  AuditLog,
} from './types.js';
export {
  VezorError,
  VezorApiError,
  VezorConfigError,
  VezorAuthError,
  VezorPermissionError,
  VezorNotFoundError,
  VezorValidationError,
  raiseForStatus,
} from './errors.js';
