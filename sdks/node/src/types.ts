/** Any value the API can return in a JSON body. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** Configuration for the Vezor API client. */
export interface VezorClientConfig {
  /** Base URL of the Vezor API, e.g. https://api.vezor.io. Trailing slashes are stripped. */
  baseUrl: string;

  /** API token, sent as `Authorization: Bearer <token>`. */
  token?: string;

  /** Organization UUID, sent as `X-Organization-Id`. */
  organizationId?: string;

  /** Enable debug logging to stderr. Default: false. Never logs secret values. */
  debug?: boolean;
}

/**
 * Settings used to build a default client. Each field falls back to its
 * VEZOR_* environment variable when left out.
 */
export type VezorDefaults = Partial<VezorClientConfig>;

/** Tag filters and labels. Keys are converted to strings before they are sent. */
export type Tags = Record<string, string> | ReadonlyMap<string | number, string>;

export type SecretValueType = 'string' | 'password' | 'url' | 'connection_string';

export type GroupSecretsFormat = 'json' | 'env' | 'export';

/** Query parameter values. `undefined` entries are left out of the query string. */
export type QueryParams = Record<string, string | number | boolean | undefined>;

// --- Request inputs ---

export interface ListSecretsOptions {
  tags?: Tags;
  /** Search query matched against key_name by the server. */
  search?: string;
  limit?: number;
  offset?: number;
}

export interface CreateSecretInput {
  keyName: string;
  value: string;
  /** Should include env and app. */
  tags: Tags;
  description?: string;
  valueType?: SecretValueType;
  metadata?: JsonObject;
}

/** Fields left undefined are not sent. A new value creates a new version. */
export interface UpdateSecretInput {
  value?: string;
  description?: string;
  tags?: Tags;
}

export interface AuditLogOptions {
  limit?: number;
  offset?: number;
}

// --- Responses ---
// Payload shapes belong to the server; unknown fields are passed through.

export interface HealthResponse {
  status?: string;
  [field: string]: unknown;
}

export interface Organization {
  id: string;
  name: string;
  description?: string;
  [field: string]: unknown;
}

export interface OrganizationList {
  organizations: Organization[];
  [field: string]: unknown;
}

export interface Secret {
  id: string;
  key_name: string;
  /** Only present when a single secret is fetched. */
  value?: string;
  tags: Record<string, string>;
  description?: string;
  value_type: SecretValueType;
  version: number;
  created_by?: string;
  created_at: string;
  [field: string]: unknown;
}

export interface SecretList {
  secrets: Secret[];
  total: number;
  count: number;
  limit: number;
  offset: number;
  [field: string]: unknown;
}

export interface SecretVersion {
  version: number;
  created_by?: string;
  created_at: string;
  [field: string]: unknown;
}

export interface SecretVersionList {
  versions: SecretVersion[];
  [field: string]: unknown;
}

export interface DeleteResult {
  [field: string]: unknown;
}

/** Tag keys mapped to every value in use, e.g. `{ env: ['dev', 'prod'] }`. */
export type TagMap = Record<string, string[]>;

export interface ImportResult {
  [field: string]: unknown;
}

export interface Group {
  name: string;
  tags: Record<string, string>;
  description?: string;
  [field: string]: unknown;
}

export interface GroupList {
  groups: Group[];
  [field: string]: unknown;
}

export interface GroupSecretCount {
  count: number;
  [field: string]: unknown;
}

export interface GroupSecrets {
  /** Key name mapped to decrypted value. */
  secrets: Record<string, string>;
  [field: string]: unknown;
}

export interface ValidationResult {
  valid: boolean;
  missing: string[];
  [field: string]: unknown;
}

export interface AuditEntry {
  timestamp: string;
  action: string;
  user_email: string;
  [field: string]: unknown;
}

export interface AuditLog {
  entries: AuditEntry[];
  [field: string]: unknown;
}
