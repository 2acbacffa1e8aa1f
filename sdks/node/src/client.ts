import type {
  VezorClientConfig,
  Tags,
  QueryParams,
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
  SecretVersionList,
  DeleteResult,
  TagMap,
  ImportResult,
  Group,
  GroupList,
  GroupSecretCount,
  GroupSecrets,
  ValidationResult,
  AuditLog,
} from './types.js';
import { VezorConfigError, raiseForStatus } from './errors.js';
import { VERSION } from './version.js';

const USER_AGENT = `@vezor/sdk-node/${VERSION}`;
const SECRET_NAME_SEARCH_LIMIT = 100;

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

interface SendOptions {
  params?: QueryParams;
  body?: object | string;
  contentType?: string;
}

/**
 * Vezor API client.
 *
 * Every method is a single request to the Vezor API (two for
 * `getSecretByName`). Non-2xx responses throw a subclass of `VezorError`.
 *
 * @example
 * ```typescript
 * const vezor = new VezorClient({
 *   baseUrl: 'https://api.vezor.io',
 *   token: process.env.VEZOR_TOKEN,
 *   organizationId: process.env.VEZOR_ORGANIZATION_ID,
 * });
 *
 * const secret = await vezor.getSecretByName('DATABASE_URL', { tags: { env: 'prod' } });
 * console.log(secret?.value);
 * ```
 */
export class VezorClient {
  public readonly baseUrl: string;
  public token: string | undefined;
  public organizationId: string | undefined;
  private readonly debug: boolean;

  constructor(config: VezorClientConfig) {
    this.baseUrl = config.baseUrl.trim().replace(/\/+$/, '');
    this.token = config.token;
    this.organizationId = config.organizationId;
    this.debug = config.debug ?? false;

    if (!this.baseUrl) {
      throw new VezorConfigError('Missing baseUrl. Pass { baseUrl } in config.');
    }
  }

  // --- Health ---

  async health(): Promise<HealthResponse> {
    return this.requestJson<HealthResponse>('GET', '/api/v1/health');
  }

  // --- Organizations ---

  /** List organizations the authenticated user belongs to. */
  async listOrganizations(): Promise<OrganizationList> {
    return this.requestJson<OrganizationList>('GET', '/api/v1/organizations');
  }

  async getOrganization(orgId: string): Promise<Organization> {
    return this.requestJson<Organization>('GET', `/api/v1/organizations/${segment(orgId)}`);
  }

  async createOrganization(name: string, description = ''): Promise<Organization> {
    return this.requestJson<Organization>('POST', '/api/v1/organizations', {
      body: { name, description },
    });
  }

  // --- Secrets ---

  /**
   * List secrets (without values), filtered by tags and search.
   *
   * Tags are sent as individual query parameters, so `{ env: 'prod' }`
   * becomes `?env=prod`.
   */
  async listSecrets(options: ListSecretsOptions = {}): Promise<SecretList> {
    const params: QueryParams = {};
    if (options.tags) Object.assign(params, normalizeTags(options.tags));
    if (options.search !== undefined) params.search = options.search;
    if (options.limit !== undefined) params.limit = options.limit;
    params.offset = options.offset ?? 0;

    return this.requestJson<SecretList>('GET', '/api/v1/secrets', { params });
  }

  /** Fetch a secret with its decrypted value, optionally at an older version. */
  async getSecret(secretId: string, options: { version?: number } = {}): Promise<Secret> {
    return this.requestJson<Secret>('GET', `/api/v1/secrets/${segment(secretId)}`, {
      params: { version: options.version },
    });
  }

  /**
   * Find a secret by key name (case-insensitive) and fetch its value.
   *
   * Only the first 100 search results are considered. Returns `null` when
   * none of them has a matching key name.
   */
  async getSecretByName(keyName: string, options: { tags?: Tags } = {}): Promise<Secret | null> {
    const result = await this.listSecrets({
      tags: options.tags,
      search: keyName,
      limit: SECRET_NAME_SEARCH_LIMIT,
    });

    const wanted = keyName.toLowerCase();
    const match = result.secrets?.find((s) => s.key_name.toLowerCase() === wanted);
    if (!match) {
      this.log(`No secret named "${keyName}" in ${result.secrets?.length ?? 0} search results`);
      return null;
    }

    return this.getSecret(match.id);
  }

  async createSecret(input: CreateSecretInput): Promise<Secret> {
    const body: Record<string, unknown> = {
      key_name: input.keyName,
      value: input.value,
      tags: normalizeTags(input.tags),
      path: input.keyName.toLowerCase(),
    };
    if (input.description) body.description = input.description;
    body.value_type = input.valueType ?? 'string';
    if (input.metadata) body.metadata = input.metadata;

    return this.requestJson<Secret>('POST', '/api/v1/secrets', { body });
  }

  /** Update a secret. Setting `value` creates a new version. */
  async updateSecret(secretId: string, update: UpdateSecretInput): Promise<Secret> {
    const body: Record<string, unknown> = {};
    if (update.value !== undefined) body.value = update.value;
    if (update.description !== undefined) body.description = update.description;
    if (update.tags) body.tags = normalizeTags(update.tags);

    return this.requestJson<Secret>('PUT', `/api/v1/secrets/${segment(secretId)}`, { body });
  }

  /** Delete a secret and all its versions. */
  async deleteSecret(secretId: string): Promise<DeleteResult> {
    return this.requestJson<DeleteResult>('DELETE', `/api/v1/secrets/${segment(secretId)}`);
  }

  async getSecretVersions(secretId: string): Promise<SecretVersionList> {
    return this.requestJson<SecretVersionList>(
      'GET',
      `/api/v1/secrets/${segment(secretId)}/versions`,
    );
  }

  // --- Tags ---

  /** Tag keys with every value in use, e.g. `{ env: ['dev', 'prod'] }`. */
  async getTags(): Promise<TagMap> {
    return this.requestJson<TagMap>('GET', '/api/v1/tags');
  }

  // --- Import / export ---

  /** Export matching secrets as a .env file body. */
  async exportEnv(options: { tags?: Tags } = {}): Promise<string> {
    const params = options.tags ? normalizeTags(options.tags) : {};
    return this.requestText('GET', '/api/v1/export', { params });
  }

  /** Import secrets from .env content into an environment. */
  async importEnv(environment: string, content: string): Promise<ImportResult> {
    return this.requestJson<ImportResult>('POST', `/api/v1/import/${segment(environment)}`, {
      body: content,
      contentType: 'text/plain',
    });
  }

  // --- Groups ---

  async listGroups(): Promise<GroupList> {
    return this.requestJson<GroupList>('GET', '/api/v1/groups');
  }

  async getGroup(name: string): Promise<Group> {
    return this.requestJson<Group>('GET', `/api/v1/groups/${segment(name)}`);
  }

  /** Count the secrets matching a group's tags. */
  async getGroupSecretCount(name: string): Promise<GroupSecretCount> {
    return this.requestJson<GroupSecretCount>('GET', `/api/v1/groups/${segment(name)}/count`);
  }

  /**
   * Pull every secret matching a group's tags.
   *
   * The `env` and `export` formats return the response body as text;
   * `json` returns the parsed payload.
   */
  pullGroupSecrets(name: string, format?: 'json'): Promise<GroupSecrets>;
  pullGroupSecrets(name: string, format: 'env' | 'export'): Promise<string>;
  pullGroupSecrets(name: string, format?: GroupSecretsFormat): Promise<GroupSecrets | string>;
  async pullGroupSecrets(
    name: string,
    format: GroupSecretsFormat = 'json',
  ): Promise<GroupSecrets | string> {
    const path = `/api/v1/groups/${segment(name)}/secrets`;
    const params = { format };

    if (format === 'env' || format === 'export') {
      return this.requestText('GET', path, { params });
    }
    return this.requestJson<GroupSecrets>('GET', path, { params });
  }

  /**
   * Pull a group's secrets into an environment map (`process.env` by default).
   *
   * Existing variables are NOT overwritten unless `overwrite` is true.
   * Returns the number of variables written.
   */
  async injectIntoEnv(
    groupName: string,
    options: { overwrite?: boolean; env?: NodeJS.ProcessEnv } = {},
  ): Promise<number> {
    const target = options.env ?? process.env;
    const { secrets } = await this.pullGroupSecrets(groupName, 'json');
    let injected = 0;

    for (const [key, value] of Object.entries(secrets ?? {})) {
      if (options.overwrite || target[key] === undefined) {
        target[key] = value;
        injected++;
      }
    }

    this.log(`Injected ${injected} secrets from group "${groupName}"`);
    return injected;
  }

  // --- Validation ---

  /** Check a YAML schema against the secrets stored for an environment. */
  async validateSchema(content: string, environment = 'development'): Promise<ValidationResult> {
    return this.requestJson<ValidationResult>('POST', '/api/v1/validate', {
      body: { schema: content, environment },
    });
  }

  // --- Audit ---

  async getAuditLog(options: AuditLogOptions = {}): Promise<AuditLog> {
    return this.requestJson<AuditLog>('GET', '/api/v1/audit', {
      params: { limit: options.limit ?? 100, offset: options.offset ?? 0 },
    });
  }

  // --- Private methods ---

  private async requestJson<T>(method: HttpMethod, path: string, options?: SendOptions): Promise<T> {
    const res = await this.send(method, path, options);
    return (await res.json()) as T;
  }

  private async requestText(method: HttpMethod, path: string, options?: SendOptions): Promise<string> {
    const res = await this.send(method, path, options);
    return res.text();
  }

  private async send(method: HttpMethod, path: string, options: SendOptions = {}): Promise<Response> {
    const query = buildQuery(options.params);
    const url = `${this.baseUrl}${path}${query ? `?${query}` : ''}`;

    const headers: Record<string, string> = { 'User-Agent': USER_AGENT };
    if (this.token) headers.Authorization = `Bearer ${this.token}`;
    if (this.organizationId) headers['X-Organization-Id'] = this.organizationId;
    headers['Content-Type'] = options.contentType ?? 'application/json';

    let body: string | undefined;
    if (options.body !== undefined) {
      body = typeof options.body === 'string' ? options.body : JSON.stringify(options.body);
    }

    const res = await fetch(url, { method, headers, body });
    this.log(`${method} ${path} -> ${res.status}`);

    await raiseForStatus(res);
    return res;
  }

  private log(message: string): void {
    if (this.debug) {
      process.stderr.write(`[vezor-sdk] ${message}\n`);
    }
  }
}

/** Convert tag keys to strings, keeping values unchanged. */
export function normalizeTags(tags: Tags): Record<string, string> {
  const entries: Iterable<[string | number, string]> = isTagMap(tags)
    ? tags.entries()
    : Object.entries(tags);
  const normalized: Record<string, string> = {};
  for (const [key, value] of entries) {
    normalized[String(key)] = value;
  }
  return normalized;
}

function isTagMap(tags: Tags): tags is ReadonlyMap<string | number, string> {
  return tags instanceof Map;
}

/** Form-encode the defined params, or return '' when there are none. */
function buildQuery(params: QueryParams | undefined): string {
  if (!params) return '';
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) search.append(key, String(value));
  }
  return search.toString();
}

function segment(value: string): string {
  return encodeURIComponent(value);
}
