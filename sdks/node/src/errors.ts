import type { JsonObject, JsonValue } from './types.js';

/** Base error class for all Vezor SDK errors. */
export class VezorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VezorError';
  }
}

/** Thrown when required configuration is missing. */
export class VezorConfigError extends VezorError {
  constructor(message: string) {
    super(message);
    this.name = 'VezorConfigError';
  }
}

/** Authentication failed or token expired (401). */
export class VezorAuthError extends VezorError {
  public readonly statusCode = 401;

  constructor(message: string) {
    super(message);
    this.name = 'VezorAuthError';
  }
}

/** Permission denied (403). */
export class VezorPermissionError extends VezorError {
  public readonly statusCode = 403;

  constructor(message: string) {
    super(message);
    this.name = 'VezorPermissionError';
  }
}

/** Resource not found (404). */
export class VezorNotFoundError extends VezorError {
  public readonly statusCode = 404;

  constructor(message: string) {
    super(message);
    this.name = 'VezorNotFoundError';
  }
}

/** The server rejected the request (400). */
export class VezorValidationError extends VezorError {
  public readonly statusCode = 400;

  constructor(message: string) {
    super(message);
    this.name = 'VezorValidationError';
  }
}

/** Any other non-2xx response. */
export class VezorApiError extends VezorError {
  public readonly statusCode: number;
  /** Parsed JSON error body, or `{}` when the body was not a JSON object. */
  public readonly response: JsonObject;
  /** Raw response text. */
  public readonly body: string;

  constructor(message: string, statusCode: number, response: JsonObject = {}, body = '') {
    super(message);
    this.name = 'VezorApiError';
    this.statusCode = statusCode;
    this.response = response;
    this.body = body;
  }
}

/**
 * Throw the error matching a non-2xx response. Returns without reading the
 * body when the response is successful.
 */
export async function raiseForStatus(res: Response): Promise<void> {
  if (res.ok) return;

  const text = await res.text();
  const body = parseErrorBody(text);
  const message =
    nonEmptyString(body.error) ??
    nonEmptyString(body.message) ??
    nonEmptyString(text) ??
    `HTTP ${res.status}`;

  switch (res.status) {
    case 401:
      throw new VezorAuthError(message);
    case 403:
      throw new VezorPermissionError(message);
    case 404:
      throw new VezorNotFoundError(message);
    case 400:
      throw new VezorValidationError(message);
    default:
      throw new VezorApiError(message, res.status, body, text);
  }
}

function parseErrorBody(text: string): JsonObject {
  let parsed: JsonValue;
  try {
    parsed = JSON.parse(text);
  } catch {
    return {};
  }
  return isJsonObject(parsed) ? parsed : {};
}

function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: JsonValue | undefined): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}
