/**
 * Failure taxonomy shared by every component of the gateway.
 *
 * Components throw GatewayError with a specific kind; anything else that
 * escapes the driver is funneled through classifyDatabaseError().
 */

export type ErrorKind =
  | "ValidationRejected"
  | "PermissionDenied"
  | "NotFound"
  | "PoolExhausted"
  | "ConnectionUnavailable"
  | "Timeout"
  | "SchemaMismatch"
  | "ConflictKeyMissing"
  | "BatchTooLarge"
  | "TargetNameCollisionUnresolved"
  | "SourceNotFound"
  | "CopyFailed"
  | "DatabaseError";

const RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  "PoolExhausted",
  "ConnectionUnavailable",
  "Timeout",
]);

export type ErrorDetail = Record<string, string | number | boolean | null | string[]>;

export interface SerializedGatewayError {
  kind: ErrorKind;
  message: string;
  retryable: boolean;
  detail?: ErrorDetail;
}

export class GatewayError extends Error {
  readonly kind: ErrorKind;
  readonly retryable: boolean;
  readonly detail?: ErrorDetail;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown; detail?: ErrorDetail }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "GatewayError";
    this.kind = kind;
    this.retryable = RETRYABLE_KINDS.has(kind);
    this.detail = options?.detail;
  }

  toJSON(): SerializedGatewayError {
    const json: SerializedGatewayError = {
      kind: this.kind,
      message: this.message,
      retryable: this.retryable,
    };
    if (this.detail) {
      json.detail = this.detail;
    }
    return json;
  }
}

// SQL Server error numbers
const PERMISSION_ERRORS = new Set([229, 230, 262, 297, 300, 15247]);
const INVALID_OBJECT_NAME = 208;

const CONNECTION_CODES = new Set(["ESOCKET", "ECONNCLOSED", "ENOTOPEN", "ELOGIN", "EINSTLOOKUP", "ENOCONN"]);
const TIMEOUT_CODES = new Set(["ETIMEOUT", "ECANCEL"]);

function readProperty(error: object, key: string): unknown {
  return key in error ? Reflect.get(error, key) : undefined;
}

/**
 * Extracts the SQL Server error number from a driver error, looking through
 * the wrapped originalError the driver attaches to request failures.
 */
export function sqlErrorNumber(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }
  const direct = readProperty(error, "number");
  if (typeof direct === "number") {
    return direct;
  }
  const original = readProperty(error, "originalError");
  return original === undefined ? undefined : sqlErrorNumber(original);
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }
  const code = readProperty(error, "code");
  return typeof code === "string" ? code : undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function classifyDatabaseError(error: unknown, context?: string): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }

  const message = context ? `${context}: ${errorMessage(error)}` : errorMessage(error);
  const number = sqlErrorNumber(error);
  const code = errorCode(error);

  if (number !== undefined && PERMISSION_ERRORS.has(number)) {
    return new GatewayError("PermissionDenied", message, { cause: error, detail: { number } });
  }
  if (number === INVALID_OBJECT_NAME) {
    return new GatewayError("NotFound", message, { cause: error, detail: { number } });
  }
  if (code && TIMEOUT_CODES.has(code)) {
    return new GatewayError("Timeout", message, { cause: error, detail: { code } });
  }
  if (code && CONNECTION_CODES.has(code)) {
    return new GatewayError("ConnectionUnavailable", message, { cause: error, detail: { code } });
  }

  const detail: ErrorDetail = {};
  if (number !== undefined) detail.number = number;
  if (code) detail.code = code;
  return new GatewayError("DatabaseError", message, {
    cause: error,
    detail: Object.keys(detail).length > 0 ? detail : undefined,
  });
}
