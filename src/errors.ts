/**
 * Azure DNS PTR — Errors
 *
 * Error kinds raised by the PTR record adapter, plus helpers for reading
 * status codes off Azure SDK errors and formatting errors for humans.
 */

// =============================================================================
// Error Classes
// =============================================================================

export class PtrRecordError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A required field was missing or malformed before any remote call. */
export class ValidationError extends PtrRecordError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.issues = issues;
  }
}

/** An Azure resource ID could not be parsed. */
export class ParseError extends PtrRecordError {
  readonly input: string;

  constructor(message: string, input: string) {
    super(message);
    this.input = input;
  }
}

/** The service answered successfully but the response is unusable. */
export class ProtocolError extends PtrRecordError {}

/** Non-success status or transport failure from the DNS service. */
export class RemoteError extends PtrRecordError {
  readonly statusCode?: number;

  constructor(message: string, options?: { statusCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.statusCode = options?.statusCode;
  }
}

// =============================================================================
// Error Inspection
// =============================================================================

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null) return undefined;
  return Reflect.get(value, key);
}

/**
 * HTTP status carried by an Azure SDK error (`RestError.statusCode`), if any.
 */
export function getErrorStatusCode(error: unknown): number | undefined {
  const status = readProperty(error, "statusCode") ?? readProperty(error, "status");
  return typeof status === "number" ? status : undefined;
}

/** True for 2xx statuses. */
export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Format an Azure error into a human-readable message.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;

  const code = readProperty(error, "code");
  const message = readProperty(error, "message");
  const statusCode = getErrorStatusCode(error);

  const parts: string[] = [];
  if (typeof code === "string" && code) parts.push(`[${code}]`);
  if (statusCode) parts.push(`(HTTP ${statusCode})`);
  parts.push(typeof message === "string" && message ? message : String(error));

  return parts.join(" ");
}
