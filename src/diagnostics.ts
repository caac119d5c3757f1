/**
 * Azure DNS PTR — Diagnostics
 *
 * Opt-in trace of record set API calls. Each call yields one event:
 * `dns.api.call` when the SDK returned, `dns.api.error` when it threw.
 */

import type { RecordSetKey } from "./dns/types.js";
import { formatErrorMessage, getErrorStatusCode } from "./errors.js";

// =============================================================================
// Types
// =============================================================================

export type DnsDiagnosticEventType = "dns.api.call" | "dns.api.error";

export type RecordSetOperation = "createOrUpdate" | "get" | "delete";

export type DnsDiagnosticEvent = {
  type: DnsDiagnosticEventType;
  seq: number;
  timestamp: number;
  operation: RecordSetOperation;
  recordSet: RecordSetKey;
  durationMs: number;
  statusCode?: number;
  error?: string;
};

export type DnsDiagnosticListener = (event: DnsDiagnosticEvent) => void;

// =============================================================================
// Global State
// =============================================================================

let diagnosticsEnabled = false;
let seq = 0;
const listeners = new Set<DnsDiagnosticListener>();

// =============================================================================
// Public API
// =============================================================================

export function enableDnsDiagnostics(): void {
  diagnosticsEnabled = true;
}

/** Subscribe to diagnostic events. Returns an unsubscribe function. */
export function onDnsDiagnosticEvent(listener: DnsDiagnosticListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

function emit(event: Omit<DnsDiagnosticEvent, "timestamp" | "seq">): void {
  const fullEvent: DnsDiagnosticEvent = { ...event, timestamp: Date.now(), seq: ++seq };
  for (const listener of listeners) {
    try {
      listener(fullEvent);
    } catch (err) {
      // a broken listener must not fail the DNS call it observes
      console.warn(`[AzureDNS:PTR] diagnostic listener failed: ${formatErrorMessage(err)}`);
    }
  }
}

/**
 * Run one record set API call and report it to listeners.
 * `statusOf` reads the HTTP status the call captured, if any.
 */
export async function traceRecordSetCall<T>(
  operation: RecordSetOperation,
  recordSet: RecordSetKey,
  fn: () => Promise<T>,
  statusOf?: () => number | undefined,
): Promise<T> {
  if (!diagnosticsEnabled) return fn();

  const start = Date.now();
  try {
    const result = await fn();
    emit({ type: "dns.api.call", operation, recordSet, durationMs: Date.now() - start, statusCode: statusOf?.() });
    return result;
  } catch (error) {
    emit({
      type: "dns.api.error",
      operation,
      recordSet,
      durationMs: Date.now() - start,
      statusCode: getErrorStatusCode(error),
      error: formatErrorMessage(error),
    });
    throw error;
  }
}

/**
 * One-line rendering, e.g.
 * `dns.api.error get rg1/zone1/PTR/ptr1 (12ms): (HTTP 404) Not found`.
 */
export function formatDnsDiagnosticEvent(event: DnsDiagnosticEvent): string {
  const { resourceGroup, zoneName, recordType, recordName } = event.recordSet;
  const head = `${event.type} ${event.operation} ${resourceGroup}/${zoneName}/${recordType}/${recordName} (${event.durationMs}ms)`;
  if (event.error !== undefined) return `${head}: ${event.error}`;
  return event.statusCode !== undefined ? `${head} HTTP ${event.statusCode}` : head;
}

export function resetDnsDiagnosticsForTest(): void {
  diagnosticsEnabled = false;
  seq = 0;
  listeners.clear();
}
