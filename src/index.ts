/**
 * azure-dns-ptr-record — Barrel Exports
 */

// Core utilities
export type { DnsLogger, AzureTagSet, AzureCredentialMethod } from "./types.js";
export { createConsoleLogger } from "./types.js";
export {
  PtrRecordError,
  ValidationError,
  ParseError,
  ProtocolError,
  RemoteError,
  formatErrorMessage,
} from "./errors.js";
export { configSchema, getDefaultConfig, resolveConfig } from "./config.js";
export type { DnsPtrConfig } from "./config.js";
export {
  enableDnsDiagnostics,
  onDnsDiagnosticEvent,
  traceRecordSetCall,
  formatDnsDiagnosticEvent,
} from "./diagnostics.js";
export type { DnsDiagnosticEvent, DnsDiagnosticListener, RecordSetOperation } from "./diagnostics.js";

// Credentials
export { AzureCredentialsManager, createCredentialsManager, createCredentialsManagerFromConfig } from "./credentials/index.js";

// Resource IDs
export { parseAzureResourceId, parsePtrRecordId, formatPtrRecordId } from "./resource-id.js";
export type { AzureResourceId, PtrRecordId } from "./resource-id.js";

// DNS service
export * from "./dns/index.js";

// PTR record resource
export * from "./ptr-record/index.js";

// CLI
export { createPtrCli, runPtrCli } from "./cli.js";
