/**
 * Azure DNS PTR — Shared Types
 *
 * Core type definitions used across the DNS service, adapter and CLI modules.
 */

// =============================================================================
// Logging
// =============================================================================

/**
 * Leveled logger in the shape the host hands to extensions.
 * `debug` is optional; hosts that do not expose it simply drop debug output.
 */
export type DnsLogger = {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
  debug?: (msg: string) => void;
};

/**
 * Console-backed logger used when the caller injects none.
 */
export function createConsoleLogger(prefix = "[AzureDNS:PTR]"): DnsLogger {
  return {
    info: (msg) => console.log(`${prefix} ${msg}`),
    warn: (msg) => console.warn(`${prefix} ${msg}`),
    error: (msg) => console.error(`${prefix} ${msg}`),
    debug: (msg) => console.debug(`${prefix} ${msg}`),
  };
}

// =============================================================================
// Tags
// =============================================================================

export type AzureTagSet = Record<string, string>;

// =============================================================================
// Credentials
// =============================================================================

export type AzureCredentialMethod =
  | "default"
  | "cli"
  | "service-principal"
  | "managed-identity"
  | "browser";

export const AZURE_CREDENTIAL_METHODS: readonly AzureCredentialMethod[] = [
  "default",
  "cli",
  "service-principal",
  "managed-identity",
  "browser",
];
