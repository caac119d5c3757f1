/**
 * Azure DNS PTR — Credentials Manager
 *
 * Resolves Azure credentials with @azure/identity for the DNS client.
 * Supports the DefaultAzureCredential chain, Azure CLI, Service Principal,
 * Managed Identity, and Interactive Browser flows.
 */

import type { TokenCredential } from "@azure/identity";
import type { DnsPtrConfig } from "../config.js";
import type { AzureCredentialMethod } from "../types.js";

// =============================================================================
// Types
// =============================================================================

export type CredentialsManagerOptions = {
  tenantId?: string;
  credentialMethod?: AzureCredentialMethod;
  /** How long a resolved credential is reused. Default: 1 hour. */
  cacheTtlMs?: number;
};

export type CredentialResolutionResult = {
  credential: TokenCredential;
  method: AzureCredentialMethod;
};

// =============================================================================
// Credential Cache
// =============================================================================

class CredentialCache {
  private cache = new Map<string, { credential: TokenCredential; expiresAt: number }>();
  private ttlMs: number;

  constructor(ttlMs = 3_600_000) {
    this.ttlMs = ttlMs;
  }

  get(key: string): TokenCredential | null {
    const entry = this.cache.get(key);
    if (!entry) return null;
    if (Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      return null;
    }
    return entry.credential;
  }

  set(key: string, credential: TokenCredential): void {
    this.cache.set(key, {
      credential,
      expiresAt: Date.now() + this.ttlMs,
    });
  }

}

// =============================================================================
// Credentials Manager
// =============================================================================

export class AzureCredentialsManager {
  private options: CredentialsManagerOptions;
  private cache: CredentialCache;

  constructor(options: CredentialsManagerOptions = {}) {
    this.options = {
      ...options,
      credentialMethod: options.credentialMethod ?? "default",
      tenantId: options.tenantId ?? process.env.AZURE_TENANT_ID,
    };
    this.cache = new CredentialCache(options.cacheTtlMs);
  }

  /**
   * Get an Azure TokenCredential, using the configured method.
   */
  async getCredential(method?: AzureCredentialMethod): Promise<CredentialResolutionResult> {
    const resolvedMethod = method ?? this.options.credentialMethod ?? "default";
    const cacheKey = `${resolvedMethod}:${this.options.tenantId ?? ""}`;

    const credential = this.cache.get(cacheKey) ?? (await this.createCredential(resolvedMethod));
    this.cache.set(cacheKey, credential);

    return { credential, method: resolvedMethod };
  }

  /**
   * Dynamic import of @azure/identity keeps it off the load path of
   * callers that inject their own DNS service.
   */
  private async createCredential(method: AzureCredentialMethod): Promise<TokenCredential> {
    const identity = await import("@azure/identity");

    switch (method) {
      case "cli":
        return new identity.AzureCliCredential();

      case "service-principal": {
        const tenantId = this.options.tenantId ?? process.env.AZURE_TENANT_ID;
        const clientId = process.env.AZURE_CLIENT_ID;
        const clientSecret = process.env.AZURE_CLIENT_SECRET;

        if (!tenantId || !clientId || !clientSecret) {
          throw new Error(
            "Service principal auth requires AZURE_TENANT_ID, AZURE_CLIENT_ID, and AZURE_CLIENT_SECRET",
          );
        }

        return new identity.ClientSecretCredential(tenantId, clientId, clientSecret);
      }

      case "managed-identity": {
        const clientId = process.env.AZURE_CLIENT_ID;
        return clientId
          ? new identity.ManagedIdentityCredential({ clientId })
          : new identity.ManagedIdentityCredential();
      }

      case "browser":
        return new identity.InteractiveBrowserCredential({
          tenantId: this.options.tenantId,
        });

      case "default":
        return new identity.DefaultAzureCredential();
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCredentialsManager(
  options?: CredentialsManagerOptions,
): AzureCredentialsManager {
  return new AzureCredentialsManager(options);
}

export function createCredentialsManagerFromConfig(config: DnsPtrConfig): AzureCredentialsManager {
  return new AzureCredentialsManager({
    tenantId: config.tenantId,
    credentialMethod: config.credentialMethod,
  });
}
