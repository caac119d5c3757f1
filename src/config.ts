/**
 * Azure DNS PTR configuration schema (TypeBox) and default config.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ValidationError } from "./errors.js";

export const configSchema = Type.Object({
  subscriptionId: Type.Optional(Type.String({ minLength: 1, description: "Azure subscription ID" })),
  tenantId: Type.Optional(Type.String({ minLength: 1, description: "Azure AD tenant ID" })),
  credentialMethod: Type.Optional(
    Type.Union(
      [
        Type.Literal("default"),
        Type.Literal("cli"),
        Type.Literal("service-principal"),
        Type.Literal("managed-identity"),
        Type.Literal("browser"),
      ],
      { description: "Credential method: default | cli | service-principal | managed-identity | browser" },
    ),
  ),
  diagnostics: Type.Optional(
    Type.Object({
      enabled: Type.Optional(Type.Boolean()),
      verbose: Type.Optional(Type.Boolean()),
    }),
  ),
});

export type DnsPtrConfig = Static<typeof configSchema>;

export function getDefaultConfig(): DnsPtrConfig {
  return {
    credentialMethod: "default",
    diagnostics: { enabled: false, verbose: false },
  };
}

/**
 * Validate raw configuration, fill gaps from the environment and defaults.
 */
export function resolveConfig(
  raw: unknown = {},
  env: NodeJS.ProcessEnv = process.env,
): DnsPtrConfig {
  if (!Value.Check(configSchema, raw)) {
    const issues = [...Value.Errors(configSchema, raw)].map(
      (e) => `${e.path || "/"}: ${e.message}`,
    );
    throw new ValidationError("Invalid Azure DNS configuration", issues);
  }

  const defaults = getDefaultConfig();
  return {
    subscriptionId: raw.subscriptionId ?? nonEmpty(env.AZURE_SUBSCRIPTION_ID),
    tenantId: raw.tenantId ?? nonEmpty(env.AZURE_TENANT_ID),
    credentialMethod: raw.credentialMethod ?? defaults.credentialMethod,
    diagnostics: {
      enabled: raw.diagnostics?.enabled ?? defaults.diagnostics?.enabled,
      verbose: raw.diagnostics?.verbose ?? defaults.diagnostics?.verbose,
    },
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value ? value : undefined;
}
