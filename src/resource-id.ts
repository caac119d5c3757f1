/**
 * Azure resource ID parsing for DNS record sets.
 *
 * IDs look like
 * `/subscriptions/{sub}/resourceGroups/{rg}/providers/Microsoft.Network/dnszones/{zone}/PTR/{name}`:
 * alternating key/value segments after the leading slash.
 */

import { ParseError } from "./errors.js";

export type AzureResourceId = {
  subscriptionId: string;
  resourceGroup: string;
  provider?: string;
  /** Remaining key/value segments, e.g. `{ dnszones: "zone1", PTR: "ptr1" }`. */
  path: Record<string, string>;
};

export type PtrRecordId = {
  subscriptionId: string;
  resourceGroup: string;
  zoneName: string;
  recordName: string;
};

export const DNS_PROVIDER = "Microsoft.Network";

export function parseAzureResourceId(id: string): AzureResourceId {
  let path = id.trim();
  if (path.startsWith("/")) path = path.slice(1);
  if (path.endsWith("/")) path = path.slice(0, -1);

  const components = path.split("/");
  if (components.length % 2 !== 0) {
    throw new ParseError(`The number of path segments is not divisible by 2 in "${path}"`, id);
  }

  let subscriptionId = "";
  const segments = new Map<string, string>();

  for (let i = 0; i < components.length; i += 2) {
    const key = components[i] ?? "";
    const value = components[i + 1] ?? "";
    if (!key || !value) {
      throw new ParseError(`Key/value cannot be empty strings. Key: "${key}", value: "${value}"`, id);
    }
    // first subscriptions segment wins; nested resources may reuse the key
    if (key === "subscriptions" && !subscriptionId) {
      subscriptionId = value;
    } else {
      segments.set(key, value);
    }
  }

  if (!subscriptionId) {
    throw new ParseError(`No subscription ID found in "${path}"`, id);
  }

  const resourceGroupKey = segments.has("resourceGroups") ? "resourceGroups" : "resourcegroups";
  const resourceGroup = segments.get(resourceGroupKey);
  if (!resourceGroup) {
    throw new ParseError(`No resource group name found in "${path}"`, id);
  }
  segments.delete(resourceGroupKey);

  const provider = segments.get("providers");
  segments.delete("providers");

  return {
    subscriptionId,
    resourceGroup,
    provider,
    path: Object.fromEntries(segments),
  };
}

export function parsePtrRecordId(id: string): PtrRecordId {
  const parsed = parseAzureResourceId(id);
  const zoneName = parsed.path.dnszones;
  const recordName = parsed.path.PTR;

  if (!zoneName) {
    throw new ParseError(`No "dnszones" segment found in DNS PTR record ID "${id}"`, id);
  }
  if (!recordName) {
    throw new ParseError(`No "PTR" segment found in DNS PTR record ID "${id}"`, id);
  }

  return {
    subscriptionId: parsed.subscriptionId,
    resourceGroup: parsed.resourceGroup,
    zoneName,
    recordName,
  };
}

export function formatPtrRecordId(id: PtrRecordId): string {
  return [
    "",
    "subscriptions",
    id.subscriptionId,
    "resourceGroups",
    id.resourceGroup,
    "providers",
    DNS_PROVIDER,
    "dnszones",
    id.zoneName,
    "PTR",
    id.recordName,
  ].join("/");
}
