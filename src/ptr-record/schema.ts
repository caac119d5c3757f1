/**
 * DNS PTR record schemas (TypeBox) and field expansion/flattening between
 * the resource's attributes and the Azure record set shape.
 */

import { Type, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ProtocolError, ValidationError } from "../errors.js";
import type { PtrRecordEntry } from "../dns/types.js";
import type { AzureTagSet } from "../types.js";
import type { PtrRecordDesired, PtrRecordStateSnapshot } from "./types.js";

// =============================================================================
// Schemas
// =============================================================================

const TagsSchema = Type.Record(Type.String(), Type.String());

/**
 * Desired state of a PTR record set. `forceNew` marks fields whose change
 * replaces the resource; `computed` marks fields the service owns.
 */
export const PtrRecordDesiredSchema = Type.Object({
  name: Type.String({ minLength: 1, forceNew: true, description: "Record set name relative to the zone" }),
  resourceGroupName: Type.String({ minLength: 1, forceNew: true, description: "Resource group of the zone" }),
  zoneName: Type.String({ minLength: 1, forceNew: true, description: "DNS zone name, e.g. 2.0.192.in-addr.arpa" }),
  records: Type.Array(Type.String({ minLength: 1 }), { description: "Target hostnames (set semantics)" }),
  ttl: Type.Integer({ minimum: 0, description: "Time to live in seconds" }),
  tags: Type.Optional(TagsSchema),
  etag: Type.Optional(Type.String({ computed: true, description: "Last known etag, sent as If-Match" })),
});

/** Attributes persisted in the state store after every read. */
export const PtrRecordAttributesSchema = Type.Object({
  name: Type.String(),
  resourceGroupName: Type.String(),
  zoneName: Type.String(),
  ttl: Type.Integer(),
  etag: Type.String(),
  records: Type.Array(Type.String()),
  tags: TagsSchema,
});

export const PtrRecordStateSnapshotSchema = Type.Object({
  id: Type.Optional(Type.String()),
  attributes: Type.Optional(PtrRecordAttributesSchema),
});

function annotatedFields(annotation: "forceNew" | "computed"): string[] {
  return Object.entries(PtrRecordDesiredSchema.properties)
    .filter(([, schema]) => schema[annotation] === true)
    .map(([field]) => field);
}

/** Fields whose change requires replacing the record set. */
export const PTR_RECORD_FORCE_NEW_FIELDS: readonly string[] = annotatedFields("forceNew");

/** Fields populated by the service rather than the configuration. */
export const PTR_RECORD_COMPUTED_FIELDS: readonly string[] = annotatedFields("computed");

// =============================================================================
// Validation
// =============================================================================

function schemaIssues(schema: TSchema, value: unknown): string[] {
  return [...Value.Errors(schema, value)].map((e) => `${e.path || "/"}: ${e.message}`);
}

export function validatePtrRecordDesired(value: unknown): asserts value is PtrRecordDesired {
  if (!Value.Check(PtrRecordDesiredSchema, value)) {
    throw new ValidationError("Invalid DNS PTR record", schemaIssues(PtrRecordDesiredSchema, value));
  }
}

export function validatePtrRecordStateSnapshot(value: unknown): asserts value is PtrRecordStateSnapshot {
  if (!Value.Check(PtrRecordStateSnapshotSchema, value)) {
    throw new ValidationError("Invalid DNS PTR record state", schemaIssues(PtrRecordStateSnapshotSchema, value));
  }
}

// =============================================================================
// Expansion / Flattening
// =============================================================================

/**
 * One `{ ptrdname }` entry per distinct hostname. Order is not significant.
 */
export function expandPtrRecords(records: readonly unknown[]): PtrRecordEntry[] {
  const hostnames = new Set<string>();
  const issues: string[] = [];

  records.forEach((record, i) => {
    if (typeof record !== "string" || record.length === 0) {
      issues.push(`/records/${i}: expected a non-empty hostname`);
      return;
    }
    hostnames.add(record);
  });

  if (issues.length > 0) {
    throw new ValidationError("Invalid DNS PTR records", issues);
  }

  return [...hostnames].map((ptrdname) => ({ ptrdname }));
}

/**
 * Hostnames of a record set, deduplicated and sorted.
 */
export function flattenPtrRecords(entries: readonly PtrRecordEntry[] | undefined): string[] {
  const hostnames = new Set<string>();
  for (const entry of entries ?? []) {
    if (!entry.ptrdname) {
      throw new ProtocolError("DNS PTR record set contains an entry without a ptrdname");
    }
    hostnames.add(entry.ptrdname);
  }
  return [...hostnames].sort();
}

export function expandTags(tags: AzureTagSet | undefined): AzureTagSet {
  return { ...tags };
}

export function flattenTags(metadata: AzureTagSet | undefined): AzureTagSet {
  return { ...metadata };
}
