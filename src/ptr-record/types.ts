/**
 * DNS PTR record resource — Type Definitions
 */

import type { Static } from "@sinclair/typebox";
import type { AzureTagSet } from "../types.js";
import type {
  PtrRecordAttributesSchema,
  PtrRecordDesiredSchema,
  PtrRecordStateSnapshotSchema,
} from "./schema.js";

/** Configuration-side view of a PTR record set. */
export type PtrRecordDesired = Static<typeof PtrRecordDesiredSchema>;

/** Last-known remote state as cached by the state store. */
export type PtrRecordAttributes = Static<typeof PtrRecordAttributesSchema>;

export type PtrRecordStateSnapshot = Static<typeof PtrRecordStateSnapshotSchema>;

/** A PTR record set as it exists in Azure DNS. */
export type PtrRecordRemote = {
  id: string;
  name: string;
  resourceGroupName: string;
  zoneName: string;
  ttl: number;
  etag: string;
  /** Target hostnames, deduplicated and sorted. */
  records: string[];
  tags: AzureTagSet;
  fqdn?: string;
};

/**
 * Per-resource state owned by the reconciliation engine. The adapter
 * writes the ID on create/import and every attribute on read.
 */
export interface PtrRecordStateStore {
  getId(): string | undefined;
  setId(id: string): void;
  get(): PtrRecordAttributes | undefined;
  set(attributes: PtrRecordAttributes): void;
  /** Forget the resource: drop both ID and attributes. */
  clear(): void;
}
