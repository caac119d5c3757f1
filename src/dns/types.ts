/**
 * Azure DNS — Type Definitions
 *
 * The record set seam between the PTR adapter and the remote DNS API.
 */

import type { AzureTagSet } from "../types.js";

export type RecordType = "A" | "AAAA" | "CNAME" | "MX" | "NS" | "PTR" | "SOA" | "SRV" | "TXT" | "CAA";

export type PtrRecordEntry = {
  ptrdname?: string;
};

/** Record set properties sent on upsert. */
export type RecordSetProperties = {
  metadata?: AzureTagSet;
  ttl: number;
  ptrRecords: PtrRecordEntry[];
};

/** Record set as returned by the service. */
export type RemoteRecordSet = {
  id?: string;
  name?: string;
  etag?: string;
  ttl?: number;
  fqdn?: string;
  metadata?: AzureTagSet;
  ptrRecords?: PtrRecordEntry[];
};

export type RecordSetKey = {
  resourceGroup: string;
  zoneName: string;
  recordName: string;
  recordType: RecordType;
};

export type CreateOrUpdateRecordSetRequest = RecordSetKey & {
  properties: RecordSetProperties;
  /** Etag to match; empty means no concurrency check. */
  ifMatch: string;
  /** `*` rejects overwriting an existing record set; empty allows updates. */
  ifNoneMatch: string;
};

export type DeleteRecordSetRequest = RecordSetKey & {
  /** Etag to match; empty means unconditional delete. */
  ifMatch: string;
};

export type CreateOrUpdateRecordSetResult = {
  status: number;
  id?: string;
  etag?: string;
  error?: unknown;
};

export type GetRecordSetResult = {
  status: number;
  recordSet?: RemoteRecordSet;
  error?: unknown;
};

export type DeleteRecordSetResult = {
  status: number;
  /** Error reported by the transport alongside the status, if any. */
  error?: unknown;
};

/**
 * Remote DNS API. Implementations report HTTP status in the result and
 * throw only for failures that carry no status (transport errors).
 */
export interface DnsService {
  createOrUpdate(request: CreateOrUpdateRecordSetRequest): Promise<CreateOrUpdateRecordSetResult>;
  get(key: RecordSetKey): Promise<GetRecordSetResult>;
  delete(request: DeleteRecordSetRequest): Promise<DeleteRecordSetResult>;
}
