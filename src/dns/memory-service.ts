/**
 * Azure DNS — In-Memory Service
 *
 * In-process stand-in for the Azure DNS record set API, for tests and
 * dry runs. IDs, etags and status codes follow what Azure returns.
 */

import { randomUUID } from "node:crypto";
import { formatPtrRecordId } from "../resource-id.js";
import type {
  CreateOrUpdateRecordSetRequest,
  CreateOrUpdateRecordSetResult,
  DeleteRecordSetRequest,
  DeleteRecordSetResult,
  DnsService,
  GetRecordSetResult,
  RecordSetKey,
  RemoteRecordSet,
} from "./types.js";

type StoredRecordSet = Required<Pick<RemoteRecordSet, "id" | "name" | "etag" | "ttl" | "fqdn" | "metadata" | "ptrRecords">>;

export type InMemoryDnsServiceOptions = {
  subscriptionId?: string;
};

export class InMemoryDnsService implements DnsService {
  private readonly subscriptionId: string;
  private zones = new Set<string>();
  private recordSets = new Map<string, StoredRecordSet>();

  constructor(options: InMemoryDnsServiceOptions = {}) {
    this.subscriptionId = options.subscriptionId ?? "00000000-0000-0000-0000-000000000000";
  }

  /** Register a zone; record sets can only be written into known zones. */
  addZone(resourceGroup: string, zoneName: string): this {
    this.zones.add(zoneKey(resourceGroup, zoneName));
    return this;
  }

  async createOrUpdate(request: CreateOrUpdateRecordSetRequest): Promise<CreateOrUpdateRecordSetResult> {
    if (!this.zones.has(zoneKey(request.resourceGroup, request.zoneName))) {
      return { status: 404, error: new Error(`The resource 'dnszones/${request.zoneName}' was not found`) };
    }

    const key = recordKey(request);
    const existing = this.recordSets.get(key);

    if (request.ifNoneMatch === "*" && existing) {
      return { status: 412, error: new Error(`Record set ${request.recordName} already exists`) };
    }
    if (request.ifMatch && existing?.etag !== request.ifMatch) {
      return { status: 412, error: new Error(`Etag mismatch for record set ${request.recordName}`) };
    }

    const stored: StoredRecordSet = {
      id:
        request.recordType === "PTR"
          ? formatPtrRecordId({
              subscriptionId: this.subscriptionId,
              resourceGroup: request.resourceGroup,
              zoneName: request.zoneName,
              recordName: request.recordName,
            })
          : `/subscriptions/${this.subscriptionId}/resourceGroups/${request.resourceGroup}/providers/Microsoft.Network/dnszones/${request.zoneName}/${request.recordType}/${request.recordName}`,
      name: request.recordName,
      etag: randomUUID(),
      ttl: request.properties.ttl,
      fqdn: request.recordName === "@" ? `${request.zoneName}.` : `${request.recordName}.${request.zoneName}.`,
      metadata: { ...request.properties.metadata },
      ptrRecords: request.properties.ptrRecords.map((r) => ({ ...r })),
    };
    this.recordSets.set(key, stored);

    return { status: existing ? 200 : 201, id: stored.id, etag: stored.etag };
  }

  async get(key: RecordSetKey): Promise<GetRecordSetResult> {
    const stored = this.recordSets.get(recordKey(key));
    if (!stored) {
      return { status: 404, error: new Error(`The resource record '${key.recordName}' does not exist`) };
    }
    return { status: 200, recordSet: cloneRecordSet(stored) };
  }

  async delete(request: DeleteRecordSetRequest): Promise<DeleteRecordSetResult> {
    const key = recordKey(request);
    const existing = this.recordSets.get(key);
    if (!existing) return { status: 204 };
    if (request.ifMatch && existing.etag !== request.ifMatch) {
      return { status: 412, error: new Error(`Etag mismatch for record set ${request.recordName}`) };
    }
    this.recordSets.delete(key);
    return { status: 200 };
  }

  /** Number of stored record sets across all zones. */
  get size(): number {
    return this.recordSets.size;
  }
}

function zoneKey(resourceGroup: string, zoneName: string): string {
  return `${resourceGroup.toLowerCase()}/${zoneName.toLowerCase()}`;
}

function recordKey(key: RecordSetKey): string {
  return `${zoneKey(key.resourceGroup, key.zoneName)}/${key.recordType}/${key.recordName.toLowerCase()}`;
}

function cloneRecordSet(stored: StoredRecordSet): RemoteRecordSet {
  return {
    ...stored,
    metadata: { ...stored.metadata },
    ptrRecords: stored.ptrRecords.map((r) => ({ ...r })),
  };
}
