/**
 * Azure DNS PTR Record Adapter
 *
 * Create/update, read, delete and import for a single PTR record set.
 * The reconciliation engine drives every call; the adapter performs no
 * retries and no locking.
 */

import type {
  CreateOrUpdateRecordSetResult,
  DeleteRecordSetResult,
  DnsService,
  GetRecordSetResult,
  RecordSetKey,
} from "../dns/types.js";
import {
  ProtocolError,
  RemoteError,
  formatErrorMessage,
  getErrorStatusCode,
  isSuccessStatus,
} from "../errors.js";
import { parsePtrRecordId, type PtrRecordId } from "../resource-id.js";
import { createConsoleLogger, type DnsLogger } from "../types.js";
import {
  expandPtrRecords,
  expandTags,
  flattenPtrRecords,
  flattenTags,
  validatePtrRecordDesired,
} from "./schema.js";
import type { PtrRecordDesired, PtrRecordRemote, PtrRecordStateStore } from "./types.js";

export type PtrRecordAdapterOptions = {
  logger?: DnsLogger;
};

/**
 * `ifNoneMatch` stays empty so the record set can be updated after
 * creation; `*` would make it create-only.
 */
const ALLOW_OVERWRITE = "";

export class PtrRecordAdapter {
  private dns: DnsService;
  private logger: DnsLogger;

  constructor(dns: DnsService, options: PtrRecordAdapterOptions = {}) {
    this.dns = dns;
    this.logger = options.logger ?? createConsoleLogger();
  }

  /**
   * Upsert the record set, store its ID, then read it back so every
   * computed field comes from the service rather than the upsert response.
   */
  async createOrUpdate(desired: PtrRecordDesired, state: PtrRecordStateStore): Promise<PtrRecordId> {
    validatePtrRecordDesired(desired);

    const { name, resourceGroupName, zoneName, ttl } = desired;
    const ptrRecords = expandPtrRecords(desired.records);
    const metadata = expandTags(desired.tags);
    const ifMatch = desired.etag ?? trackedEtag(desired, state);

    this.logger.info(`Creating or updating DNS PTR Record ${name} in zone ${zoneName} (resource group ${resourceGroupName})`);

    const key = ptrKey(resourceGroupName, zoneName, name);
    let result: CreateOrUpdateRecordSetResult;
    try {
      result = await this.dns.createOrUpdate({
        ...key,
        properties: { metadata, ttl, ptrRecords },
        ifMatch,
        ifNoneMatch: ALLOW_OVERWRITE,
      });
    } catch (error) {
      throw this.remoteError(`Error creating or updating DNS PTR Record ${name}`, undefined, error);
    }

    if (!isSuccessStatus(result.status)) {
      throw this.remoteError(`Error creating or updating DNS PTR Record ${name}`, result.status, result.error);
    }
    if (!result.id) {
      throw new ProtocolError(`Cannot read DNS PTR Record ${name} (resource group ${resourceGroupName}) ID`);
    }

    const id = parsePtrRecordId(result.id);
    state.setId(result.id);

    const remote = await this.read(state);
    if (!remote) {
      throw new ProtocolError(
        `DNS PTR Record ${name} (resource group ${resourceGroupName}) was not found after it was written`,
      );
    }

    return id;
  }

  /**
   * Look up a record set. Returns null when the service reports 404.
   */
  async fetch(id: PtrRecordId): Promise<PtrRecordRemote | null> {
    const { recordName: name } = id;
    let result: GetRecordSetResult;
    try {
      result = await this.dns.get(ptrKey(id.resourceGroup, id.zoneName, name));
    } catch (error) {
      throw this.remoteError(`Error reading DNS PTR record ${name}`, undefined, error);
    }

    if (result.status === 404) return null;
    if (!isSuccessStatus(result.status)) {
      throw this.remoteError(`Error reading DNS PTR record ${name}`, result.status, result.error);
    }

    const recordSet = result.recordSet;
    if (!recordSet?.id) {
      throw new ProtocolError(`DNS PTR record ${name} was returned without an ID`);
    }
    if (recordSet.ttl === undefined) {
      throw new ProtocolError(`DNS PTR record ${name} was returned without a TTL`);
    }

    return {
      id: recordSet.id,
      name,
      resourceGroupName: id.resourceGroup,
      zoneName: id.zoneName,
      ttl: recordSet.ttl,
      etag: recordSet.etag ?? "",
      records: flattenPtrRecords(recordSet.ptrRecords),
      tags: flattenTags(recordSet.metadata),
      fqdn: recordSet.fqdn,
    };
  }

  /**
   * Refresh the state store from the service. A record that no longer
   * exists clears the store and returns null.
   */
  async read(state: PtrRecordStateStore): Promise<PtrRecordRemote | null> {
    const rawId = state.getId();
    if (!rawId) return null;

    const id = parsePtrRecordId(rawId);
    this.logger.debug?.(`Reading DNS PTR record ${id.recordName} in zone ${id.zoneName}`);

    const remote = await this.fetch(id);
    if (!remote) {
      this.logger.warn(
        `DNS PTR record ${id.recordName} (resource group ${id.resourceGroup}) not found, removing from state`,
      );
      state.clear();
      return null;
    }

    state.set({
      name: remote.name,
      resourceGroupName: remote.resourceGroupName,
      zoneName: remote.zoneName,
      ttl: remote.ttl,
      etag: remote.etag,
      records: remote.records,
      tags: remote.tags,
    });

    return remote;
  }

  /**
   * Unconditional delete. Local state is left for the engine to drop.
   */
  async delete(state: PtrRecordStateStore): Promise<void> {
    const id = parsePtrRecordId(state.getId() ?? "");
    const { recordName: name } = id;

    this.logger.info(`Deleting DNS PTR Record ${name} in zone ${id.zoneName} (resource group ${id.resourceGroup})`);

    let result: DeleteRecordSetResult;
    try {
      result = await this.dns.delete({ ...ptrKey(id.resourceGroup, id.zoneName, name), ifMatch: "" });
    } catch (error) {
      throw this.remoteError(`Error deleting DNS PTR Record ${name}`, undefined, error);
    }

    // a transport error next to a 2xx status is ignored
    if (!isSuccessStatus(result.status)) {
      throw this.remoteError(`Error deleting DNS PTR Record ${name}`, result.status, result.error);
    }
  }

  /**
   * Adopt an existing record set. The given ID is stored unchanged.
   */
  import(opaqueId: string, state: PtrRecordStateStore): PtrRecordId {
    const id = parsePtrRecordId(opaqueId);
    this.logger.info(`Importing DNS PTR Record ${id.recordName} from zone ${id.zoneName}`);
    state.setId(opaqueId);
    return id;
  }

  private remoteError(message: string, status: number | undefined, cause: unknown): RemoteError {
    const statusCode = status ?? getErrorStatusCode(cause);
    const parts: string[] = [];
    if (statusCode !== undefined && getErrorStatusCode(cause) === undefined) parts.push(`HTTP ${statusCode}`);
    if (cause !== undefined) parts.push(formatErrorMessage(cause));
    const detail = parts.join(": ");
    const error = new RemoteError(detail ? `${message}: ${detail}` : message, { statusCode, cause });
    this.logger.error(error.message);
    return error;
  }
}

/**
 * True when `id` addresses the record set `desired` describes. Azure
 * resource names compare case-insensitively.
 */
export function isSamePtrRecord(id: PtrRecordId, desired: PtrRecordDesired): boolean {
  return (
    id.resourceGroup.toLowerCase() === desired.resourceGroupName.toLowerCase() &&
    id.zoneName.toLowerCase() === desired.zoneName.toLowerCase() &&
    id.recordName.toLowerCase() === desired.name.toLowerCase()
  );
}

/** Cached etag, only when the store tracks this very record set. */
function trackedEtag(desired: PtrRecordDesired, state: PtrRecordStateStore): string {
  const rawId = state.getId();
  if (!rawId || !isSamePtrRecord(parsePtrRecordId(rawId), desired)) return "";
  return state.get()?.etag ?? "";
}

function ptrKey(resourceGroup: string, zoneName: string, recordName: string): RecordSetKey {
  return { resourceGroup, zoneName, recordName, recordType: "PTR" };
}

export function createPtrRecordAdapter(dns: DnsService, options?: PtrRecordAdapterOptions): PtrRecordAdapter {
  return new PtrRecordAdapter(dns, options);
}
