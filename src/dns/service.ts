/**
 * Azure DNS Service
 *
 * Record set create/get/delete via @azure/arm-dns, reporting the HTTP
 * status of every call instead of throwing for status-carrying failures.
 */

import type { AzureCredentialsManager } from "../credentials/manager.js";
import { traceRecordSetCall } from "../diagnostics.js";
import { getErrorStatusCode } from "../errors.js";
import type {
  CreateOrUpdateRecordSetRequest,
  CreateOrUpdateRecordSetResult,
  DeleteRecordSetRequest,
  DeleteRecordSetResult,
  DnsService,
  GetRecordSetResult,
  RecordSetKey,
} from "./types.js";

export class AzureDnsService implements DnsService {
  private credentialsManager: AzureCredentialsManager;
  private subscriptionId: string;

  constructor(credentialsManager: AzureCredentialsManager, subscriptionId: string) {
    this.credentialsManager = credentialsManager;
    this.subscriptionId = subscriptionId;
  }

  private async getClient() {
    const { DnsManagementClient } = await import("@azure/arm-dns");
    const { credential } = await this.credentialsManager.getCredential();
    return new DnsManagementClient(credential, this.subscriptionId);
  }

  async createOrUpdate(request: CreateOrUpdateRecordSetRequest): Promise<CreateOrUpdateRecordSetResult> {
    let status = 0;
    try {
      const result = await traceRecordSetCall(
        "createOrUpdate",
        keyOf(request),
        async () => {
          const client = await this.getClient();
          return client.recordSets.createOrUpdate(
            request.resourceGroup,
            request.zoneName,
            request.recordName,
            request.recordType,
            {
              ttl: request.properties.ttl,
              metadata: request.properties.metadata,
              ptrRecords: request.properties.ptrRecords,
            },
            {
              ifMatch: headerValue(request.ifMatch),
              ifNoneMatch: headerValue(request.ifNoneMatch),
              onResponse: (response) => {
                status = response.status;
              },
            },
          );
        },
        () => status || undefined,
      );
      return { status: status || 200, id: result.id, etag: result.etag };
    } catch (error) {
      return statusResult(error);
    }
  }

  async get(key: RecordSetKey): Promise<GetRecordSetResult> {
    let status = 0;
    try {
      const recordSet = await traceRecordSetCall(
        "get",
        keyOf(key),
        async () => {
          const client = await this.getClient();
          return client.recordSets.get(key.resourceGroup, key.zoneName, key.recordName, key.recordType, {
            onResponse: (response) => {
              status = response.status;
            },
          });
        },
        () => status || undefined,
      );
      return {
        status: status || 200,
        recordSet: {
          id: recordSet.id,
          name: recordSet.name,
          etag: recordSet.etag,
          ttl: recordSet.ttl,
          fqdn: recordSet.fqdn,
          metadata: recordSet.metadata,
          ptrRecords: recordSet.ptrRecords?.map((r) => ({ ptrdname: r.ptrdname })),
        },
      };
    } catch (error) {
      return statusResult(error);
    }
  }

  async delete(request: DeleteRecordSetRequest): Promise<DeleteRecordSetResult> {
    let status = 0;
    try {
      await traceRecordSetCall(
        "delete",
        keyOf(request),
        async () => {
          const client = await this.getClient();
          await client.recordSets.delete(
            request.resourceGroup,
            request.zoneName,
            request.recordName,
            request.recordType,
            {
              ifMatch: headerValue(request.ifMatch),
              onResponse: (response) => {
                status = response.status;
              },
            },
          );
        },
        () => status || undefined,
      );
      return { status: status || 200 };
    } catch (error) {
      return statusResult(error);
    }
  }
}

function keyOf({ resourceGroup, zoneName, recordName, recordType }: RecordSetKey): RecordSetKey {
  return { resourceGroup, zoneName, recordName, recordType };
}

/** Empty concurrency tokens are not sent at all. */
function headerValue(token: string): string | undefined {
  return token === "" ? undefined : token;
}

/** Turn an SDK error into a status result; re-throw when it has no status. */
function statusResult(error: unknown): { status: number; error: unknown } {
  const status = getErrorStatusCode(error);
  if (status === undefined) throw error;
  return { status, error };
}

export function createDnsService(
  credentialsManager: AzureCredentialsManager,
  subscriptionId: string,
): AzureDnsService {
  return new AzureDnsService(credentialsManager, subscriptionId);
}
