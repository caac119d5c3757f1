export { AzureDnsService, createDnsService } from "./service.js";
export { InMemoryDnsService } from "./memory-service.js";
export type { InMemoryDnsServiceOptions } from "./memory-service.js";
export type {
  RecordType,
  PtrRecordEntry,
  RecordSetProperties,
  RemoteRecordSet,
  RecordSetKey,
  CreateOrUpdateRecordSetRequest,
  CreateOrUpdateRecordSetResult,
  DeleteRecordSetRequest,
  DeleteRecordSetResult,
  GetRecordSetResult,
  DnsService,
} from "./types.js";
