export { PtrRecordAdapter, createPtrRecordAdapter, isSamePtrRecord } from "./adapter.js";
export type { PtrRecordAdapterOptions } from "./adapter.js";
export { InMemoryPtrRecordState, FilePtrRecordState } from "./state.js";
export {
  PtrRecordDesiredSchema,
  PtrRecordAttributesSchema,
  PtrRecordStateSnapshotSchema,
  PTR_RECORD_FORCE_NEW_FIELDS,
  PTR_RECORD_COMPUTED_FIELDS,
  validatePtrRecordDesired,
  expandPtrRecords,
  flattenPtrRecords,
} from "./schema.js";
export type {
  PtrRecordDesired,
  PtrRecordAttributes,
  PtrRecordRemote,
  PtrRecordStateSnapshot,
  PtrRecordStateStore,
} from "./types.js";
