export { createRecordStore } from './record-store';
export type {
  CreateRecordInput,
  ExecutionRecordStore,
  RecordHistoryEntry,
  RecordStoreOptions,
  RunPatch,
} from './record-store';
