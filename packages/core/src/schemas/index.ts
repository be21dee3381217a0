export {
  serializationMode,
  rawNodeRecordSchema,
  rawTreeRecordSchema,
  type SerializationMode,
  type FullNodeRecord,
  type CompactNodeRecord,
  type NodeRecordOf,
  type TreeRecord,
  type RawNodeRecord,
  type RawTreeRecord,
} from './tree-record.js';
