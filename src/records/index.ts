/**
 * Record & list model.
 *
 * Usage:
 *   import { createRecord, type ObjectList } from "./records/index.js";
 *
 *   const record = createRecord({ id: "AAMk1", subject: "Invoice" });
 *   const list: ObjectList = [record];
 */

export type {
  BlobRef,
  DataRecord,
  ObjectList,
  RecordValue,
} from "./schema.js";

export {
  BlobRefSchema,
  DataRecordSchema,
  ObjectListSchema,
  RecordValueSchema,
} from "./schema.js";

export {
  RecordValidationError,
  createRecord,
  createObjectList,
  deepFreeze,
  isBlobRef,
  blobRef,
  collectBlobRefs,
  valuesEqual,
  recordsEqual,
  listsEqual,
  identifyRecord,
  formatIdentity,
  toRecordIssues,
  IDENTITY_FIELDS,
  type RecordIdentity,
  type RecordIssue,
} from "./model.js";
