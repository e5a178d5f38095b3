/**
 * Value semantics for records and lists: validation, freezing, structural
 * equality and identity. Nothing here performs I/O.
 */

import type { ZodIssue } from "zod";
import {
  BlobRefSchema,
  DataRecordSchema,
  ObjectListSchema,
  type BlobRef,
  type DataRecord,
  type ObjectList,
  type RecordValue,
} from "./schema.js";

/**
 * Individual validation issue.
 */
export interface RecordIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
}

/**
 * A value that falls outside the record value space.
 */
export class RecordValidationError extends Error {
  public readonly issues: RecordIssue[];

  constructor(message: string, issues: RecordIssue[]) {
    super(message);
    this.name = "RecordValidationError";
    this.issues = issues;
  }

  format(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export function toRecordIssues(zodIssues: ZodIssue[]): RecordIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Validate and freeze a single record.
 *
 * @throws RecordValidationError if a field is outside the value space
 */
export function createRecord(fields: unknown): DataRecord {
  const result = DataRecordSchema.safeParse(fields);
  if (!result.success) {
    const issues = toRecordIssues(result.error.issues);
    throw new RecordValidationError(
      `Invalid record: ${issues.length} validation error(s)`,
      issues
    );
  }
  return deepFreeze(result.data);
}

/**
 * Validate and freeze a list of records.
 *
 * @throws RecordValidationError naming the index of each offending record
 */
export function createObjectList(records: unknown): ObjectList {
  const result = ObjectListSchema.safeParse(records);
  if (!result.success) {
    const issues = toRecordIssues(result.error.issues);
    throw new RecordValidationError(
      `Invalid object list: ${issues.length} validation error(s)`,
      issues
    );
  }
  return deepFreeze(result.data);
}

export function isBlobRef(value: RecordValue | undefined): value is BlobRef {
  return BlobRefSchema.safeParse(value).success;
}

export function blobRef(path: string, size?: number, contentType?: string): BlobRef {
  return {
    $blob: path,
    ...(size !== undefined ? { size } : {}),
    ...(contentType !== undefined ? { contentType } : {}),
  };
}

/**
 * All blob references reachable from a record, depth first.
 */
export function collectBlobRefs(record: DataRecord): BlobRef[] {
  const found: BlobRef[] = [];
  const visit = (value: RecordValue): void => {
    if (value === null || typeof value !== "object") return;
    if (isBlobRef(value)) {
      found.push(value);
    } else if (Array.isArray(value)) {
      value.forEach(visit);
    } else {
      Object.values(value).forEach(visit);
    }
  };
  Object.values(record).forEach(visit);
  return found;
}

/**
 * Structural equality. Key order in records is irrelevant, array order is not.
 */
export function valuesEqual(a: RecordValue | undefined, b: RecordValue | undefined): boolean {
  if (a === b) return true;
  if (a === null || b === null || a === undefined || b === undefined) return false;
  if (typeof a !== "object" || typeof b !== "object") return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item: RecordValue, i: number) => valuesEqual(item, b[i]));
  }

  const aEntries = Object.entries(a);
  if (aEntries.length !== Object.keys(b).length) return false;
  return aEntries.every(
    ([key, value]) => Object.prototype.hasOwnProperty.call(b, key) && valuesEqual(value, Reflect.get(b, key))
  );
}

export function recordsEqual(a: DataRecord, b: DataRecord): boolean {
  return valuesEqual(a, b);
}

export function listsEqual(a: ObjectList, b: ObjectList): boolean {
  return a.length === b.length && a.every((record, i) => {
    const other = b[i];
    return other !== undefined && recordsEqual(record, other);
  });
}

/** Fields that let a person or script act on a record without extra state */
export const IDENTITY_FIELDS = ["id", "messageId", "path", "name", "webUrl"] as const;

export type RecordIdentity = Readonly<Record<string, string | number>>;

/**
 * The identifying fields of a record. Falls back to the record's position
 * when it carries none of IDENTITY_FIELDS.
 */
export function identifyRecord(record: DataRecord, index: number): RecordIdentity {
  const identity: Record<string, string | number> = {};
  for (const field of IDENTITY_FIELDS) {
    const value = record[field];
    if (typeof value === "string" || typeof value === "number") {
      identity[field] = value;
    }
  }
  if (Object.keys(identity).length === 0) {
    identity.index = index;
  }
  return identity;
}

export function formatIdentity(identity: RecordIdentity): string {
  return Object.entries(identity)
    .map(([key, value]) => `${key}=${value}`)
    .join(" ");
}
