/**
 * Record value space.
 *
 * A record is a string-keyed mapping whose values are JSON scalars, arrays,
 * nested records, or blob references. Binary content never travels inline:
 * a BlobRef names the file that holds it.
 *
 * Keys starting with "$" are reserved. That keeps `{ "$blob": ... }`
 * unambiguous when a list is decoded on the far side of a process boundary.
 * "__proto__" is refused as well: an object cannot carry it as a plain field,
 * so it would vanish from a decoded record.
 */

import { z } from "zod";

export interface BlobRef {
  readonly $blob: string;
  readonly size?: number;
  readonly contentType?: string;
}

export type RecordValue =
  | string
  | number
  | boolean
  | null
  | BlobRef
  | readonly RecordValue[]
  | DataRecord;

export interface DataRecord {
  readonly [key: string]: RecordValue;
}

export type ObjectList = readonly DataRecord[];

export const BlobRefSchema = z
  .object({
    $blob: z.string().min(1).describe("Path of the file holding the content"),
    size: z.number().int().nonnegative().optional(),
    contentType: z.string().optional(),
  })
  .strict();

export const RecordKeySchema = z
  .string()
  .min(1, "record keys must not be empty")
  .refine((key) => !key.startsWith("$"), {
    message: "record keys must not start with '$' (reserved)",
  })
  .refine((key) => key !== "__proto__", {
    message: "record key '__proto__' is reserved",
  });

export const RecordValueSchema: z.ZodType<RecordValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    BlobRefSchema,
    z.array(RecordValueSchema),
    DataRecordSchema,
  ])
);

export const DataRecordSchema: z.ZodType<DataRecord> = z.lazy(() =>
  z.record(RecordKeySchema, RecordValueSchema)
);

export const ObjectListSchema = z.array(DataRecordSchema);
