/**
 * How a record reaches an external script.
 *
 *   stdin  one-record ObjectList in channel encoding on standard input
 *   args   each top-level field appended as --<key>=<value>
 *   env    GRAPHPIPE_RECORD holds the one-record list, scalar fields are
 *          exported as GRAPHPIPE_FIELD_<KEY>
 *
 * Values in args/env form: strings as-is, numbers and booleans as text,
 * null as the empty string, blob references as their path, arrays and
 * nested records as JSON.
 */

import { encodeObjectList } from "../channel/index.js";
import { isBlobRef, type DataRecord, type RecordValue } from "../records/index.js";

export const PASS_MODES = ["stdin", "args", "env"] as const;

export type PassMode = (typeof PASS_MODES)[number];

export const RECORD_ENV = "GRAPHPIPE_RECORD";
export const FIELD_ENV_PREFIX = "GRAPHPIPE_FIELD_";

export interface RecordPassing {
  readonly args: readonly string[];
  readonly stdin: string;
  readonly env: Readonly<Record<string, string>>;
}

export function isPassMode(value: string): value is PassMode {
  return (PASS_MODES as readonly string[]).includes(value);
}

export function fieldToText(value: RecordValue): string {
  if (value === null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (isBlobRef(value)) return value.$blob;
  return JSON.stringify(value);
}

export function fieldEnvName(key: string): string {
  return FIELD_ENV_PREFIX + key.toUpperCase().replace(/[^A-Z0-9]/g, "_");
}

function isScalar(value: RecordValue): boolean {
  return value === null || typeof value !== "object" || isBlobRef(value);
}

export function passRecord(record: DataRecord, mode: PassMode): RecordPassing {
  switch (mode) {
    case "stdin":
      return { args: [], stdin: encodeObjectList([record]), env: {} };
    case "args":
      return {
        args: Object.entries(record).map(([key, value]) => `--${key}=${fieldToText(value)}`),
        stdin: "",
        env: {},
      };
    case "env": {
      const env: Record<string, string> = { [RECORD_ENV]: encodeObjectList([record]) };
      for (const [key, value] of Object.entries(record)) {
        if (isScalar(value)) {
          env[fieldEnvName(key)] = fieldToText(value);
        }
      }
      return { args: [], stdin: "", env };
    }
  }
}
