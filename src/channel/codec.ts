/**
 * Text encoding of an ObjectList for the inter-process channel.
 *
 * Wire format (JSON, whitespace-insensitive):
 *
 *   {"format":"graphpipe/objectlist","version":1,"records":[{...},{...}]}
 *
 * The decoder also takes a bare JSON array of records, which is what a
 * hand-written script is most likely to print.
 */

import { z } from "zod";
import {
  ObjectListSchema,
  RecordValidationError,
  deepFreeze,
  toRecordIssues,
  type ObjectList,
  type RecordIssue,
} from "../records/index.js";

export const CHANNEL_FORMAT = "graphpipe/objectlist";
export const CHANNEL_VERSION = 1;

const EnvelopeSchema = z.object({
  format: z.string(),
  version: z.number().int().positive(),
  records: z.array(z.unknown()),
});

/**
 * Inter-stage data that cannot be turned back into an ObjectList.
 * Fatal to the stage that reads it.
 */
export class ChannelDecodeError extends Error {
  public readonly issues: RecordIssue[];

  constructor(message: string, issues: RecordIssue[] = []) {
    super(message);
    this.name = "ChannelDecodeError";
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

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Bytes read from a stage or script as channel text.
 *
 * @throws ChannelDecodeError when the bytes are not valid UTF-8
 */
export function decodeChannelText(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch (err) {
    if (err instanceof TypeError) {
      throw new ChannelDecodeError(`Channel input is not valid UTF-8: ${err.message}`);
    }
    throw err;
  }
}

export interface EncodeOptions {
  /** Indent with two spaces (default: compact) */
  pretty?: boolean;
}

/**
 * Encode a list for the channel.
 *
 * @throws RecordValidationError if a record holds a value JSON cannot carry
 */
export function encodeObjectList(list: ObjectList, options: EncodeOptions = {}): string {
  const result = ObjectListSchema.safeParse(list);
  if (!result.success) {
    const issues = toRecordIssues(result.error.issues);
    throw new RecordValidationError(
      `Cannot encode object list: ${issues.length} validation error(s)`,
      issues
    );
  }

  const envelope = { format: CHANNEL_FORMAT, version: CHANNEL_VERSION, records: list };
  return JSON.stringify(envelope, null, options.pretty ? 2 : undefined);
}

/**
 * Decode channel text into a frozen ObjectList.
 *
 * @throws ChannelDecodeError on empty, truncated, malformed or ill-typed input
 */
export function decodeObjectList(text: string): ObjectList {
  if (text.trim() === "") {
    throw new ChannelDecodeError("Empty channel input: expected an object list");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ChannelDecodeError(
      `Malformed or truncated channel input: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  let records: unknown;
  let prefix: (string | number)[] = [];
  if (Array.isArray(parsed)) {
    records = parsed;
  } else {
    const envelope = EnvelopeSchema.safeParse(parsed);
    if (!envelope.success) {
      throw new ChannelDecodeError(
        "Channel input is neither an object list envelope nor an array of records",
        toRecordIssues(envelope.error.issues)
      );
    }
    if (envelope.data.format !== CHANNEL_FORMAT) {
      throw new ChannelDecodeError(
        `Unknown channel format: ${envelope.data.format} (expected ${CHANNEL_FORMAT})`
      );
    }
    if (envelope.data.version !== CHANNEL_VERSION) {
      throw new ChannelDecodeError(
        `Unsupported channel version: ${envelope.data.version} (current: ${CHANNEL_VERSION})`
      );
    }
    records = envelope.data.records;
    prefix = ["records"];
  }

  const result = ObjectListSchema.safeParse(records);
  if (!result.success) {
    const issues = toRecordIssues(result.error.issues).map((issue) => ({
      ...issue,
      path: [...prefix, ...issue.path],
    }));
    throw new ChannelDecodeError(
      `Channel input violates the record model: ${issues.length} error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}
