/**
 * Moving encoded lists over byte streams (stdin/stdout of stages and scripts).
 */

import type { Writable } from "node:stream";
import type { ObjectList } from "../records/index.js";
import { decodeChannelText, decodeObjectList, encodeObjectList, type EncodeOptions } from "./codec.js";

export type ByteSource = AsyncIterable<string | Uint8Array>;

/**
 * Read a stream to its end as UTF-8 text.
 *
 * @throws ChannelDecodeError on invalid UTF-8
 */
export async function readAll(source: ByteSource): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of source) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : Buffer.from(chunk));
  }
  return decodeChannelText(Buffer.concat(chunks));
}

/**
 * Read and decode one list. An empty stream is a decode error.
 */
export async function readObjectList(source: ByteSource): Promise<ObjectList> {
  return decodeObjectList(await readAll(source));
}

/**
 * Like readObjectList, but a stream holding only whitespace means "nothing
 * was piped" and yields undefined.
 */
export async function readOptionalObjectList(source: ByteSource): Promise<ObjectList | undefined> {
  const text = await readAll(source);
  return text.trim() === "" ? undefined : decodeObjectList(text);
}

/**
 * Write one encoded list followed by a newline.
 */
export function writeObjectList(
  target: Writable,
  list: ObjectList,
  options: EncodeOptions = {}
): Promise<void> {
  const text = encodeObjectList(list, options) + "\n";
  return new Promise((resolve, reject) => {
    target.write(text, (err) => (err ? reject(err) : resolve()));
  });
}
