/**
 * Serialization channel: the data path between stages.
 */

export {
  CHANNEL_FORMAT,
  CHANNEL_VERSION,
  ChannelDecodeError,
  encodeObjectList,
  decodeObjectList,
  decodeChannelText,
  type EncodeOptions,
} from "./codec.js";

export {
  readAll,
  readObjectList,
  readOptionalObjectList,
  writeObjectList,
  type ByteSource,
} from "./stream.js";

export { BlobStore, findDanglingBlobs, sanitizeFileName, uniquePath } from "./blobs.js";
