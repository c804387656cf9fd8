export { fileHandleFromBlob, fileHandleFromBlobBytes } from "./blob";
export type { BlobLike, BlobHandleOptions } from "./blob";
export { readableToByteStream } from "./readable";
export type { ReadableByteSource } from "./readable";
