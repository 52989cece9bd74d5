/** Attachment bytes as the Buffer the binary document libraries expect. */
export function toBuffer(input: Uint8Array | string): Buffer {
  return typeof input === "string" ? Buffer.from(input, "binary") : Buffer.from(input);
}
