/** Base64 JSON, the encoding of every payment header. */
export function toBase64(obj: unknown): string {
  return Buffer.from(JSON.stringify(obj)).toString("base64");
}
