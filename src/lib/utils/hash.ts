import crypto from "node:crypto";

export function sha1(input: string | Buffer): string {
  return crypto.createHash("sha1").update(input).digest("hex");
}

export function documentIdFor(text: string): string {
  return `doc_${sha1(text).slice(0, 8)}`;
}
