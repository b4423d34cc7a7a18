import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";

/** Converts CRLF and bare CR line endings to LF. */
export function normalizeLineEndings(content: string): string {
  return content.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}

/**
 * Content fingerprint used by the delivery protocol: lowercase SHA-256 hex of
 * the UTF-8 bytes after line endings are normalized to LF.
 */
export function fingerprint(content: string): string {
  return createHash("sha256").update(normalizeLineEndings(content), "utf8").digest("hex");
}

export async function hashFile(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash("sha256");
    const stream = createReadStream(filePath);
    stream.on("data", (chunk) => hash.update(chunk));
    stream.on("error", reject);
    stream.on("end", () => resolve(hash.digest("hex")));
  });
}
