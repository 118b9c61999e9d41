import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";

const BLOCK_SIZE = 1024 * 1024;

/** SHA-256 of a file's bytes, streamed in 1 MiB blocks. Name and mtime play no part. */
export async function hashFile(filePath: string): Promise<string> {
    const hash = createHash("sha256");
    const stream = createReadStream(filePath, { highWaterMark: BLOCK_SIZE });
    for await (const chunk of stream) {
        hash.update(chunk);
    }
    return hash.digest("hex");
}

export function hashBuffer(bytes: Uint8Array): string {
    return createHash("sha256").update(bytes).digest("hex");
}

/**
 * Composite key for a document set. Slot order matters: swapping the BL and
 * invoice hashes yields a different key.
 */
export function hashWorkflow(blHash: string, invoiceHash: string, packingHash?: string | null): string {
    const base = `bl=${blHash}|invoice=${invoiceHash}|packing=${packingHash ?? ""}`;
    return createHash("sha256").update(base, "utf8").digest("hex");
}
