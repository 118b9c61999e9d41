import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { DocumentRole } from "../extraction/shipment-schema";
import { InputError, PayloadTooLargeError } from "../errors";

export const ALLOWED_EXTENSIONS = ["pdf", "xlsx", "xls", "jpg", "jpeg", "png"] as const;

export interface IncomingFile {
    name: string;
    bytes: Uint8Array;
}

export interface StoredUpload {
    filename: string;
    originalName: string;
    role: DocumentRole;
    size: number;
    path: string;
}

export function isAllowedFile(filename: string): boolean {
    const ext = path.extname(filename).slice(1).toLowerCase();
    return ALLOWED_EXTENSIONS.some(allowed => allowed === ext);
}

export function sanitizeFilename(filename: string): string {
    return path.basename(filename).replace(/[^a-zA-Z0-9._-]/g, "_");
}

// Stored as {uploadDir}/{epoch ms}_{role}_{filename}
export class UploadStore {
    constructor(
        readonly dir: string,
        readonly maxBytes: number
    ) {}

    /** Throws for files that must not be stored; returns the sanitized name. */
    check(file: IncomingFile): string {
        const originalName = sanitizeFilename(file.name);
        if (!file.name.trim() || !originalName) {
            throw new InputError("No file selected");
        }
        if (!isAllowedFile(originalName)) {
            throw new InputError(`File type not allowed. Supported: ${ALLOWED_EXTENSIONS.join(", ")}`);
        }
        if (file.bytes.byteLength > this.maxBytes) {
            throw new PayloadTooLargeError(`File too large. Maximum size: ${Math.round(this.maxBytes / 1024 / 1024)}MB`);
        }
        return originalName;
    }

    /** Absolute path of a stored upload; anything outside the upload directory is rejected. */
    resolve(filePath: string): string {
        const resolved = path.resolve(filePath);
        const relative = path.relative(path.resolve(this.dir), resolved);
        if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) {
            throw new InputError("filepath must point to an uploaded file");
        }
        return resolved;
    }

    async save(file: IncomingFile, role: DocumentRole): Promise<StoredUpload> {
        const originalName = this.check(file);
        const filename = `${Date.now()}_${role}_${originalName}`;
        const filePath = path.join(this.dir, filename);

        await mkdir(this.dir, { recursive: true });
        await writeFile(filePath, file.bytes);

        console.log(`📥 Saved upload: ${filename} (${role})`);
        return { filename, originalName, role, size: file.bytes.byteLength, path: filePath };
    }
}
