import type { DocumentRole } from "../extraction/shipment-schema";

// Payloads are JSON text: rows are copied in and out, never shared by reference.

export interface DocumentCacheRow {
    contentHash: string;
    role: DocumentRole;
    filename: string | null;
    payload: string;
    createdAt: string;
}

export interface WorkflowCacheRow {
    workflowKey: string;
    blHash: string;
    invoiceHash: string;
    packingHash: string | null;
    payload: string;
    createdAt: string;
    lastAccess: string;
}

/**
 * Row persistence for both caches. Each method is one atomic unit of work;
 * upserts replace the row for the key as a whole.
 */
export interface CacheStore {
    readonly name: string;
    findDocument(contentHash: string, role: DocumentRole): Promise<DocumentCacheRow | null>;
    upsertDocument(row: DocumentCacheRow): Promise<void>;
    deleteDocuments(contentHash: string, role?: DocumentRole): Promise<void>;
    findWorkflow(workflowKey: string): Promise<WorkflowCacheRow | null>;
    touchWorkflow(workflowKey: string, lastAccess: string): Promise<void>;
    upsertWorkflow(row: WorkflowCacheRow): Promise<void>;
    deleteWorkflow(workflowKey: string): Promise<void>;
}

export interface CacheConfig {
    enabled: boolean;
    /** 0 disables expiry. */
    ttlDays: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/** Unparseable timestamps are treated as fresh. */
export function isExpired(createdAt: string, ttlDays: number, now: Date = new Date()): boolean {
    if (!ttlDays) return false;
    const created = Date.parse(createdAt);
    if (Number.isNaN(created)) return false;
    return now.getTime() > created + ttlDays * DAY_MS;
}
