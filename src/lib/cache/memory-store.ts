import type { DocumentRole } from "../extraction/shipment-schema";
import type { CacheStore, DocumentCacheRow, WorkflowCacheRow } from "./store";

/**
 * Process-local store. Backs local runs without Supabase credentials and the
 * test suite. Rows are copied on every read and write.
 */
export class MemoryCacheStore implements CacheStore {
    readonly name = "memory";
    private readonly documents = new Map<string, DocumentCacheRow>();
    private readonly workflows = new Map<string, WorkflowCacheRow>();

    private static documentKey(contentHash: string, role: DocumentRole): string {
        return `${contentHash}:${role}`;
    }

    async findDocument(contentHash: string, role: DocumentRole): Promise<DocumentCacheRow | null> {
        const row = this.documents.get(MemoryCacheStore.documentKey(contentHash, role));
        return row ? { ...row } : null;
    }

    async upsertDocument(row: DocumentCacheRow): Promise<void> {
        this.documents.set(MemoryCacheStore.documentKey(row.contentHash, row.role), { ...row });
    }

    async deleteDocuments(contentHash: string, role?: DocumentRole): Promise<void> {
        for (const [key, row] of this.documents) {
            if (row.contentHash === contentHash && (role === undefined || row.role === role)) {
                this.documents.delete(key);
            }
        }
    }

    async findWorkflow(workflowKey: string): Promise<WorkflowCacheRow | null> {
        const row = this.workflows.get(workflowKey);
        return row ? { ...row } : null;
    }

    async touchWorkflow(workflowKey: string, lastAccess: string): Promise<void> {
        const row = this.workflows.get(workflowKey);
        if (row) this.workflows.set(workflowKey, { ...row, lastAccess });
    }

    async upsertWorkflow(row: WorkflowCacheRow): Promise<void> {
        this.workflows.set(row.workflowKey, { ...row });
    }

    async deleteWorkflow(workflowKey: string): Promise<void> {
        this.workflows.delete(workflowKey);
    }
}
