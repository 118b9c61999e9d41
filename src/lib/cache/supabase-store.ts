/**
 * @file    supabase-store.ts
 * @purpose Postgres-backed cache rows (tables in supabase/migrations).
 * @deps    @supabase/supabase-js, zod
 *
 * DECISION: Upserts go through `onConflict` on the unique keys, i.e. a single
 * INSERT ... ON CONFLICT statement. Two requests extracting the same file at
 * once both land a complete row; the later write wins.
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { DocumentRoleSchema, type DocumentRole } from "../extraction/shipment-schema";
import type { CacheStore, DocumentCacheRow, WorkflowCacheRow } from "./store";

const DOCUMENT_TABLE = "document_cache";
const WORKFLOW_TABLE = "workflow_cache";

const DocumentRowSchema = z.object({
    content_hash: z.string(),
    role: DocumentRoleSchema,
    filename: z.string().nullable(),
    extracted_json: z.string(),
    created_at: z.string(),
});

const WorkflowRowSchema = z.object({
    workflow_key: z.string(),
    bl_hash: z.string(),
    invoice_hash: z.string(),
    packing_hash: z.string().nullable(),
    report_json: z.string(),
    created_at: z.string(),
    last_access: z.string(),
});

export class SupabaseCacheStore implements CacheStore {
    readonly name = "supabase";

    constructor(private readonly client: SupabaseClient) {}

    async findDocument(contentHash: string, role: DocumentRole): Promise<DocumentCacheRow | null> {
        const { data, error } = await this.client
            .from(DOCUMENT_TABLE)
            .select("content_hash, role, filename, extracted_json, created_at")
            .eq("content_hash", contentHash)
            .eq("role", role)
            .order("created_at", { ascending: false })
            .limit(1)
            .maybeSingle();

        if (error) throw new Error(`${DOCUMENT_TABLE} read failed: ${error.message}`);
        if (!data) return null;

        const row = DocumentRowSchema.parse(data);
        return {
            contentHash: row.content_hash,
            role: row.role,
            filename: row.filename,
            payload: row.extracted_json,
            createdAt: row.created_at,
        };
    }

    async upsertDocument(row: DocumentCacheRow): Promise<void> {
        const { error } = await this.client.from(DOCUMENT_TABLE).upsert(
            {
                content_hash: row.contentHash,
                role: row.role,
                filename: row.filename,
                extracted_json: row.payload,
                created_at: row.createdAt,
            },
            { onConflict: "content_hash,role" }
        );
        if (error) throw new Error(`${DOCUMENT_TABLE} write failed: ${error.message}`);
    }

    async deleteDocuments(contentHash: string, role?: DocumentRole): Promise<void> {
        let query = this.client.from(DOCUMENT_TABLE).delete().eq("content_hash", contentHash);
        if (role) query = query.eq("role", role);

        const { error } = await query;
        if (error) throw new Error(`${DOCUMENT_TABLE} delete failed: ${error.message}`);
    }

    async findWorkflow(workflowKey: string): Promise<WorkflowCacheRow | null> {
        const { data, error } = await this.client
            .from(WORKFLOW_TABLE)
            .select("workflow_key, bl_hash, invoice_hash, packing_hash, report_json, created_at, last_access")
            .eq("workflow_key", workflowKey)
            .maybeSingle();

        if (error) throw new Error(`${WORKFLOW_TABLE} read failed: ${error.message}`);
        if (!data) return null;

        const row = WorkflowRowSchema.parse(data);
        return {
            workflowKey: row.workflow_key,
            blHash: row.bl_hash,
            invoiceHash: row.invoice_hash,
            packingHash: row.packing_hash,
            payload: row.report_json,
            createdAt: row.created_at,
            lastAccess: row.last_access,
        };
    }

    async touchWorkflow(workflowKey: string, lastAccess: string): Promise<void> {
        const { error } = await this.client
            .from(WORKFLOW_TABLE)
            .update({ last_access: lastAccess })
            .eq("workflow_key", workflowKey);
        if (error) throw new Error(`${WORKFLOW_TABLE} update failed: ${error.message}`);
    }

    async upsertWorkflow(row: WorkflowCacheRow): Promise<void> {
        const { error } = await this.client.from(WORKFLOW_TABLE).upsert(
            {
                workflow_key: row.workflowKey,
                bl_hash: row.blHash,
                invoice_hash: row.invoiceHash,
                packing_hash: row.packingHash,
                report_json: row.payload,
                created_at: row.createdAt,
                last_access: row.lastAccess,
            },
            { onConflict: "workflow_key" }
        );
        if (error) throw new Error(`${WORKFLOW_TABLE} write failed: ${error.message}`);
    }

    async deleteWorkflow(workflowKey: string): Promise<void> {
        const { error } = await this.client.from(WORKFLOW_TABLE).delete().eq("workflow_key", workflowKey);
        if (error) throw new Error(`${WORKFLOW_TABLE} delete failed: ${error.message}`);
    }
}
