import { VerificationReportSchema, type VerificationReport } from "../verification/report";
import { errorMessage } from "../errors";
import { isExpired, type CacheConfig, type CacheStore } from "./store";

/**
 * Workflow key → finished report. Same enable switch, TTL and error policy as
 * DocumentCache. A hit refreshes `last_access` only; `created_at` keeps
 * driving expiry.
 */
export class WorkflowCache {
    constructor(
        private readonly store: CacheStore,
        private readonly config: CacheConfig
    ) {}

    get enabled(): boolean {
        return this.config.enabled;
    }

    async get(workflowKey: string): Promise<VerificationReport | null> {
        if (!this.config.enabled) return null;

        let report: VerificationReport;
        try {
            const row = await this.store.findWorkflow(workflowKey);
            if (!row || isExpired(row.createdAt, this.config.ttlDays)) return null;

            const parsed = VerificationReportSchema.safeParse(JSON.parse(row.payload));
            if (!parsed.success) {
                console.warn(`⚠️ Discarding unreadable workflow cache entry ${workflowKey.slice(0, 12)}`);
                return null;
            }
            report = parsed.data;
        } catch (err) {
            console.warn(`⚠️ Workflow cache read failed, treating as miss: ${errorMessage(err)}`);
            return null;
        }

        try {
            await this.store.touchWorkflow(workflowKey, new Date().toISOString());
        } catch (err) {
            console.warn(`⚠️ Could not refresh last_access for ${workflowKey.slice(0, 12)}: ${errorMessage(err)}`);
        }
        return report;
    }

    async put(
        workflowKey: string,
        blHash: string,
        invoiceHash: string,
        packingHash: string | null,
        report: VerificationReport
    ): Promise<void> {
        if (!this.config.enabled) return;

        const now = new Date().toISOString();
        try {
            await this.store.upsertWorkflow({
                workflowKey,
                blHash,
                invoiceHash,
                packingHash,
                payload: JSON.stringify(report),
                createdAt: now,
                lastAccess: now,
            });
        } catch (err) {
            console.error(`❌ Workflow cache write failed: ${errorMessage(err)}`);
        }
    }

    /** False when the store failed. */
    async delete(workflowKey: string): Promise<boolean> {
        if (!this.config.enabled) return true;

        try {
            await this.store.deleteWorkflow(workflowKey);
            return true;
        } catch (err) {
            console.error(`❌ Workflow cache delete failed: ${errorMessage(err)}`);
            return false;
        }
    }
}
