import { ShipmentRecordSchema, type DocumentRole, type ShipmentRecord } from "../extraction/shipment-schema";
import { errorMessage } from "../errors";
import { isExpired, type CacheConfig, type CacheStore } from "./store";

/**
 * (content hash, role) → extracted record.
 *
 * The cache is never a correctness dependency: when disabled every lookup
 * misses and writes are dropped, a failed read is a miss, failed writes and
 * deletes are logged. `delete` reports whether the store accepted it so a
 * forced re-run can overwrite an entry it could not remove.
 */
export class DocumentCache {
    constructor(
        private readonly store: CacheStore,
        private readonly config: CacheConfig
    ) {}

    get enabled(): boolean {
        return this.config.enabled;
    }

    async get(contentHash: string, role: DocumentRole): Promise<ShipmentRecord | null> {
        if (!this.config.enabled) return null;

        try {
            const row = await this.store.findDocument(contentHash, role);
            if (!row || isExpired(row.createdAt, this.config.ttlDays)) return null;

            const parsed = ShipmentRecordSchema.safeParse(JSON.parse(row.payload));
            if (!parsed.success) {
                console.warn(`⚠️ Discarding unreadable document cache entry ${contentHash.slice(0, 12)} (${role})`);
                return null;
            }
            return parsed.data;
        } catch (err) {
            console.warn(`⚠️ Document cache read failed (${role}), treating as miss: ${errorMessage(err)}`);
            return null;
        }
    }

    async put(contentHash: string, role: DocumentRole, filename: string | null, record: ShipmentRecord): Promise<void> {
        if (!this.config.enabled) return;

        try {
            await this.store.upsertDocument({
                contentHash,
                role,
                filename,
                payload: JSON.stringify(record),
                createdAt: new Date().toISOString(),
            });
        } catch (err) {
            console.error(`❌ Document cache write failed (${role}): ${errorMessage(err)}`);
        }
    }

    /** Without a role, removes the hash's entries for every role. False when the store failed. */
    async delete(contentHash: string, role?: DocumentRole): Promise<boolean> {
        if (!this.config.enabled) return true;

        try {
            await this.store.deleteDocuments(contentHash, role);
            return true;
        } catch (err) {
            console.error(`❌ Document cache delete failed (${role ?? "all roles"}): ${errorMessage(err)}`);
            return false;
        }
    }
}
