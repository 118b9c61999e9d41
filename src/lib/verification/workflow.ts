/**
 * @file    workflow.ts
 * @purpose Full verification pipeline: hash → document cache → extraction →
 *          workflow cache → comparison → report.
 * @deps    cache/*, hashing/content-hash, matching/shipment-comparator, compliance/*
 *
 * DECISION: Force mode deletes cache entries and waits for the delete before
 * recomputing. A concurrent reader may see a miss in between, but never the
 * old entry once the new one is written. When the store refuses a delete the
 * run continues; the fresh result then overwrites the stale entry even if it
 * would not normally be cached, unless a second delete succeeds.
 *
 * DECISION: Records with no usable field (failed extractions) are returned to
 * the caller but not cached, and neither is a report built from one. A
 * transient model outage must not be replayed for the whole TTL window.
 */

import { access } from "node:fs/promises";
import path from "node:path";
import type { DocumentCache } from "../cache/document-cache";
import type { WorkflowCache } from "../cache/workflow-cache";
import { formatCnpj, validateCnpj } from "../compliance/cnpj";
import type { CnpjRegistry } from "../compliance/cnpj-registry";
import { errorMessage, InputError, NotFoundError } from "../errors";
import type { DocumentExtractor } from "../extraction/shipment-extractor";
import {
    failedRecord,
    isMeaningfulExtraction,
    ShipmentRecordSchema,
    type DocumentRole,
    type ShipmentRecord,
} from "../extraction/shipment-schema";
import { hashFile, hashWorkflow } from "../hashing/content-hash";
import { compareShipmentDocuments } from "../matching/shipment-comparator";
import type { ReportArchive } from "../storage/report-archive";
import {
    summarize,
    VerificationReportSchema,
    type CnpjValidation,
    type VerificationReport,
} from "./report";

export interface WorkflowFiles {
    bl?: string;
    invoice?: string;
    packing?: string;
}

export interface WorkflowResult {
    report: VerificationReport;
    cached: boolean;
    workflowKey: string;
    files: { bl: string; invoice: string; packing?: string };
    forced: boolean;
    reportFile: string | null;
}

export interface VerifierDeps {
    extractor: DocumentExtractor;
    documentCache: DocumentCache;
    workflowCache: WorkflowCache;
    archive?: ReportArchive;
    registry?: CnpjRegistry;
}

async function ensureReadable(filePath: string): Promise<void> {
    try {
        await access(filePath);
    } catch {
        throw new NotFoundError(`File not found: ${filePath}`);
    }
}

export class DocumentVerifier {
    constructor(private readonly deps: VerifierDeps) {}

    /** Single-document extraction through the document cache. */
    async extractOne(filePath: string, role: DocumentRole, force = false): Promise<ShipmentRecord> {
        await ensureReadable(filePath);
        const contentHash = await hashFile(filePath);
        return this.extractHashed(filePath, contentHash, role, force);
    }

    async processWorkflow(files: WorkflowFiles, options: { force?: boolean } = {}): Promise<WorkflowResult> {
        const force = options.force ?? false;
        const { bl, invoice, packing } = files;
        if (!bl || !invoice) {
            throw new InputError("At least BL and Invoice are required");
        }
        for (const filePath of [bl, invoice, packing]) {
            if (filePath) await ensureReadable(filePath);
        }

        const blHash = await hashFile(bl);
        const invoiceHash = await hashFile(invoice);
        const packingHash = packing ? await hashFile(packing) : null;
        const workflowKey = hashWorkflow(blHash, invoiceHash, packingHash);
        const resolved = packing ? { bl, invoice, packing } : { bl, invoice };

        let staleEntry = false;
        if (!force) {
            const cached = await this.deps.workflowCache.get(workflowKey);
            if (cached) {
                console.log(`📦 Workflow cache HIT ${workflowKey.slice(0, 12)}, returning stored report`);
                return { report: cached, cached: true, workflowKey, files: resolved, forced: false, reportFile: null };
            }
        } else {
            staleEntry = !(await this.deps.workflowCache.delete(workflowKey));
        }

        const blRecord = await this.extractHashed(bl, blHash, "bl", force);
        const invoiceRecord = await this.extractHashed(invoice, invoiceHash, "invoice", force);
        const packingRecord = packing && packingHash
            ? await this.extractHashed(packing, packingHash, "packing", force)
            : undefined;

        const comparison = compareShipmentDocuments(blRecord, invoiceRecord, packingRecord);
        const report = VerificationReportSchema.parse({
            timestamp: new Date().toISOString(),
            documentsProcessed: packingRecord ? ["bl", "invoice", "packing"] : ["bl", "invoice"],
            extractedData: packingRecord
                ? { bl: blRecord, invoice: invoiceRecord, packing: packingRecord }
                : { bl: blRecord, invoice: invoiceRecord },
            cnpjValidation: await this.validateCnpj(blRecord, invoiceRecord),
            comparison,
            summary: summarize(comparison),
        });

        const records = [blRecord, invoiceRecord, packingRecord].filter((r): r is ShipmentRecord => r !== undefined);
        if (records.every(isMeaningfulExtraction)) {
            await this.deps.workflowCache.put(workflowKey, blHash, invoiceHash, packingHash, report);
        } else if (staleEntry && !(await this.deps.workflowCache.delete(workflowKey))) {
            console.warn(`⚠️ Overwriting undeletable workflow entry ${workflowKey.slice(0, 12)} with the new report`);
            await this.deps.workflowCache.put(workflowKey, blHash, invoiceHash, packingHash, report);
        } else {
            console.warn(`⚠️ Not caching workflow ${workflowKey.slice(0, 12)}: at least one extraction came back empty`);
        }

        const reportFile = await this.archive(report, workflowKey);
        console.log(`✅ Workflow ${workflowKey.slice(0, 12)}: ${report.summary.passed}/${report.summary.totalChecks} checks passed`);

        return { report, cached: false, workflowKey, files: resolved, forced: force, reportFile };
    }

    /**
     * Clears every document-cache entry for each file's content (all roles),
     * then recomputes the workflow with force.
     */
    async reverify(files: WorkflowFiles): Promise<WorkflowResult> {
        if (!files.bl || !files.invoice) {
            throw new InputError("At least BL and Invoice are required");
        }

        for (const [role, filePath] of Object.entries(files)) {
            if (!filePath) continue;
            await ensureReadable(filePath);
            if (await this.deps.documentCache.delete(await hashFile(filePath))) {
                console.log(`♻️ Cache cleared for ${role}`);
            }
        }

        return this.processWorkflow(files, { force: true });
    }

    private async extractHashed(
        filePath: string,
        contentHash: string,
        role: DocumentRole,
        force: boolean
    ): Promise<ShipmentRecord> {
        const { documentCache, extractor } = this.deps;

        let staleEntry = false;
        if (!force) {
            const cached = await documentCache.get(contentHash, role);
            if (cached) {
                console.log(`📦 Document cache HIT (${role})`);
                return cached;
            }
        } else {
            staleEntry = !(await documentCache.delete(contentHash, role));
        }

        console.log(`🤖 Extracting (${role}) force=${force}`);
        const parsed = ShipmentRecordSchema.safeParse(await extractor.extract(filePath, role));
        const record = parsed.success ? parsed.data : failedRecord("Extractor returned an invalid record");

        if (isMeaningfulExtraction(record)) {
            await documentCache.put(contentHash, role, path.basename(filePath), record);
        } else if (staleEntry && !(await documentCache.delete(contentHash, role))) {
            console.warn(`⚠️ Overwriting undeletable ${role} cache entry with the new extraction`);
            await documentCache.put(contentHash, role, path.basename(filePath), record);
        } else {
            console.warn(`⚠️ Extraction for ${role} has no usable fields (${record.extractionMethod ?? "no method"}), not caching`);
        }
        return record;
    }

    private async validateCnpj(bl: ShipmentRecord, invoice: ShipmentRecord): Promise<CnpjValidation | null> {
        const [source, cnpj]: [DocumentRole, string | null] = bl.taxId ? ["bl", bl.taxId] : ["invoice", invoice.taxId];
        if (!cnpj) return null;

        const validation: CnpjValidation = {
            cnpj: formatCnpj(cnpj),
            source,
            valid: validateCnpj(cnpj),
        };
        if (validation.valid && this.deps.registry) {
            validation.registry = await this.deps.registry.lookup(cnpj);
        }
        return validation;
    }

    private async archive(report: VerificationReport, workflowKey: string): Promise<string | null> {
        if (!this.deps.archive) return null;
        try {
            return await this.deps.archive.save(report, workflowKey);
        } catch (err) {
            console.error(`❌ Could not archive report: ${errorMessage(err)}`);
            return null;
        }
    }
}
