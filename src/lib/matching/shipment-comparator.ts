/**
 * @file    shipment-comparator.ts
 * @purpose Cross-checks the fields extracted from a Bill of Lading, Commercial
 *          Invoice and (optional) Packing List before customs filing.
 * @deps    extraction/shipment-schema, zod
 *
 * DECISION: Numeric tolerance is measured against the mean of all collected
 * values, not against a designated source document. No document is marked as
 * authoritative in the extracted data, so the check stays symmetric.
 */

import { z } from "zod";
import {
    DocumentRoleSchema,
    type DocumentRole,
    type ShipmentRecord,
} from "../extraction/shipment-schema";

export const WEIGHT_TOLERANCE = 0.02;
export const VOLUME_TOLERANCE = 0.02;

export const ComparedFieldSchema = z.enum([
    "shipperName",
    "consignee",
    "taxId",
    "classificationCodeNarrow",
    "classificationCodeWide",
    "packageCount",
    "grossWeightKg",
    "volumeCbm",
]);

export type ComparedField = z.infer<typeof ComparedFieldSchema>;

export const FieldCheckSchema = z.object({
    field: z.string(),
    key: ComparedFieldSchema,
    values: z.record(DocumentRoleSchema, z.union([z.string(), z.number()])),
    status: z.enum(["match", "mismatch"]),
});

export type FieldCheck = z.infer<typeof FieldCheckSchema>;

export const ComparisonReportSchema = z.object({
    totalChecks: z.number().int(),
    passed: z.number().int(),
    failed: z.number().int(),
    warnings: z.number().int(),
    details: z.array(FieldCheckSchema),
});

export type ComparisonReport = z.infer<typeof ComparisonReportSchema>;

type FieldRule = {
    field: string;
    key: ComparedField;
    includesPacking: boolean;
    // Classification codes must appear on both BL and Invoice
    requireBlAndInvoice?: boolean;
} & (
    | { type: "text" }
    | { type: "taxId" }
    | { type: "numeric"; tolerance: number }
);

// Evaluation order is the order of `details` in the report.
const FIELD_RULES: FieldRule[] = [
    { field: "Shipper Name", key: "shipperName", type: "text", includesPacking: false },
    { field: "Consignee", key: "consignee", type: "text", includesPacking: true },
    { field: "CNPJ", key: "taxId", type: "taxId", includesPacking: false },
    { field: "NCM 4 Digits", key: "classificationCodeNarrow", type: "text", includesPacking: false, requireBlAndInvoice: true },
    { field: "NCM 8 Digits", key: "classificationCodeWide", type: "text", includesPacking: false, requireBlAndInvoice: true },
    { field: "Number of Packages", key: "packageCount", type: "numeric", tolerance: 0, includesPacking: true },
    { field: "Gross Weight (kg)", key: "grossWeightKg", type: "numeric", tolerance: WEIGHT_TOLERANCE, includesPacking: true },
    { field: "CBM (m³)", key: "volumeCbm", type: "numeric", tolerance: VOLUME_TOLERANCE, includesPacking: true },
];

export function compareText(values: Array<string | number>): boolean {
    const normalized = new Set(values.map(v => String(v).trim().toLowerCase()));
    return normalized.size === 1;
}

export function compareTaxId(values: Array<string | number>): boolean {
    const cleaned = new Set(values.map(v => String(v).replace(/\D/g, "")));
    return cleaned.size === 1;
}

export function compareNumeric(values: Array<string | number>, tolerance: number): boolean {
    const nums = values.map(v => (typeof v === "number" ? v : Number(v)));
    if (!nums.length || nums.some(n => Number.isNaN(n))) return false;

    if (tolerance === 0) {
        return new Set(nums).size === 1;
    }

    const mean = nums.reduce((sum, n) => sum + n, 0) / nums.length;
    if (mean === 0) return nums.every(n => n === 0);
    return nums.every(n => Math.abs(n - mean) / Math.abs(mean) <= tolerance);
}

function evaluate(rule: FieldRule, values: Array<string | number>): boolean {
    switch (rule.type) {
        case "text":
            return compareText(values);
        case "taxId":
            return compareTaxId(values);
        case "numeric":
            return compareNumeric(values, rule.tolerance);
    }
}

/**
 * Compares each field independently. A field nobody supplied is skipped and
 * does not count toward the totals; a classification code missing from either
 * the BL or the Invoice is a failed check.
 */
export function compareShipmentDocuments(
    bl: ShipmentRecord,
    invoice: ShipmentRecord,
    packing?: ShipmentRecord | null
): ComparisonReport {
    const report: ComparisonReport = {
        totalChecks: 0,
        passed: 0,
        failed: 0,
        warnings: 0,
        details: [],
    };

    for (const rule of FIELD_RULES) {
        const docs: Array<[DocumentRole, ShipmentRecord]> = [["bl", bl], ["invoice", invoice]];
        if (rule.includesPacking && packing) docs.push(["packing", packing]);

        const values: Partial<Record<DocumentRole, string | number>> = {};
        const collected: Array<string | number> = [];
        for (const [role, doc] of docs) {
            const value = doc[rule.key];
            if (value === null) continue;
            values[role] = value;
            collected.push(value);
        }

        if (!collected.length) continue;

        const match = rule.requireBlAndInvoice && (values.bl === undefined || values.invoice === undefined)
            ? false
            : evaluate(rule, collected);

        report.totalChecks += 1;
        if (match) report.passed += 1;
        else report.failed += 1;

        report.details.push({
            field: rule.field,
            key: rule.key,
            values,
            status: match ? "match" : "mismatch",
        });
    }

    return report;
}
