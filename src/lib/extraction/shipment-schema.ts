import { z } from "zod";

export const DocumentRoleSchema = z.enum(["bl", "invoice", "packing", "unknown"]);

export type DocumentRole = z.infer<typeof DocumentRoleSchema>;

// Field set extracted from one document. Every field is independently nullable.
export const ShipmentRecordSchema = z.object({
    shipperName: z.string().nullable(),
    consignee: z.string().nullable(),
    taxId: z.string().nullable(),               // CNPJ, digits only
    localization: z.string().nullable(),        // "City, State"
    classificationCodeNarrow: z.string().nullable(),  // 4-digit NCM headings, "/"-joined
    classificationCodeWide: z.string().nullable(),    // 8-digit NCM codes, "/"-joined
    packageCount: z.number().int().nullable(),
    grossWeightKg: z.number().nullable(),
    volumeCbm: z.number().nullable(),
    rawExcerpt: z.string().nullable(),
    extractionMethod: z.string().nullable(),
    confidence: z.number().nullable(),
});

export type ShipmentRecord = z.infer<typeof ShipmentRecordSchema>;

const looseNumber = z.union([z.number(), z.string()]).nullable().optional();
const looseText = z.string().nullable().optional();

/**
 * Shape the extraction prompt asks the model for. Kept loose (numbers may come
 * back as strings) and normalized by `toShipmentRecord`.
 */
export const ModelReplySchema = z.object({
    shipper_name: looseText,
    consignee: looseText,
    cnpj: looseText,
    localization: looseText,
    ncm_4d: looseText,
    ncm_8d: looseText,
    packages: looseNumber,
    gross_weight: looseNumber,
    cbm: looseNumber,
});

export type ModelReply = z.infer<typeof ModelReplySchema>;

const DATA_FIELDS = [
    "shipperName",
    "consignee",
    "taxId",
    "localization",
    "classificationCodeNarrow",
    "classificationCodeWide",
    "packageCount",
    "grossWeightKg",
    "volumeCbm",
] as const;

export function emptyRecord(extractionMethod: string | null = null, confidence: number | null = null): ShipmentRecord {
    return {
        shipperName: null,
        consignee: null,
        taxId: null,
        localization: null,
        classificationCodeNarrow: null,
        classificationCodeWide: null,
        packageCount: null,
        grossWeightKg: null,
        volumeCbm: null,
        rawExcerpt: null,
        extractionMethod,
        confidence,
    };
}

/** Record returned when extraction fails: all data fields null, confidence 0. */
export function failedRecord(reason: string): ShipmentRecord {
    return emptyRecord(reason, 0);
}

/** True when at least one data field carries a usable value. */
export function isMeaningfulExtraction(record: ShipmentRecord): boolean {
    return DATA_FIELDS.some(key => {
        const value = record[key];
        if (value === null) return false;
        if (typeof value === "string") return value.trim() !== "";
        return true;
    });
}

// ──────────────────────────────────────────────────
// NORMALIZATION OF MODEL OUTPUT
// ──────────────────────────────────────────────────

export function normalizeText(value: string | null | undefined): string | null {
    if (value === null || value === undefined) return null;
    const collapsed = value.replace(/\s+/g, " ").trim();
    return collapsed === "" ? null : collapsed;
}

/** Digits only; anything other than exactly 14 digits is dropped. */
export function normalizeTaxId(value: string | null | undefined): string | null {
    if (!value) return null;
    const digits = value.replace(/\D/g, "");
    return digits.length === 14 ? digits : null;
}

/**
 * Splits a code list on "/", ",", ";" or line breaks, keeps digits, truncates
 * each code to `width` and drops codes shorter than that. Distinct values keep
 * their first-seen order.
 */
export function normalizeClassificationCodes(value: string | null | undefined, width: number): string | null {
    if (!value) return null;
    const codes: string[] = [];
    for (const part of value.split(/[\/,;\n]+/)) {
        const digits = part.replace(/\D/g, "");
        if (digits.length < width) continue;
        const code = digits.slice(0, width);
        if (!codes.includes(code)) codes.push(code);
    }
    return codes.length ? codes.join("/") : null;
}

function parseDecimal(value: number | string | null | undefined): number | null {
    if (value === null || value === undefined) return null;
    if (typeof value === "number") return Number.isFinite(value) ? value : null;

    let text = value.replace(/\s/g, "");
    if (/^-?\d+,\d+$/.test(text)) text = text.replace(",", ".");
    if (!/^-?\d+(\.\d+)?$/.test(text)) return null;
    return Number(text);
}

/** Zero and unparseable values are treated as absent. */
export function normalizeMeasure(value: number | string | null | undefined): number | null {
    const parsed = parseDecimal(value);
    return parsed ? parsed : null;
}

export function normalizeCount(value: number | string | null | undefined): number | null {
    const parsed = normalizeMeasure(value);
    return parsed === null ? null : Math.trunc(parsed);
}

export function toShipmentRecord(
    reply: ModelReply,
    meta: { extractionMethod: string; confidence: number; rawExcerpt: string | null }
): ShipmentRecord {
    return {
        shipperName: normalizeText(reply.shipper_name),
        consignee: normalizeText(reply.consignee),
        taxId: normalizeTaxId(reply.cnpj),
        localization: normalizeText(reply.localization),
        classificationCodeNarrow: normalizeClassificationCodes(reply.ncm_4d, 4),
        classificationCodeWide: normalizeClassificationCodes(reply.ncm_8d, 8),
        packageCount: normalizeCount(reply.packages),
        grossWeightKg: normalizeMeasure(reply.gross_weight),
        volumeCbm: normalizeMeasure(reply.cbm),
        rawExcerpt: meta.rawExcerpt,
        extractionMethod: meta.extractionMethod,
        confidence: meta.confidence,
    };
}
