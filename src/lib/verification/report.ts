import { z } from "zod";
import { DocumentRoleSchema, ShipmentRecordSchema } from "../extraction/shipment-schema";
import { ComparisonReportSchema, type ComparisonReport } from "../matching/shipment-comparator";
import { RegistryResultSchema } from "../compliance/cnpj-registry";

export const CnpjValidationSchema = z.object({
    cnpj: z.string(),
    source: DocumentRoleSchema,
    valid: z.boolean(),
    registry: RegistryResultSchema.optional(),
});

export type CnpjValidation = z.infer<typeof CnpjValidationSchema>;

export const VerificationReportSchema = z.object({
    timestamp: z.string(),
    documentsProcessed: z.array(DocumentRoleSchema),
    extractedData: z.object({
        bl: ShipmentRecordSchema,
        invoice: ShipmentRecordSchema,
        packing: ShipmentRecordSchema.optional(),
    }),
    cnpjValidation: CnpjValidationSchema.nullable(),
    comparison: ComparisonReportSchema,
    summary: z.object({
        totalChecks: z.number().int(),
        passed: z.number().int(),
        failed: z.number().int(),
        successRate: z.string(),
    }),
});

export type VerificationReport = z.infer<typeof VerificationReportSchema>;

export function summarize(comparison: ComparisonReport): VerificationReport["summary"] {
    return {
        totalChecks: comparison.totalChecks,
        passed: comparison.passed,
        failed: comparison.failed,
        successRate: comparison.totalChecks
            ? `${((comparison.passed / comparison.totalChecks) * 100).toFixed(1)}%`
            : "N/A",
    };
}
