import { describe, expect, it } from 'vitest';
import { emptyRecord, type ShipmentRecord } from '@/lib/extraction/shipment-schema';
import {
    compareNumeric,
    compareShipmentDocuments,
    compareTaxId,
    compareText,
} from '@/lib/matching/shipment-comparator';

function record(fields: Partial<ShipmentRecord>): ShipmentRecord {
    return { ...emptyRecord('AI Vision (PDF)', 0.9), ...fields };
}

describe('compareNumeric', () => {
    it('matches values within 2% of their mean', () => {
        expect(compareNumeric([100, 101, 102], 0.02)).toBe(true);
    });

    it('rejects a value more than 2% away from the mean', () => {
        expect(compareNumeric([100, 110], 0.02)).toBe(false);
    });

    it('requires exact equality at zero tolerance', () => {
        expect(compareNumeric([10, 10, 10], 0)).toBe(true);
        expect(compareNumeric([10, 10, 11], 0)).toBe(false);
    });

    it('matches a zero mean only when every value is zero', () => {
        expect(compareNumeric([0, 0], 0.02)).toBe(true);
        expect(compareNumeric([-1, 1], 0.02)).toBe(false);
    });

    it('fails on values that are not numbers', () => {
        expect(compareNumeric([10, 'ten'], 0.02)).toBe(false);
    });
});

describe('compareText / compareTaxId', () => {
    it('ignores case and surrounding whitespace', () => {
        expect(compareText(['ACME LTDA', ' acme ltda '])).toBe(true);
        expect(compareText(['ACME LTDA', 'ACME SA'])).toBe(false);
    });

    it('compares tax ids by digits only', () => {
        expect(compareTaxId(['11.222.333/0001-81', '11222333000181'])).toBe(true);
        expect(compareTaxId(['11222333000181', '11444777000161'])).toBe(false);
    });
});

describe('compareShipmentDocuments', () => {
    it('lists checks in field order and counts them', () => {
        const bl = record({ shipperName: 'ACME LTDA', consignee: 'Importadora Sul', grossWeightKg: 100 });
        const invoice = record({ shipperName: 'acme ltda', consignee: 'Importadora Sul', grossWeightKg: 101 });
        const packing = record({ consignee: 'Importadora Sul', grossWeightKg: 102 });

        const report = compareShipmentDocuments(bl, invoice, packing);

        expect(report.details.map(d => d.field)).toEqual(['Shipper Name', 'Consignee', 'Gross Weight (kg)']);
        expect(report.details.every(d => d.status === 'match')).toBe(true);
        expect(report).toMatchObject({ totalChecks: 3, passed: 3, failed: 0, warnings: 0 });
        expect(report.details[2].values).toEqual({ bl: 100, invoice: 101, packing: 102 });
    });

    it('never compares the shipper name against the packing list', () => {
        const report = compareShipmentDocuments(
            record({ shipperName: 'ACME LTDA' }),
            record({ shipperName: 'ACME LTDA' }),
            record({ shipperName: 'Other Exporter' })
        );
        expect(report.details).toEqual([
            { field: 'Shipper Name', key: 'shipperName', values: { bl: 'ACME LTDA', invoice: 'ACME LTDA' }, status: 'match' },
        ]);
    });

    it('flags a weight outside tolerance', () => {
        const report = compareShipmentDocuments(record({ grossWeightKg: 100 }), record({ grossWeightKg: 110 }));
        expect(report.details).toEqual([
            { field: 'Gross Weight (kg)', key: 'grossWeightKg', values: { bl: 100, invoice: 110 }, status: 'mismatch' },
        ]);
        expect(report).toMatchObject({ totalChecks: 1, passed: 0, failed: 1 });
    });

    it('counts a classification code present on only one of BL and Invoice as a mismatch', () => {
        const report = compareShipmentDocuments(
            record({ classificationCodeNarrow: '8471' }),
            record({})
        );
        expect(report.details).toEqual([
            { field: 'NCM 4 Digits', key: 'classificationCodeNarrow', values: { bl: '8471' }, status: 'mismatch' },
        ]);
        expect(report).toMatchObject({ totalChecks: 1, passed: 0, failed: 1 });
    });

    it('runs a single-value check for other fields supplied by one document', () => {
        const report = compareShipmentDocuments(record({ packageCount: 12 }), record({}));
        expect(report.details).toEqual([
            { field: 'Number of Packages', key: 'packageCount', values: { bl: 12 }, status: 'match' },
        ]);
    });

    it('skips fields that no document supplied', () => {
        const report = compareShipmentDocuments(record({}), record({}), record({}));
        expect(report).toEqual({ totalChecks: 0, passed: 0, failed: 0, warnings: 0, details: [] });
    });

    it('requires equal package counts across all three documents', () => {
        const report = compareShipmentDocuments(
            record({ packageCount: 10 }),
            record({ packageCount: 10 }),
            record({ packageCount: 11 })
        );
        expect(report.details[0]).toMatchObject({ field: 'Number of Packages', status: 'mismatch' });
    });

    it('compares the CNPJ by digits', () => {
        const report = compareShipmentDocuments(
            record({ taxId: '11222333000181' }),
            record({ taxId: '11222333000181' })
        );
        expect(report.details[0]).toMatchObject({ field: 'CNPJ', status: 'match' });
    });
});
