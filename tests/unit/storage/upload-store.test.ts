import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { InputError, PayloadTooLargeError } from '@/lib/errors';
import { isAllowedFile, sanitizeFilename, UploadStore } from '@/lib/storage/upload-store';

const bytes = (text: string) => new TextEncoder().encode(text);

describe('isAllowedFile', () => {
    it('accepts the supported document types in any case', () => {
        expect(isAllowedFile('bl.pdf')).toBe(true);
        expect(isAllowedFile('PACKING.XLSX')).toBe(true);
        expect(isAllowedFile('scan.jpeg')).toBe(true);
    });

    it('rejects everything else', () => {
        expect(isAllowedFile('notes.txt')).toBe(false);
        expect(isAllowedFile('pdf')).toBe(false);
    });
});

describe('sanitizeFilename', () => {
    it('strips directories and unsafe characters', () => {
        expect(sanitizeFilename('../../etc/passwd.pdf')).toBe('passwd.pdf');
        expect(sanitizeFilename('Invoice #42 (final).pdf')).toBe('Invoice__42__final_.pdf');
    });
});

describe('UploadStore', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'uploads-'));
        vi.spyOn(console, 'log').mockImplementation(() => {});
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('stores the file under a timestamped, role-tagged name', async () => {
        vi.spyOn(Date, 'now').mockReturnValue(1767225600000);
        const store = new UploadStore(path.join(dir, 'nested'), 1024);

        const stored = await store.save({ name: 'BL 001.pdf', bytes: bytes('pdf bytes') }, 'bl');

        expect(stored).toEqual({
            filename: '1767225600000_bl_BL_001.pdf',
            originalName: 'BL_001.pdf',
            role: 'bl',
            size: 9,
            path: path.join(dir, 'nested', '1767225600000_bl_BL_001.pdf'),
        });
        expect(await readFile(stored.path, 'utf8')).toBe('pdf bytes');
    });

    it('rejects a file without a name', () => {
        const store = new UploadStore(dir, 1024);
        expect(() => store.check({ name: '', bytes: bytes('x') })).toThrow('No file selected');
    });

    it('rejects unsupported types', () => {
        const store = new UploadStore(dir, 1024);
        expect(() => store.check({ name: 'notes.txt', bytes: bytes('x') })).toThrow(InputError);
        expect(() => store.check({ name: 'notes.txt', bytes: bytes('x') })).toThrow(
            'File type not allowed. Supported: pdf, xlsx, xls, jpg, jpeg, png'
        );
    });

    it('resolves paths inside the upload directory only', () => {
        const store = new UploadStore(path.join(dir, 'uploads'), 1024);

        expect(store.resolve(path.join(dir, 'uploads', '1_bl_bl.pdf'))).toBe(path.join(dir, 'uploads', '1_bl_bl.pdf'));
        expect(() => store.resolve(path.join(dir, 'secret.pdf'))).toThrow('filepath must point to an uploaded file');
        expect(() => store.resolve(path.join(dir, 'uploads', '..', 'secret.pdf'))).toThrow(InputError);
        expect(() => store.resolve(path.join(dir, 'uploads'))).toThrow(InputError);
    });

    it('rejects files above the size limit', async () => {
        const store = new UploadStore(dir, 2 * 1024 * 1024);
        const big = { name: 'scan.png', bytes: new Uint8Array(2 * 1024 * 1024 + 1) };

        await expect(store.save(big, 'invoice')).rejects.toThrow(PayloadTooLargeError);
        await expect(store.save(big, 'invoice')).rejects.toThrow('File too large. Maximum size: 2MB');
    });
});
