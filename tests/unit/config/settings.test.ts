import { describe, expect, it } from 'vitest';
import { loadSettings } from '@/config/settings';

describe('loadSettings', () => {
    it('applies defaults to an empty environment', () => {
        expect(loadSettings({})).toEqual({
            cache: { enabled: true, ttlDays: 0 },
            providerKeys: { google: undefined, openai: undefined, anthropic: undefined },
            supabase: null,
            uploadDir: 'uploads',
            reportsDir: 'outputs',
            maxUploadBytes: 20 * 1024 * 1024,
            cnpjRegistryLookup: false,
        });
    });

    it('reads cache and upload settings', () => {
        const settings = loadSettings({
            CACHE_ENABLED: 'False',
            CACHE_TTL_DAYS: '90',
            MAX_UPLOAD_MB: '5',
            CNPJ_REGISTRY_LOOKUP: 'true',
        });

        expect(settings.cache).toEqual({ enabled: false, ttlDays: 90 });
        expect(settings.maxUploadBytes).toBe(5 * 1024 * 1024);
        expect(settings.cnpjRegistryLookup).toBe(true);
    });

    it('falls back to GEMINI_API_KEY for Google', () => {
        expect(loadSettings({ GEMINI_API_KEY: 'test-key' }).providerKeys.google).toBe('test-key');
        expect(loadSettings({ GOOGLE_GENERATIVE_AI_API_KEY: 'test-key-a', GEMINI_API_KEY: 'test-key-b' }).providerKeys.google).toBe('test-key-a');
    });

    it('needs both Supabase variables', () => {
        expect(loadSettings({ NEXT_PUBLIC_SUPABASE_URL: 'http://localhost:54321' }).supabase).toBeNull();
        expect(loadSettings({
            NEXT_PUBLIC_SUPABASE_URL: 'http://localhost:54321',
            SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
        }).supabase).toEqual({ url: 'http://localhost:54321', serviceKey: 'test-secret' });
    });

    it('rejects a malformed TTL', () => {
        expect(() => loadSettings({ CACHE_TTL_DAYS: 'ninety' })).toThrow(
            'Invalid configuration: CACHE_TTL_DAYS: expected a non-negative integer, got "ninety"'
        );
    });
});
