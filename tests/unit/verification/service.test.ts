import { describe, expect, it, vi } from 'vitest';
import { loadSettings } from '@/config/settings';
import { buildVerificationService } from '@/lib/verification/service';

describe('buildVerificationService', () => {
    it('falls back to the in-memory cache store and says it is not persistent', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

        const service = buildVerificationService(loadSettings({ GEMINI_API_KEY: 'test-key' }));

        expect(service.cacheStore.name).toBe('memory');
        expect(service.aiEnabled).toBe(true);
        expect(warn).toHaveBeenCalledWith('⚠️ Supabase not configured, caches live in process memory and are lost on restart');
    });

    it('reports extraction as unavailable without provider keys', () => {
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        expect(buildVerificationService(loadSettings({})).aiEnabled).toBe(false);
    });
});
