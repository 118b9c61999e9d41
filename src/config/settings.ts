import { z } from "zod";
import type { CacheConfig } from "../lib/cache/store";
import type { ProviderKeys } from "../lib/intelligence/llm";

export const APP_VERSION = "2.0.0";

const flag = (fallback: boolean) =>
    z.string().optional().transform(v => (v === undefined || v.trim() === "" ? fallback : v.trim().toLowerCase() === "true"));

const wholeNumber = (fallback: number) =>
    z.string().optional().transform((v, ctx) => {
        if (v === undefined || v.trim() === "") return fallback;
        const n = Number(v);
        if (!Number.isInteger(n) || n < 0) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a non-negative integer, got "${v}"` });
            return z.NEVER;
        }
        return n;
    });

const optionalText = z.string().optional().transform(v => (v && v.trim() ? v.trim() : undefined));

const EnvSchema = z.object({
    CACHE_ENABLED: flag(true),
    CACHE_TTL_DAYS: wholeNumber(0),
    GOOGLE_GENERATIVE_AI_API_KEY: optionalText,
    GEMINI_API_KEY: optionalText,
    OPENAI_API_KEY: optionalText,
    ANTHROPIC_API_KEY: optionalText,
    NEXT_PUBLIC_SUPABASE_URL: optionalText,
    SUPABASE_SERVICE_ROLE_KEY: optionalText,
    UPLOAD_DIR: optionalText,
    REPORTS_DIR: optionalText,
    MAX_UPLOAD_MB: wholeNumber(20),
    CNPJ_REGISTRY_LOOKUP: flag(false),
});

export interface Settings {
    cache: CacheConfig;
    providerKeys: ProviderKeys;
    supabase: { url: string; serviceKey: string } | null;
    uploadDir: string;
    reportsDir: string;
    maxUploadBytes: number;
    cnpjRegistryLookup: boolean;
}

export function loadSettings(env: Record<string, string | undefined> = process.env): Settings {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
        throw new Error(`Invalid configuration: ${issues}`);
    }
    const e = parsed.data;

    return {
        cache: { enabled: e.CACHE_ENABLED, ttlDays: e.CACHE_TTL_DAYS },
        providerKeys: {
            google: e.GOOGLE_GENERATIVE_AI_API_KEY ?? e.GEMINI_API_KEY,
            openai: e.OPENAI_API_KEY,
            anthropic: e.ANTHROPIC_API_KEY,
        },
        supabase: e.NEXT_PUBLIC_SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY
            ? { url: e.NEXT_PUBLIC_SUPABASE_URL, serviceKey: e.SUPABASE_SERVICE_ROLE_KEY }
            : null,
        uploadDir: e.UPLOAD_DIR ?? "uploads",
        reportsDir: e.REPORTS_DIR ?? "outputs",
        maxUploadBytes: e.MAX_UPLOAD_MB * 1024 * 1024,
        cnpjRegistryLookup: e.CNPJ_REGISTRY_LOOKUP,
    };
}
