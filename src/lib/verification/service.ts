import { loadSettings, type Settings } from "../../config/settings";
import { DocumentCache } from "../cache/document-cache";
import { MemoryCacheStore } from "../cache/memory-store";
import type { CacheStore } from "../cache/store";
import { SupabaseCacheStore } from "../cache/supabase-store";
import { WorkflowCache } from "../cache/workflow-cache";
import { ReceitaWsRegistry } from "../compliance/cnpj-registry";
import { getProviderChain } from "../intelligence/llm";
import { ModelDocumentExtractor } from "../extraction/shipment-extractor";
import { ReportArchive } from "../storage/report-archive";
import { UploadStore } from "../storage/upload-store";
import { createClient } from "../supabase";
import { DocumentVerifier } from "./workflow";

export interface VerificationService {
    settings: Settings;
    verifier: DocumentVerifier;
    uploads: UploadStore;
    archive: ReportArchive;
    cacheStore: CacheStore;
    aiEnabled: boolean;
}

let service: VerificationService | null = null;

function createCacheStore(settings: Settings): CacheStore {
    const client = settings.supabase
        ? createClient(settings.supabase.url, settings.supabase.serviceKey)
        : null;
    if (client) return new SupabaseCacheStore(client);

    console.warn("⚠️ Supabase not configured, caches live in process memory and are lost on restart");
    return new MemoryCacheStore();
}

/** Wires the pipeline from settings. Both caches share one store and one config object. */
export function buildVerificationService(settings: Settings): VerificationService {
    const cacheStore = createCacheStore(settings);
    const archive = new ReportArchive(settings.reportsDir);

    const verifier = new DocumentVerifier({
        extractor: new ModelDocumentExtractor({ keys: settings.providerKeys }),
        documentCache: new DocumentCache(cacheStore, settings.cache),
        workflowCache: new WorkflowCache(cacheStore, settings.cache),
        archive,
        registry: settings.cnpjRegistryLookup ? new ReceitaWsRegistry() : undefined,
    });

    return {
        settings,
        verifier,
        uploads: new UploadStore(settings.uploadDir, settings.maxUploadBytes),
        archive,
        cacheStore,
        aiEnabled: getProviderChain(settings.providerKeys).length > 0,
    };
}

export function getVerificationService(): VerificationService {
    if (!service) {
        service = buildVerificationService(loadSettings());
        const cache = service.settings.cache;
        console.log(`🚀 Verifier ready, AI: ${service.aiEnabled ? "✅" : "❌ no provider key"}, cache: ${cache.enabled ? `✅ ${service.cacheStore.name}, TTL ${cache.ttlDays || "∞"}d` : "❌ disabled"}`);
    }
    return service;
}
