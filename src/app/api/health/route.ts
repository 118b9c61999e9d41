import { APP_VERSION } from "@/config/settings";
import { json } from "@/lib/http/route-helpers";
import { getVerificationService } from "@/lib/verification/service";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
    const { aiEnabled, settings } = getVerificationService();
    return json({
        ok: true,
        timestamp: new Date().toISOString(),
        aiEnabled,
        cacheEnabled: settings.cache.enabled,
        version: APP_VERSION,
    });
}
