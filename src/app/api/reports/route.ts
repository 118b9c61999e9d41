import { json, jsonError } from "@/lib/http/route-helpers";
import { getVerificationService } from "@/lib/verification/service";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
    try {
        const reports = await getVerificationService().archive.list();
        return json({ success: true, reports, count: reports.length });
    } catch (err) {
        return jsonError(err, "List reports error");
    }
}
