import { json, jsonError, saveWorkflowUploads } from "@/lib/http/route-helpers";
import { getVerificationService } from "@/lib/verification/service";

export const runtime = "nodejs";

/**
 * Multipart: bl, invoice, packing (optional).
 * ?force=1 skips both caches, recomputes and overwrites them.
 */
export async function POST(req: Request) {
    try {
        const { verifier, uploads, aiEnabled } = getVerificationService();
        if (!aiEnabled) {
            return json({ error: "AI extractor not initialized. Set an extraction provider API key." }, 503);
        }

        const force = ["1", "true"].includes(new URL(req.url).searchParams.get("force") ?? "0");
        const files = await saveWorkflowUploads(await req.formData(), uploads);
        const result = await verifier.processWorkflow(files, { force });

        return json({
            success: true,
            report: result.report,
            reportFile: result.reportFile,
            cached: result.cached,
            workflowHash: result.workflowKey,
            files: result.files,
            forced: result.forced,
        });
    } catch (err) {
        return jsonError(err, "Workflow failed");
    }
}
