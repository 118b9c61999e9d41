import { json, jsonError, saveWorkflowUploads } from "@/lib/http/route-helpers";
import { getVerificationService } from "@/lib/verification/service";

export const runtime = "nodejs";

/** Like process-complete with force, but also drops every cached extraction of each file. */
export async function POST(req: Request) {
    try {
        const { verifier, uploads, aiEnabled } = getVerificationService();
        if (!aiEnabled) {
            return json({ error: "AI extractor not initialized. Set an extraction provider API key." }, 503);
        }

        console.log("🔄 Starting reverification");
        const files = await saveWorkflowUploads(await req.formData(), uploads);
        const result = await verifier.reverify(files);

        return json({
            success: true,
            report: result.report,
            reportFile: result.reportFile,
            workflowHash: result.workflowKey,
            files: result.files,
        });
    } catch (err) {
        return jsonError(err, "Reverification failed");
    }
}
