import { z } from "zod";
import { DocumentRoleSchema } from "@/lib/extraction/shipment-schema";
import { json, jsonError } from "@/lib/http/route-helpers";
import { getVerificationService } from "@/lib/verification/service";

export const runtime = "nodejs";

const ExtractRequestSchema = z.object({
    filepath: z.string().min(1, "No filepath provided").optional(),
    doc_type: DocumentRoleSchema.default("unknown"),
    force: z.boolean().default(false),
});

export async function POST(req: Request) {
    try {
        const { verifier, uploads, aiEnabled } = getVerificationService();
        if (!aiEnabled) {
            return json({ error: "AI extractor not initialized. Set an extraction provider API key." }, 503);
        }

        const body: unknown = await req.json().catch(() => ({}));
        const parsed = ExtractRequestSchema.safeParse(body);
        if (!parsed.success) {
            return json({ error: parsed.error.issues.map(i => i.message).join("; ") }, 400);
        }

        const { filepath, doc_type: docType, force } = parsed.data;
        if (!filepath) return json({ error: "No filepath provided" }, 400);

        const data = await verifier.extractOne(uploads.resolve(filepath), docType, force);
        return json({ success: true, docType, data });
    } catch (err) {
        return jsonError(err, "Extraction error");
    }
}
