import { json, jsonError, parseRole, readFormFile } from "@/lib/http/route-helpers";
import { getVerificationService } from "@/lib/verification/service";

export const runtime = "nodejs";

export async function POST(req: Request) {
    try {
        const form = await req.formData();
        const file = await readFormFile(form, "file");
        if (!file) return json({ error: "No file provided" }, 400);

        const role = parseRole(form.get("doc_type"));
        const stored = await getVerificationService().uploads.save(file, role);

        return json({
            success: true,
            filename: stored.filename,
            originalName: stored.originalName,
            docType: stored.role,
            size: stored.size,
            path: stored.path,
        });
    } catch (err) {
        return jsonError(err, "Upload error");
    }
}
