import { DocumentRoleSchema, type DocumentRole } from "../extraction/shipment-schema";
import { errorMessage, InputError, VerificationError } from "../errors";
import type { IncomingFile, UploadStore } from "../storage/upload-store";
import type { WorkflowFiles } from "../verification/workflow";

export function json(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { "content-type": "application/json" },
    });
}

/** Known errors keep their status; anything else is logged and becomes a 500. */
export function jsonError(err: unknown, context: string): Response {
    if (err instanceof VerificationError) {
        return json({ error: err.message }, err.status);
    }
    console.error(`❌ ${context}: ${errorMessage(err)}`);
    return json({ error: errorMessage(err) }, 500);
}

export function parseRole(value: unknown): DocumentRole {
    const parsed = DocumentRoleSchema.safeParse(value ?? "unknown");
    if (!parsed.success) {
        throw new InputError(`Unknown doc_type. Expected one of: ${DocumentRoleSchema.options.join(", ")}`);
    }
    return parsed.data;
}

export async function readFormFile(form: FormData, key: string): Promise<IncomingFile | null> {
    const entry = form.get(key);
    if (entry === null || typeof entry === "string" || !entry.name) return null;
    return { name: entry.name, bytes: new Uint8Array(await entry.arrayBuffer()) };
}

const WORKFLOW_ROLES = ["bl", "invoice", "packing"] as const;

/**
 * Reads the bl / invoice / packing parts of a multipart form and stores them.
 * Every part is validated before the first one is written.
 */
export async function saveWorkflowUploads(form: FormData, uploads: UploadStore): Promise<WorkflowFiles> {
    const incoming: Array<[typeof WORKFLOW_ROLES[number], IncomingFile]> = [];
    for (const role of WORKFLOW_ROLES) {
        const file = await readFormFile(form, role);
        if (file) incoming.push([role, file]);
    }

    const roles = incoming.map(([role]) => role);
    if (!roles.includes("bl") || !roles.includes("invoice")) {
        throw new InputError("At least BL and Invoice are required");
    }

    const files: WorkflowFiles = {};
    for (const [, file] of incoming) {
        uploads.check(file);
    }
    for (const [role, file] of incoming) {
        files[role] = (await uploads.save(file, role)).path;
    }
    return files;
}
