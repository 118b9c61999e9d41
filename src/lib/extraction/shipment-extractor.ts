/**
 * @file    shipment-extractor.ts
 * @purpose Turns one shipping document (PDF, image or spreadsheet) into a
 *          ShipmentRecord through the LLM fallback chain.
 * @deps    intelligence/llm, extraction/spreadsheet, ai
 *
 * DECISION: extract() never rejects. Any failure comes back as a record with
 * every data field null, confidence 0 and the reason in extractionMethod, so a
 * bad document still lets the other documents be compared.
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import type { CoreMessage } from "ai";
import { EXTRACTION_SYSTEM_PROMPT, extractionPrompt } from "../../config/prompts";
import { errorMessage } from "../errors";
import { unifiedObjectGeneration, type ProviderKeys } from "../intelligence/llm";
import { readSpreadsheetText } from "./spreadsheet";
import {
    failedRecord,
    ModelReplySchema,
    toShipmentRecord,
    type DocumentRole,
    type ModelReply,
    type ShipmentRecord,
} from "./shipment-schema";

export interface DocumentExtractor {
    extract(filePath: string, role: DocumentRole): Promise<ShipmentRecord>;
}

export type ReplyRequest = {
    system: string;
    messages: CoreMessage[];
};

export type ReplyGenerator = (request: ReplyRequest) => Promise<ModelReply>;

const IMAGE_TYPES: Record<string, string> = {
    ".jpg": "image/jpeg",
    ".jpeg": "image/jpeg",
    ".png": "image/png",
};

const SPREADSHEET_EXTENSIONS = new Set([".xlsx", ".xls"]);

const VISION_CONFIDENCE = 0.9;
const TEXT_CONFIDENCE = 0.85;

export class ModelDocumentExtractor implements DocumentExtractor {
    private readonly generate: ReplyGenerator;

    constructor(options: { keys?: ProviderKeys; generate?: ReplyGenerator } = {}) {
        const keys = options.keys ?? {};
        this.generate = options.generate ?? (request =>
            unifiedObjectGeneration({
                keys,
                schema: ModelReplySchema,
                schemaName: "ShipmentDocument",
                system: request.system,
                messages: request.messages,
                temperature: 0,
            }));
    }

    async extract(filePath: string, role: DocumentRole): Promise<ShipmentRecord> {
        const ext = path.extname(filePath).toLowerCase();
        const imageType = IMAGE_TYPES[ext];

        try {
            if (ext === ".pdf") {
                const data = await readFile(filePath);
                return await this.fromAttachment(role, "AI Vision (PDF)", {
                    type: "file",
                    data,
                    mimeType: "application/pdf",
                });
            }
            if (imageType) {
                const image = await readFile(filePath);
                return await this.fromAttachment(role, "AI Vision (Image)", {
                    type: "image",
                    image,
                    mimeType: imageType,
                });
            }
            if (SPREADSHEET_EXTENSIONS.has(ext)) {
                return await this.fromSpreadsheet(filePath, role);
            }
            return failedRecord(`Unsupported file type: ${ext || "(none)"}`);
        } catch (err) {
            console.error(`❌ Extraction failed for ${path.basename(filePath)} (${role}): ${errorMessage(err)}`);
            return failedRecord(`Extraction Error: ${errorMessage(err)}`);
        }
    }

    private async fromAttachment(
        role: DocumentRole,
        method: string,
        part: { type: "file"; data: Buffer; mimeType: string } | { type: "image"; image: Buffer; mimeType: string }
    ): Promise<ShipmentRecord> {
        const reply = await this.generate({
            system: EXTRACTION_SYSTEM_PROMPT,
            messages: [{
                role: "user",
                content: [part, { type: "text", text: extractionPrompt(role) }],
            }],
        });

        return toShipmentRecord(reply, {
            extractionMethod: method,
            confidence: VISION_CONFIDENCE,
            rawExcerpt: JSON.stringify(reply).slice(0, 200),
        });
    }

    private async fromSpreadsheet(filePath: string, role: DocumentRole): Promise<ShipmentRecord> {
        const text = readSpreadsheetText(await readFile(filePath));
        if (!text) return failedRecord("Spreadsheet Error: no readable cells");

        const reply = await this.generate({
            system: EXTRACTION_SYSTEM_PROMPT,
            messages: [{ role: "user", content: extractionPrompt(role, text) }],
        });

        return toShipmentRecord(reply, {
            extractionMethod: "AI Text (Spreadsheet)",
            confidence: TEXT_CONFIDENCE,
            rawExcerpt: text.slice(0, 500),
        });
    }
}
