import { mkdir, readdir, readFile, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { VerificationReportSchema, type VerificationReport } from "../verification/report";

export interface ReportListing {
    filename: string;
    created: string;
    size: number;
}

const REPORT_ID = /^[A-Za-z0-9_-][A-Za-z0-9._-]*\.json$/;

function isMissing(err: unknown): boolean {
    return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function fileStamp(date: Date): string {
    return date.toISOString().replace(/[-:]/g, "").replace("T", "_").slice(0, 15);
}

/** Finished reports as JSON files: report_{YYYYMMDD_HHMMSS}_{workflow key prefix}.json */
export class ReportArchive {
    constructor(readonly dir: string) {}

    async save(report: VerificationReport, workflowKey: string): Promise<string> {
        const filename = `report_${fileStamp(new Date(report.timestamp))}_${workflowKey.slice(0, 8)}.json`;
        await mkdir(this.dir, { recursive: true });
        await writeFile(path.join(this.dir, filename), JSON.stringify(report, null, 2), "utf8");
        return filename;
    }

    /** Newest first. */
    async list(): Promise<ReportListing[]> {
        let names: string[];
        try {
            names = await readdir(this.dir);
        } catch (err) {
            if (isMissing(err)) return [];
            throw err;
        }

        const reports: ReportListing[] = [];
        for (const filename of names.filter(n => n.endsWith(".json"))) {
            const info = await stat(path.join(this.dir, filename));
            reports.push({ filename, created: info.mtime.toISOString(), size: info.size });
        }

        return reports.sort((a, b) => b.created.localeCompare(a.created) || b.filename.localeCompare(a.filename));
    }

    /** Null for unknown ids and for anything that isn't a bare report file name. */
    async get(id: string): Promise<VerificationReport | null> {
        if (!REPORT_ID.test(id)) return null;

        let text: string;
        try {
            text = await readFile(path.join(this.dir, id), "utf8");
        } catch (err) {
            if (isMissing(err)) return null;
            throw err;
        }

        const parsed = VerificationReportSchema.safeParse(JSON.parse(text));
        if (!parsed.success) {
            console.warn(`⚠️ ${id} is not a verification report`);
            return null;
        }
        return parsed.data;
    }
}
