import * as XLSX from "xlsx";

/** First sheet of a workbook as "cell | cell" lines; blank rows dropped. */
export function readSpreadsheetText(buffer: Buffer): string {
    const workbook = XLSX.read(buffer, { type: "buffer" });
    const firstSheet = workbook.SheetNames[0];
    if (!firstSheet) return "";

    const rows = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[firstSheet], {
        header: 1,
        blankrows: false,
        defval: "",
    });

    return rows
        .map(row => row.map(cell => (cell === null || cell === undefined ? "" : String(cell))).join(" | "))
        .filter(line => line.replace(/\|/g, "").trim() !== "")
        .join("\n");
}
