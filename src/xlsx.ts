import * as XLSX from "xlsx";

/**
 * Read an Excel workbook and return its main sheet as rows of string cells.
 * Cells come back as their formatted text, blanks as "", so the rows can be fed
 * to the same pipeline as CSV exports.
 */
export function readXlsxToRows(fileBytes: ArrayBuffer | Uint8Array): string[][] {
  const data = fileBytes instanceof Uint8Array ? fileBytes : new Uint8Array(fileBytes);
  const workbook = XLSX.read(data, { type: "array" });
  const sheet = workbook.Sheets[chooseMainSheet(workbook.SheetNames)];
  if (!sheet) return [];

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: "",
    raw: false,
    blankrows: false,
  });
  return rows.map((row) => row.map((cell) => (cell === null || cell === undefined ? "" : String(cell))));
}

/**
 * Select the sheet to read. Prefers a sheet named `Responses`, otherwise the first sheet.
 */
function chooseMainSheet(sheetNames: string[]): string {
  const preferred = sheetNames.find((name) => name.toLowerCase() === "responses");
  return preferred ?? sheetNames[0] ?? "";
}
