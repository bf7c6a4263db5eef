export { missingColumns, parseEquipmentCsv, readCsvTable, recordsFromTable } from "./table.js";
export type { RawTable } from "./table.js";

export { checkUploadedFile } from "./upload.js";
export type { UploadedFile } from "./upload.js";
