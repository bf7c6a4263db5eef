import type { Violation } from "../../runtime/src/errors.js";

export type UploadedFile = {
  name: string;
  content: string;
};

/**
 * Checks applied before anything is written: a file must be present and
 * carry a .csv name.
 */
export function checkUploadedFile(file: UploadedFile | null | undefined): Violation[] {
  if (!file) return [{ code: "NO_FILE", message: "No file uploaded." }];

  if (!file.name.toLowerCase().endsWith(".csv")) {
    return [
      {
        code: "UNSUPPORTED_FILE_TYPE",
        field: "file",
        message: `Only CSV files are allowed (got "${file.name}").`,
      },
    ];
  }

  return [];
}
