export { run } from "./equistat.js";
export type { CliDeps, CliIo } from "./equistat.js";
