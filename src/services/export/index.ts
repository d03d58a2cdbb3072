export { exportDataset } from "./exporter.js";
export type { ExportResult } from "./exporter.js";
