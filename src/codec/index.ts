// Typed Row Codec - Re-exports
export { decodeValue, encodeValue } from "./values.js";
export { decodeRow, emptyRow, encodeRow } from "./rows.js";
export {
  decodeRecords,
  parseCsv,
  readDataset,
  stringifyCsv,
  writeDataset,
  writeFileAtomic,
  writeRecords,
  type DecodePolicy,
  type ReadDatasetOptions,
  type ReadDatasetResult,
} from "./csv.js";
export * from "./temporal.js";
export * from "./units.js";
