export { compareValues, filterByWindow, mergeDatasets } from "./merge.js";
export type { MergeResult } from "./merge.js";
