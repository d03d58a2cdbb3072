export { EARTH_RADIUS_KM, haversineDistance } from "./geo.js";
export {
  VALIDATION_DEFAULTS,
  summarizeFindings,
  validateDataset,
} from "./validator.js";
export type {
  Check,
  CheckSummary,
  Finding,
  Severity,
  ValidationOptions,
} from "./validator.js";
