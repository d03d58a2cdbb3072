export {
  AIRCRAFT_FIELDS,
  AircraftIndex,
  enrichAircraft,
} from "./aircraft.js";
export type { AircraftTypes } from "./aircraft.js";
export {
  AirportIndex,
  ENRICHED_FIELDS,
  OURAIRPORTS_URL,
  downloadAirports,
  enrichAirports,
} from "./airports.js";
export type { DownloadResult, EnrichResult } from "./airports.js";
