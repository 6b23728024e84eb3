/**
 * @attendee-sync/core : shared types and helpers for collection, storage and jobs.
 */

export {
  ATTENDEE_FIELDS,
  toAttendeeRecord,
  slugifyFieldLabel,
  displayName,
  type AttendeeRecord,
  type AttendeeDetail,
  type DetailedAttendee,
} from "./attendee.js";
export { isJsonObject, type JsonObject } from "./json.js";
export { snapshotRunState, isRunState, type RunState } from "./run-state.js";
export {
  escapeCsvField,
  toCsv,
  attendeesToCsv,
  flattenDetailedAttendee,
  detailedColumns,
  organizeRows,
  ORGANIZED_COLUMNS,
  type CsvRow,
} from "./csv.js";
export {
  RUNS_DIR,
  LATEST_LINK,
  RUN_FILES,
  formatRunTimestamp,
  parseRunTimestamp,
  runsRoot,
  runPath,
} from "./runs.js";
