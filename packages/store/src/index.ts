export { initDatabase, type DB } from "./db.js";
export {
  findLatestRun,
  formatRunReport,
  getLatestRunReport,
  getOrCreateRun,
  getStatistics,
  hasDetail,
  sqlTimestamp,
  syncRun,
  toSyncRow,
  upsertAttendees,
  type LatestRunReport,
  type NewAttendee,
  type RunReport,
  type Statistics,
  type SyncSummary,
  type UpsertResult,
} from "./sync.js";
