/**
 * Latest-Status Resolver
 *
 * A complaint's current status is the status of its event with the latest
 * status_date; when several events share that date the one with the highest
 * log_id wins. Complaints with no events have no current status.
 *
 * The derivation itself is the `current_status` view (see migrations);
 * reports join against CURRENT_STATUS_RELATION instead of repeating it.
 *
 * @module reports/latest-status
 */

import { CURRENT_STATUS_VIEW } from '../persistence/migrations.js';
import type { QueryExecutor } from '../persistence/sqlite-store.js';
import type { CurrentStatusRow } from '../persistence/schema.types.js';

export const CURRENT_STATUS_RELATION = CURRENT_STATUS_VIEW;

/**
 * Current status for one complaint, or null when it has no events
 * (or does not exist).
 */
export function resolveCurrentStatus(
  db: QueryExecutor,
  complaintId: number
): CurrentStatusRow | null {
  return db.queryOne<CurrentStatusRow>(
    `SELECT complaint_id, log_id, status, status_date
     FROM ${CURRENT_STATUS_RELATION}
     WHERE complaint_id = ?`,
    [complaintId]
  );
}

/**
 * Current status for every complaint that has at least one event.
 */
export function resolveAllCurrentStatuses(db: QueryExecutor): Map<number, CurrentStatusRow> {
  const rows = db.execute<CurrentStatusRow>(
    `SELECT complaint_id, log_id, status, status_date
     FROM ${CURRENT_STATUS_RELATION}
     ORDER BY complaint_id`
  );
  return new Map(rows.map((row) => [row.complaint_id, row]));
}
