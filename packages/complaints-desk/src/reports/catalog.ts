/**
 * Report Catalog
 *
 * Parameterized read queries over the complaints store. Each report returns
 * typed rows whose key order is the column order shown to the user.
 *
 * Design principles:
 *   1. Current status always comes from CURRENT_STATUS_RELATION
 *   2. Unknown parameter values yield empty results, never errors
 *   3. List reports break ordering ties on complaint_id ascending
 *   4. Rates and percentages are computed by `percentage()`
 *
 * @module reports/catalog
 */

import type { QueryExecutor } from '../persistence/sqlite-store.js';
import type { ISODate, ServiceCategoryRow } from '../persistence/schema.types.js';
import { CURRENT_STATUS_RELATION } from './latest-status.js';
import { percentage } from './rates.js';

// ============================================================================
// Row Types
// ============================================================================

export interface ActiveComplaintRow {
  readonly complaint_id: number;
  readonly resident_name: string;
  readonly category_name: string;
  readonly title: string;
  readonly submission_date: ISODate;
  readonly status: string;
}

export type WardComplaintRow = ActiveComplaintRow;

export interface CategoryComplaintRow {
  readonly complaint_id: number;
  readonly resident_name: string;
  readonly title: string;
  readonly submission_date: ISODate;
  readonly status: string;
}

export interface ResidentHistoryRow {
  readonly complaint_id: number;
  readonly category_name: string;
  readonly title: string;
  readonly submission_date: ISODate;
  readonly status: string;
}

interface StatusCounts {
  readonly total_complaints: number;
  readonly resolved: number;
  readonly in_progress: number;
  readonly submitted: number;
}

export interface CategoryResolutionRow extends StatusCounts {
  readonly category_name: string;
  readonly resolution_rate: number;
}

export interface WardPerformanceRow extends StatusCounts {
  readonly ward: number;
  readonly resolution_rate: number;
}

export interface OverdueComplaintRow extends ActiveComplaintRow {
  readonly days_old: number;
}

export interface StatusComplaintRow {
  readonly complaint_id: number;
  readonly resident_name: string;
  readonly category_name: string;
  readonly title: string;
  readonly submission_date: ISODate;
  readonly last_status_date: ISODate;
}

export interface TopCategoryRow {
  readonly category_name: string;
  readonly complaint_count: number;
  readonly percentage: number;
}

export interface ComplaintDetailRow {
  readonly complaint_id: number;
  readonly resident_name: string;
  readonly category_name: string;
  readonly title: string;
  readonly description: string | null;
  readonly submission_date: ISODate;
}

export interface TimelineEventRow {
  readonly status: string;
  readonly status_date: ISODate;
}

export type ComplaintTimeline =
  | { readonly found: false; readonly complaintId: number }
  | {
      readonly found: true;
      readonly detail: ComplaintDetailRow;
      readonly events: readonly TimelineEventRow[];
    };

export interface WardVolumeRow {
  readonly ward: number;
  readonly total_complaints: number;
}

export interface CategoryTurnaroundRow {
  readonly category_name: string;
  readonly avg_turnaround_days: number;
}

export interface ResidentVolumeRow {
  readonly resident_name: string;
  readonly total_complaints: number;
}

export interface MonthlyTrendRow {
  readonly month: string | null;
  readonly total_complaints: number;
}

export interface StatusDurationRow {
  readonly status: string;
  readonly avg_days: number;
}

// ============================================================================
// Shared SQL Fragments
// ============================================================================

const RESIDENT_NAME = `r.first_name || ' ' || r.last_name`;

const WITH_CURRENT_STATUS = `JOIN ${CURRENT_STATUS_RELATION} cs ON cs.complaint_id = c.complaint_id`;

const COMPLAINT_LISTING = `
  SELECT
    c.complaint_id,
    ${RESIDENT_NAME} AS resident_name,
    sc.category_name,
    c.title,
    c.submission_date,
    cs.status
  FROM complaints c
  JOIN residents r ON c.resident_id = r.resident_id
  JOIN service_categories sc ON c.category_id = sc.category_id
  ${WITH_CURRENT_STATUS}`;

const STATUS_COUNT_COLUMNS = `
  COUNT(*) AS total_complaints,
  SUM(CASE WHEN cs.status = 'Resolved' THEN 1 ELSE 0 END) AS resolved,
  SUM(CASE WHEN cs.status = 'In Progress' THEN 1 ELSE 0 END) AS in_progress,
  SUM(CASE WHEN cs.status = 'Submitted' THEN 1 ELSE 0 END) AS submitted`;

// ============================================================================
// Lookups
// ============================================================================

export function listCategories(db: QueryExecutor): ServiceCategoryRow[] {
  return db.execute<ServiceCategoryRow>(
    'SELECT category_id, category_name FROM service_categories ORDER BY category_id'
  );
}

export function findCategoryName(db: QueryExecutor, categoryId: number): string | null {
  const row = db.queryOne<Pick<ServiceCategoryRow, 'category_name'>>(
    'SELECT category_name FROM service_categories WHERE category_id = ?',
    [categoryId]
  );
  return row?.category_name ?? null;
}

export function findResidentName(db: QueryExecutor, residentId: number): string | null {
  const row = db.queryOne<{ name: string }>(
    `SELECT first_name || ' ' || last_name AS name FROM residents WHERE resident_id = ?`,
    [residentId]
  );
  return row?.name ?? null;
}

// ============================================================================
// Menu Reports
// ============================================================================

/**
 * 1. Complaints whose current status is not "Resolved"
 */
export function activeComplaints(db: QueryExecutor): ActiveComplaintRow[] {
  return db.execute<ActiveComplaintRow>(
    `${COMPLAINT_LISTING}
     WHERE cs.status != 'Resolved'
     ORDER BY c.submission_date DESC, c.complaint_id`
  );
}

/**
 * 2. Complaints in one service category
 */
export function complaintsByCategory(
  db: QueryExecutor,
  categoryId: number
): CategoryComplaintRow[] {
  return db.execute<CategoryComplaintRow>(
    `SELECT
       c.complaint_id,
       ${RESIDENT_NAME} AS resident_name,
       c.title,
       c.submission_date,
       cs.status
     FROM complaints c
     JOIN residents r ON c.resident_id = r.resident_id
     JOIN service_categories sc ON c.category_id = sc.category_id
     ${WITH_CURRENT_STATUS}
     WHERE c.category_id = ?
     ORDER BY c.submission_date DESC, c.complaint_id`,
    [categoryId]
  );
}

/**
 * 3. Complaints filed by residents of one ward
 */
export function complaintsByWard(db: QueryExecutor, ward: number): WardComplaintRow[] {
  return db.execute<WardComplaintRow>(
    `${COMPLAINT_LISTING}
     WHERE r.ward = ?
     ORDER BY c.submission_date DESC, c.complaint_id`,
    [ward]
  );
}

/**
 * 4. Complaints filed by one resident
 */
export function residentHistory(db: QueryExecutor, residentId: number): ResidentHistoryRow[] {
  return db.execute<ResidentHistoryRow>(
    `SELECT
       c.complaint_id,
       sc.category_name,
       c.title,
       c.submission_date,
       cs.status
     FROM complaints c
     JOIN service_categories sc ON c.category_id = sc.category_id
     ${WITH_CURRENT_STATUS}
     WHERE c.resident_id = ?
     ORDER BY c.submission_date DESC, c.complaint_id`,
    [residentId]
  );
}

/**
 * 5. Current-status breakdown and resolution rate per category
 */
export function resolutionStatistics(db: QueryExecutor): CategoryResolutionRow[] {
  const rows = db.execute<StatusCounts & { category_name: string }>(
    `SELECT
       sc.category_name,
       ${STATUS_COUNT_COLUMNS}
     FROM complaints c
     JOIN service_categories sc ON c.category_id = sc.category_id
     ${WITH_CURRENT_STATUS}
     GROUP BY sc.category_id, sc.category_name
     ORDER BY total_complaints DESC, sc.category_id`
  );

  return rows.map((row) => ({
    category_name: row.category_name,
    total_complaints: row.total_complaints,
    resolved: row.resolved,
    in_progress: row.in_progress,
    submitted: row.submitted,
    resolution_rate: percentage(row.resolved, row.total_complaints),
  }));
}

/**
 * 6. Unresolved complaints older than the threshold, oldest first
 *
 * @param now - Reference instant for computing age
 * @param thresholdDays - Minimum age, exclusive
 */
export function overdueComplaints(
  db: QueryExecutor,
  now: Date,
  thresholdDays = 30
): OverdueComplaintRow[] {
  const reference = now.toISOString();
  return db.execute<OverdueComplaintRow>(
    `SELECT
       c.complaint_id,
       ${RESIDENT_NAME} AS resident_name,
       sc.category_name,
       c.title,
       c.submission_date,
       cs.status,
       CAST((julianday(?) - julianday(c.submission_date)) AS INTEGER) AS days_old
     FROM complaints c
     JOIN residents r ON c.resident_id = r.resident_id
     JOIN service_categories sc ON c.category_id = sc.category_id
     ${WITH_CURRENT_STATUS}
     WHERE cs.status != 'Resolved'
       AND julianday(?) - julianday(c.submission_date) > ?
     ORDER BY days_old DESC, c.complaint_id`,
    [reference, reference, thresholdDays]
  );
}

/**
 * 7. Complaints whose current status equals the label exactly
 */
export function complaintsByStatus(db: QueryExecutor, status: string): StatusComplaintRow[] {
  return db.execute<StatusComplaintRow>(
    `SELECT
       c.complaint_id,
       ${RESIDENT_NAME} AS resident_name,
       sc.category_name,
       c.title,
       c.submission_date,
       cs.status_date AS last_status_date
     FROM complaints c
     JOIN residents r ON c.resident_id = r.resident_id
     JOIN service_categories sc ON c.category_id = sc.category_id
     ${WITH_CURRENT_STATUS}
     WHERE cs.status = ?
     ORDER BY c.submission_date DESC, c.complaint_id`,
    [status]
  );
}

/**
 * 8. Complaint volume per category as a share of all complaints
 */
export function topCategories(db: QueryExecutor): TopCategoryRow[] {
  const total = db.queryOne<{ total: number }>('SELECT COUNT(*) AS total FROM complaints');
  const allComplaints = total?.total ?? 0;
  if (allComplaints === 0) {
    return [];
  }

  const rows = db.execute<{ category_name: string; complaint_count: number }>(
    `SELECT
       sc.category_name,
       COUNT(*) AS complaint_count
     FROM complaints c
     JOIN service_categories sc ON c.category_id = sc.category_id
     GROUP BY sc.category_id, sc.category_name
     ORDER BY complaint_count DESC, sc.category_id`
  );

  return rows.map((row) => ({
    category_name: row.category_name,
    complaint_count: row.complaint_count,
    percentage: percentage(row.complaint_count, allComplaints),
  }));
}

/**
 * 9. Current-status breakdown and resolution rate per ward
 */
export function wardPerformance(db: QueryExecutor): WardPerformanceRow[] {
  const rows = db.execute<StatusCounts & { ward: number }>(
    `SELECT
       r.ward,
       ${STATUS_COUNT_COLUMNS}
     FROM complaints c
     JOIN residents r ON c.resident_id = r.resident_id
     ${WITH_CURRENT_STATUS}
     GROUP BY r.ward
     ORDER BY total_complaints DESC, r.ward`
  );

  return rows.map((row) => ({
    ward: row.ward,
    total_complaints: row.total_complaints,
    resolved: row.resolved,
    in_progress: row.in_progress,
    submitted: row.submitted,
    resolution_rate: percentage(row.resolved, row.total_complaints),
  }));
}

/**
 * 10. Complaint detail plus its full status history, oldest first.
 * The history is only queried when the complaint exists.
 */
export function complaintTimeline(db: QueryExecutor, complaintId: number): ComplaintTimeline {
  const detail = db.queryOne<ComplaintDetailRow>(
    `SELECT
       c.complaint_id,
       ${RESIDENT_NAME} AS resident_name,
       sc.category_name,
       c.title,
       c.description,
       c.submission_date
     FROM complaints c
     JOIN residents r ON c.resident_id = r.resident_id
     JOIN service_categories sc ON c.category_id = sc.category_id
     WHERE c.complaint_id = ?`,
    [complaintId]
  );

  if (!detail) {
    return { found: false, complaintId };
  }

  const events = db.execute<TimelineEventRow>(
    `SELECT status, status_date
     FROM status_logs
     WHERE complaint_id = ?
     ORDER BY status_date ASC, log_id ASC`,
    [complaintId]
  );

  return { found: true, detail, events };
}

// ============================================================================
// Analytics Reports
// ============================================================================

/**
 * Complaint count per ward, regardless of status
 */
export function complaintsPerWard(db: QueryExecutor): WardVolumeRow[] {
  return db.execute<WardVolumeRow>(
    `SELECT r.ward, COUNT(c.complaint_id) AS total_complaints
     FROM complaints c
     JOIN residents r ON c.resident_id = r.resident_id
     GROUP BY r.ward
     ORDER BY total_complaints DESC, r.ward`
  );
}

/**
 * Average days from first status event to latest "Resolved" event,
 * per category, over resolved complaints only
 */
export function averageTurnaroundByCategory(db: QueryExecutor): CategoryTurnaroundRow[] {
  return db.execute<CategoryTurnaroundRow>(
    `WITH complaint_turnaround AS (
       SELECT
         c.complaint_id,
         c.category_id,
         julianday(MAX(CASE WHEN sl.status = 'Resolved' THEN sl.status_date END))
           - julianday(MIN(sl.status_date)) AS turnaround_days
       FROM complaints c
       JOIN status_logs sl ON c.complaint_id = sl.complaint_id
       GROUP BY c.complaint_id, c.category_id
       HAVING MAX(CASE WHEN sl.status = 'Resolved' THEN sl.status_date END) IS NOT NULL
     )
     SELECT
       sc.category_name,
       ROUND(AVG(ct.turnaround_days)) AS avg_turnaround_days
     FROM complaint_turnaround ct
     JOIN service_categories sc ON ct.category_id = sc.category_id
     GROUP BY sc.category_id, sc.category_name
     ORDER BY avg_turnaround_days, sc.category_id`
  );
}

/**
 * Residents with the most complaints
 */
export function topResidents(db: QueryExecutor, limit = 5): ResidentVolumeRow[] {
  return db.execute<ResidentVolumeRow>(
    `SELECT
       ${RESIDENT_NAME} AS resident_name,
       COUNT(c.complaint_id) AS total_complaints
     FROM complaints c
     JOIN residents r ON c.resident_id = r.resident_id
     GROUP BY r.resident_id
     ORDER BY total_complaints DESC, resident_name
     LIMIT ?`,
    [limit]
  );
}

/**
 * Complaints submitted per calendar month
 */
export function monthlyTrend(db: QueryExecutor): MonthlyTrendRow[] {
  return db.execute<MonthlyTrendRow>(
    `SELECT
       strftime('%Y-%m', c.submission_date) AS month,
       COUNT(c.complaint_id) AS total_complaints
     FROM complaints c
     GROUP BY month
     ORDER BY month`
  );
}

/**
 * Average days a complaint stays in each status before its next event
 */
export function averageStatusDuration(db: QueryExecutor): StatusDurationRow[] {
  return db.execute<StatusDurationRow>(
    `SELECT
       status,
       ROUND(AVG(julianday(next_status_date) - julianday(status_date))) AS avg_days
     FROM (
       SELECT
         sl.status,
         sl.status_date,
         LEAD(sl.status_date) OVER (
           PARTITION BY sl.complaint_id
           ORDER BY sl.status_date, sl.log_id
         ) AS next_status_date
       FROM status_logs sl
     )
     WHERE next_status_date IS NOT NULL
     GROUP BY status
     ORDER BY status`
  );
}
