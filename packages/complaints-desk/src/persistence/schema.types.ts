/**
 * Complaints Desk Persistence Schema Types
 *
 * Row types matching the tables created by the store migrations.
 *
 * Design principles:
 *   1. Readonly properties for immutable database rows
 *   2. snake_case field names identical to column names
 *   3. ISO date strings (YYYY-MM-DD), not Date objects
 *   4. Explicit null handling (not undefined)
 */

// ============================================================================
// Date Type - Database format
// ============================================================================

/**
 * Calendar date string as stored by ingestion.
 * Example: "2024-01-10"
 */
export type ISODate = string;

/**
 * Conventional status labels. The column itself is free text, so
 * reports accept any string.
 */
export const STATUS_LABELS = ['Submitted', 'In Progress', 'Resolved'] as const;

export type StatusLabel = (typeof STATUS_LABELS)[number];

// ============================================================================
// Table Rows
// ============================================================================

export interface ResidentRow {
  readonly resident_id: number;
  readonly first_name: string;
  readonly last_name: string;
  readonly ward: number;
  readonly email: string | null;
  readonly phone: string | null;
}

export interface ServiceCategoryRow {
  readonly category_id: number;
  readonly category_name: string;
}

export interface ComplaintRow {
  readonly complaint_id: number;
  readonly resident_id: number;
  readonly category_id: number;
  readonly title: string;
  readonly description: string | null;
  readonly submission_date: ISODate;
}

export interface StatusLogRow {
  readonly log_id: number;
  readonly complaint_id: number;
  readonly status: string;
  readonly status_date: ISODate;
}

/**
 * Row of the current_status view: one per complaint with at least one event.
 */
export interface CurrentStatusRow {
  readonly complaint_id: number;
  readonly log_id: number;
  readonly status: string;
  readonly status_date: ISODate;
}

// ============================================================================
// Table Catalog
// ============================================================================

export type TableName = 'residents' | 'service_categories' | 'complaints' | 'status_logs';

/**
 * Declared columns per table, identity column first.
 */
export const TABLE_COLUMNS = {
  residents: ['resident_id', 'first_name', 'last_name', 'ward', 'email', 'phone'],
  service_categories: ['category_id', 'category_name'],
  complaints: [
    'complaint_id',
    'resident_id',
    'category_id',
    'title',
    'description',
    'submission_date',
  ],
  status_logs: ['log_id', 'complaint_id', 'status', 'status_date'],
} as const satisfies Record<TableName, readonly string[]>;
