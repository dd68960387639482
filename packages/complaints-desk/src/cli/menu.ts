/**
 * Interactive report menu
 *
 * One entry per report. Parameterized entries prompt for a single line,
 * validate it, run the report against the session's store and print the
 * rendered result.
 *
 * @module cli/menu
 */

import type { QueryExecutor } from '../persistence/sqlite-store.js';
import { STATUS_LABELS } from '../persistence/schema.types.js';
import {
  activeComplaints,
  averageStatusDuration,
  averageTurnaroundByCategory,
  complaintTimeline,
  complaintsByCategory,
  complaintsByStatus,
  complaintsByWard,
  complaintsPerWard,
  findCategoryName,
  findResidentName,
  listCategories,
  monthlyTrend,
  overdueComplaints,
  residentHistory,
  resolutionStatistics,
  topCategories,
  topResidents,
  wardPerformance,
} from '../reports/catalog.js';
import { parseIntegerParameter, parseTextParameter } from './lib/input.js';
import { formatters, renderRecord, renderTable, type Writer } from './lib/output.js';
import type { Prompter } from './lib/prompt.js';
import { DEFAULT_CONFIG, type ReportsConfig } from './lib/config.js';

export interface MenuContext {
  readonly store: QueryExecutor;
  readonly prompter: Prompter;
  readonly write: Writer;
  /** Reference instant for age-based reports */
  readonly now: () => Date;
  readonly reports: ReportsConfig;
}

export interface MenuEntry {
  readonly key: number;
  /** Fixed text, or text built from the report settings */
  readonly label: string | ((reports: ReportsConfig) => string);
  run(context: MenuContext): Promise<void>;
}

const RATE_COLUMNS = { resolution_rate: formatters.fixed2 };

export const MENU_TITLE = 'MUNICIPAL COMPLAINTS DATABASE - QUERY MENU';

export const MENU_ENTRIES: readonly MenuEntry[] = [
  {
    key: 1,
    label: 'View all active complaints',
    async run({ store, write }) {
      write(renderTable(activeComplaints(store), 'Active Complaints'));
    },
  },
  {
    key: 2,
    label: 'View complaints by category',
    async run({ store, prompter, write }) {
      write('\nAvailable categories:');
      for (const category of listCategories(store)) {
        write(`${category.category_id}. ${category.category_name}`);
      }

      const categoryId = parseIntegerParameter(
        await prompter.ask('\nEnter category ID: '),
        'category ID'
      );
      const name = findCategoryName(store, categoryId) ?? 'Unknown';
      write(renderTable(complaintsByCategory(store, categoryId), `Complaints for ${name}`));
    },
  },
  {
    key: 3,
    label: 'View complaints by ward',
    async run({ store, prompter, write }) {
      const ward = parseIntegerParameter(await prompter.ask('Enter ward number: '), 'ward number');
      write(renderTable(complaintsByWard(store, ward), `Complaints for Ward ${ward}`));
    },
  },
  {
    key: 4,
    label: 'View resident complaint history',
    async run({ store, prompter, write }) {
      const residentId = parseIntegerParameter(
        await prompter.ask('Enter resident ID: '),
        'resident ID'
      );
      const name = findResidentName(store, residentId) ?? `Resident ${residentId}`;
      write(renderTable(residentHistory(store, residentId), `Complaint History for ${name}`));
    },
  },
  {
    key: 5,
    label: 'View complaint resolution statistics',
    async run({ store, write }) {
      write(
        renderTable(
          resolutionStatistics(store),
          'Complaint Resolution Statistics by Category',
          RATE_COLUMNS
        )
      );
    },
  },
  {
    key: 6,
    label: ({ overdueDays }) => `View overdue complaints (submitted over ${overdueDays} days ago)`,
    async run({ store, write, now, reports }) {
      write(
        renderTable(
          overdueComplaints(store, now(), reports.overdueDays),
          `Overdue Complaints (Over ${reports.overdueDays} Days)`
        )
      );
    },
  },
  {
    key: 7,
    label: 'View complaints by status',
    async run({ store, prompter, write }) {
      write(`\nAvailable statuses: ${STATUS_LABELS.join(', ')}`);
      const status = parseTextParameter(await prompter.ask('Enter status: '));
      write(renderTable(complaintsByStatus(store, status), `Complaints with Status: ${status}`));
    },
  },
  {
    key: 8,
    label: 'View top complaint categories',
    async run({ store, write }) {
      write(
        renderTable(topCategories(store), 'Top Complaint Categories', {
          percentage: formatters.fixed2,
        })
      );
    },
  },
  {
    key: 9,
    label: 'View ward performance summary',
    async run({ store, write }) {
      write(renderTable(wardPerformance(store), 'Ward Performance Summary', RATE_COLUMNS));
    },
  },
  {
    key: 10,
    label: 'View complaint timeline for specific complaint',
    async run({ store, prompter, write }) {
      const complaintId = parseIntegerParameter(
        await prompter.ask('Enter complaint ID: '),
        'complaint ID'
      );

      const timeline = complaintTimeline(store, complaintId);
      if (!timeline.found) {
        write(`No complaint found with ID ${complaintId}`);
        return;
      }

      const { detail, events } = timeline;
      write(
        renderRecord(
          [
            ['ID', detail.complaint_id],
            ['Resident', detail.resident_name],
            ['Category', detail.category_name],
            ['Title', detail.title],
            ['Description', detail.description],
            ['Submitted', detail.submission_date],
          ],
          'COMPLAINT DETAILS'
        )
      );
      write(renderTable(events, `Status Timeline for Complaint ${complaintId}`));
    },
  },
  {
    key: 11,
    label: 'View complaint volume per ward',
    async run({ store, write }) {
      write(renderTable(complaintsPerWard(store), 'Complaints per Ward'));
    },
  },
  {
    key: 12,
    label: 'View average resolution time by category',
    async run({ store, write }) {
      write(renderTable(averageTurnaroundByCategory(store), 'Average Resolution Time by Category'));
    },
  },
  {
    key: 13,
    label: 'View residents with the most complaints',
    async run({ store, write, reports }) {
      write(
        renderTable(
          topResidents(store, reports.topResidents),
          `Top ${reports.topResidents} Residents by Complaints`
        )
      );
    },
  },
  {
    key: 14,
    label: 'View monthly complaint trend',
    async run({ store, write }) {
      write(renderTable(monthlyTrend(store), 'Monthly Complaint Trend'));
    },
  },
  {
    key: 15,
    label: 'View average time spent in each status',
    async run({ store, write }) {
      write(renderTable(averageStatusDuration(store), 'Average Days per Status'));
    },
  },
];

/**
 * Menu text: banner, numbered entries, exit entry
 */
export function renderMenu(
  entries: readonly MenuEntry[] = MENU_ENTRIES,
  reports: ReportsConfig = DEFAULT_CONFIG.reports
): string {
  const rule = '='.repeat(60);
  const lines = ['', rule, MENU_TITLE, rule];
  for (const entry of entries) {
    const label = typeof entry.label === 'string' ? entry.label : entry.label(reports);
    lines.push(`${`${entry.key}.`.padEnd(4)}${label}`);
  }
  lines.push(`${'0.'.padEnd(4)}Exit`, rule);
  return lines.join('\n');
}

export function findMenuEntry(
  key: number,
  entries: readonly MenuEntry[] = MENU_ENTRIES
): MenuEntry | undefined {
  return entries.find((entry) => entry.key === key);
}
