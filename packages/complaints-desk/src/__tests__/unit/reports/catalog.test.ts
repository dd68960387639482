/**
 * Report Catalog Tests
 *
 * Every report against the shared sample data, plus the single-complaint
 * scenarios for active, overdue and timeline reports.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { SqlParam, SqliteStore } from '../../../persistence/sqlite-store.js';
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
} from '../../../reports/catalog.js';
import { SAMPLE_DATA, createTestStore, seed, type SeedData } from '../../utils/fixtures.js';

const SINGLE_COMPLAINT: SeedData = {
  residents: [[1, 'A', 'B', 3, null, null]],
  categories: [[1, 'Pothole']],
  complaints: [[1, 1, 1, 'Hole', 'desc', '2024-01-01']],
};

describe('report catalog', () => {
  let store: SqliteStore;

  beforeEach(() => {
    store = createTestStore();
  });

  afterEach(() => {
    store.disconnect();
  });

  describe('with sample data', () => {
    beforeEach(() => {
      seed(store, SAMPLE_DATA);
    });

    describe('lookups', () => {
      it('should list categories by id', () => {
        expect(listCategories(store).map((c) => c.category_name)).toEqual([
          'Pothole',
          'Streetlight',
          'Noise',
          'Graffiti',
        ]);
      });

      it('should find names or return null', () => {
        expect(findCategoryName(store, 3)).toBe('Noise');
        expect(findCategoryName(store, 99)).toBeNull();
        expect(findResidentName(store, 2)).toBe('Ben Okafor');
        expect(findResidentName(store, 99)).toBeNull();
      });
    });

    it('1. activeComplaints lists unresolved complaints newest first', () => {
      expect(activeComplaints(store)).toEqual([
        {
          complaint_id: 5,
          resident_name: 'Ben Okafor',
          category_name: 'Pothole',
          title: 'Sunken cover',
          submission_date: '2024-03-15',
          status: 'In Progress',
        },
        {
          complaint_id: 3,
          resident_name: 'Ana Reyes',
          category_name: 'Pothole',
          title: 'Cracked lane',
          submission_date: '2024-03-01',
          status: 'Submitted',
        },
        {
          complaint_id: 2,
          resident_name: 'Ben Okafor',
          category_name: 'Streetlight',
          title: 'Dark corner',
          submission_date: '2024-02-10',
          status: 'In Progress',
        },
      ]);
    });

    it('2. complaintsByCategory filters on category and excludes complaints without events', () => {
      expect(complaintsByCategory(store, 1)).toEqual([
        {
          complaint_id: 5,
          resident_name: 'Ben Okafor',
          title: 'Sunken cover',
          submission_date: '2024-03-15',
          status: 'In Progress',
        },
        {
          complaint_id: 3,
          resident_name: 'Ana Reyes',
          title: 'Cracked lane',
          submission_date: '2024-03-01',
          status: 'Submitted',
        },
        {
          complaint_id: 1,
          resident_name: 'Ana Reyes',
          title: 'Deep hole',
          submission_date: '2024-01-05',
          status: 'Resolved',
        },
      ]);
      expect(complaintsByCategory(store, 2).map((row) => row.complaint_id)).toEqual([2]);
      expect(complaintsByCategory(store, 99)).toEqual([]);
    });

    it('3. complaintsByWard breaks date ties by complaint id', () => {
      expect(complaintsByWard(store, 1).map((row) => row.complaint_id)).toEqual([3, 4, 1]);
      expect(complaintsByWard(store, 3)).toEqual([]);
    });

    it('4. residentHistory lists one resident newest first', () => {
      expect(residentHistory(store, 2)).toEqual([
        {
          complaint_id: 5,
          category_name: 'Pothole',
          title: 'Sunken cover',
          submission_date: '2024-03-15',
          status: 'In Progress',
        },
        {
          complaint_id: 2,
          category_name: 'Streetlight',
          title: 'Dark corner',
          submission_date: '2024-02-10',
          status: 'In Progress',
        },
      ]);
      expect(residentHistory(store, 4)).toEqual([]);
    });

    it('5. resolutionStatistics counts current statuses per category', () => {
      expect(resolutionStatistics(store)).toEqual([
        {
          category_name: 'Pothole',
          total_complaints: 3,
          resolved: 1,
          in_progress: 1,
          submitted: 1,
          resolution_rate: 33.33,
        },
        {
          category_name: 'Streetlight',
          total_complaints: 1,
          resolved: 0,
          in_progress: 1,
          submitted: 0,
          resolution_rate: 0,
        },
        {
          category_name: 'Noise',
          total_complaints: 1,
          resolved: 1,
          in_progress: 0,
          submitted: 0,
          resolution_rate: 100,
        },
      ]);
    });

    it('5. resolutionStatistics keeps counts consistent with totals', () => {
      for (const row of resolutionStatistics(store)) {
        expect(row.resolved + row.in_progress + row.submitted).toBeLessThanOrEqual(
          row.total_complaints
        );
      }
    });

    it('6. overdueComplaints lists unresolved complaints past the threshold, oldest first', () => {
      const rows = overdueComplaints(store, new Date('2024-04-20T00:00:00Z'));

      expect(rows.map((row) => [row.complaint_id, row.days_old])).toEqual([
        [2, 70],
        [3, 50],
        [5, 36],
      ]);
      expect(rows[0]).toEqual({
        complaint_id: 2,
        resident_name: 'Ben Okafor',
        category_name: 'Streetlight',
        title: 'Dark corner',
        submission_date: '2024-02-10',
        status: 'In Progress',
        days_old: 70,
      });
    });

    it('6. overdueComplaints excludes complaints exactly at the threshold', () => {
      const rows = overdueComplaints(store, new Date('2024-04-14T00:00:00Z'));

      expect(rows.map((row) => [row.complaint_id, row.days_old])).toEqual([
        [2, 64],
        [3, 44],
      ]);
    });

    it('6. overdueComplaints honours a custom threshold', () => {
      const rows = overdueComplaints(store, new Date('2024-04-20T00:00:00Z'), 40);

      expect(rows.map((row) => row.complaint_id)).toEqual([2, 3]);
    });

    it('7. complaintsByStatus matches the current status exactly', () => {
      expect(complaintsByStatus(store, 'In Progress')).toEqual([
        {
          complaint_id: 5,
          resident_name: 'Ben Okafor',
          category_name: 'Pothole',
          title: 'Sunken cover',
          submission_date: '2024-03-15',
          last_status_date: '2024-03-15',
        },
        {
          complaint_id: 2,
          resident_name: 'Ben Okafor',
          category_name: 'Streetlight',
          title: 'Dark corner',
          submission_date: '2024-02-10',
          last_status_date: '2024-02-15',
        },
      ]);
      expect(complaintsByStatus(store, 'in progress')).toEqual([]);
      expect(complaintsByStatus(store, 'Closed')).toEqual([]);
    });

    it('8. topCategories shares all complaints between categories', () => {
      const rows = topCategories(store);

      expect(rows).toEqual([
        { category_name: 'Pothole', complaint_count: 3, percentage: 50 },
        { category_name: 'Streetlight', complaint_count: 2, percentage: 33.33 },
        { category_name: 'Noise', complaint_count: 1, percentage: 16.67 },
      ]);
      expect(rows.reduce((sum, row) => sum + row.complaint_count, 0)).toBe(6);
    });

    it('9. wardPerformance counts current statuses per ward', () => {
      expect(wardPerformance(store)).toEqual([
        {
          ward: 1,
          total_complaints: 3,
          resolved: 2,
          in_progress: 0,
          submitted: 1,
          resolution_rate: 66.67,
        },
        {
          ward: 2,
          total_complaints: 2,
          resolved: 0,
          in_progress: 2,
          submitted: 0,
          resolution_rate: 0,
        },
      ]);
    });

    it('10. complaintTimeline returns detail and events oldest first', () => {
      expect(complaintTimeline(store, 5)).toEqual({
        found: true,
        detail: {
          complaint_id: 5,
          resident_name: 'Ben Okafor',
          category_name: 'Pothole',
          title: 'Sunken cover',
          description: 'Manhole',
          submission_date: '2024-03-15',
        },
        events: [
          { status: 'Submitted', status_date: '2024-03-15' },
          { status: 'In Progress', status_date: '2024-03-15' },
        ],
      });
    });

    it('10. complaintTimeline returns an empty history for a complaint without events', () => {
      const timeline = complaintTimeline(store, 6);

      expect(timeline.found).toBe(true);
      expect(timeline.found && timeline.events).toEqual([]);
    });

    it('11. complaintsPerWard counts every complaint', () => {
      expect(complaintsPerWard(store)).toEqual([
        { ward: 1, total_complaints: 4 },
        { ward: 2, total_complaints: 2 },
      ]);
    });

    it('12. averageTurnaroundByCategory averages resolved complaints only', () => {
      expect(averageTurnaroundByCategory(store)).toEqual([
        { category_name: 'Noise', avg_turnaround_days: 3 },
        { category_name: 'Pothole', avg_turnaround_days: 15 },
      ]);
    });

    it('13. topResidents orders equal counts by name and applies the limit', () => {
      expect(topResidents(store)).toEqual([
        { resident_name: 'Ana Reyes', total_complaints: 2 },
        { resident_name: 'Ben Okafor', total_complaints: 2 },
        { resident_name: 'Cara Lind', total_complaints: 2 },
      ]);
      expect(topResidents(store, 1)).toEqual([{ resident_name: 'Ana Reyes', total_complaints: 2 }]);
    });

    it('14. monthlyTrend groups by submission month', () => {
      expect(monthlyTrend(store)).toEqual([
        { month: '2024-01', total_complaints: 1 },
        { month: '2024-02', total_complaints: 1 },
        { month: '2024-03', total_complaints: 4 },
      ]);
    });

    it('15. averageStatusDuration averages days until the next event', () => {
      expect(averageStatusDuration(store)).toEqual([
        { status: 'In Progress', avg_days: 12 },
        { status: 'Submitted', avg_days: 3 },
      ]);
    });
  });

  describe('single complaint scenarios', () => {
    it('should drop a complaint whose latest event is Resolved from active complaints', () => {
      seed(store, {
        ...SINGLE_COMPLAINT,
        statusLogs: [
          [1, 1, 'Submitted', '2024-01-01'],
          [2, 1, 'Resolved', '2024-01-10'],
        ],
      });

      expect(activeComplaints(store)).toEqual([]);
    });

    it('should use the latest date regardless of log order', () => {
      seed(store, {
        ...SINGLE_COMPLAINT,
        statusLogs: [
          [1, 1, 'Submitted', '2024-01-01'],
          [2, 1, 'In Progress', '2024-01-20'],
          [3, 1, 'Resolved', '2024-01-10'],
        ],
      });

      const rows = activeComplaints(store);
      expect(rows).toHaveLength(1);
      expect(rows[0]?.status).toBe('In Progress');
    });

    it('should report a complaint submitted 35 days ago as overdue', () => {
      seed(store, {
        ...SINGLE_COMPLAINT,
        statusLogs: [[1, 1, 'Submitted', '2024-01-01']],
      });

      const rows = overdueComplaints(store, new Date('2024-02-05T12:00:00Z'));

      expect(rows).toHaveLength(1);
      expect(rows[0]?.days_old).toBe(35);
    });

    it('should report a missing complaint without querying its history', () => {
      seed(store, SINGLE_COMPLAINT);
      const statements: string[] = [];
      const recording = {
        execute<T extends object>(sql: string, params?: readonly SqlParam[]): T[] {
          statements.push(sql);
          return store.execute<T>(sql, params);
        },
        queryOne<T extends object>(sql: string, params?: readonly SqlParam[]): T | null {
          statements.push(sql);
          return store.queryOne<T>(sql, params);
        },
      };

      expect(complaintTimeline(recording, 99)).toEqual({ found: false, complaintId: 99 });
      expect(statements).toHaveLength(1);
      expect(statements.some((sql) => sql.includes('status_logs'))).toBe(false);
    });

    it('should return no rows from any report over empty tables', () => {
      const reports: ReadonlyArray<readonly [string, () => readonly object[]]> = [
        ['activeComplaints', () => activeComplaints(store)],
        ['complaintsByCategory', () => complaintsByCategory(store, 1)],
        ['complaintsByWard', () => complaintsByWard(store, 1)],
        ['residentHistory', () => residentHistory(store, 1)],
        ['resolutionStatistics', () => resolutionStatistics(store)],
        ['overdueComplaints', () => overdueComplaints(store, new Date('2024-06-01T00:00:00Z'))],
        ['complaintsByStatus', () => complaintsByStatus(store, 'Submitted')],
        ['topCategories', () => topCategories(store)],
        ['wardPerformance', () => wardPerformance(store)],
        ['complaintsPerWard', () => complaintsPerWard(store)],
        ['averageTurnaroundByCategory', () => averageTurnaroundByCategory(store)],
        ['topResidents', () => topResidents(store)],
        ['monthlyTrend', () => monthlyTrend(store)],
        ['averageStatusDuration', () => averageStatusDuration(store)],
      ];

      for (const [name, report] of reports) {
        expect(report(), name).toEqual([]);
      }
      expect(complaintTimeline(store, 1)).toEqual({ found: false, complaintId: 1 });
    });

    it('should return no top categories for an empty store', () => {
      expect(topCategories(store)).toEqual([]);
    });
  });
});
