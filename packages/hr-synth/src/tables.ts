/**
 * Tabular output contract
 */

import type {
  CompensationRecord,
  EmployeeRecord,
  JobAssignmentRecord,
  JobRole,
  Location,
  OrgAssignmentRecord,
  OrganizationUnit,
  PerformanceReviewRecord
} from './types.js';

export interface Table<Row> {
  readonly name: TableName;
  readonly columns: ReadonlyArray<keyof Row & string>;
  readonly rows: readonly Row[];
}

export interface HrTables {
  employee: Table<EmployeeRecord>;
  employee_job_assignment: Table<JobAssignmentRecord>;
  employee_org_assignment: Table<OrgAssignmentRecord>;
  /** Absent when compensation was not requested. */
  employee_compensation?: Table<CompensationRecord>;
  /** Absent when performance was not requested. */
  employee_performance?: Table<PerformanceReviewRecord>;
  organization_unit: Table<OrganizationUnit>;
  job_role: Table<JobRole>;
  location: Table<Location>;
}

export type TableName = keyof HrTables;

type TableColumns = { [K in TableName]: NonNullable<HrTables[K]>['columns'] };

export const TABLE_COLUMNS = {
  employee: [
    'employee_id', 'first_name', 'last_name', 'gender', 'birth_date', 'hire_date',
    'termination_date', 'employment_type', 'employment_status', 'location_id',
    'manager_id', 'seniority_level'
  ],
  employee_job_assignment: [
    'employee_id', 'job_id', 'job_title', 'job_family', 'job_level', 'seniority_level',
    'start_date', 'end_date'
  ],
  employee_org_assignment: [
    'employee_id', 'org_id', 'org_name', 'cost_center', 'business_unit', 'start_date', 'end_date'
  ],
  employee_compensation: [
    'employee_id', 'base_salary', 'bonus_target_pct', 'currency', 'start_date', 'end_date',
    'change_reason'
  ],
  employee_performance: [
    'employee_id', 'review_period_year', 'review_date', 'rating', 'rating_label', 'manager_id'
  ],
  organization_unit: ['org_id', 'org_name', 'parent_org_id', 'cost_center', 'business_unit'],
  job_role: ['job_id', 'job_title', 'job_family', 'job_level', 'seniority_level'],
  location: ['location_id', 'city', 'country', 'region', 'latitude', 'longitude']
} as const satisfies TableColumns;

/**
 * Collects rows for one table and freezes them once.
 */
export class TableBuilder<Row> {
  private readonly name: TableName;
  private readonly columns: ReadonlyArray<keyof Row & string>;
  private rows: Row[] = [];
  private built = false;

  constructor(name: TableName, columns: ReadonlyArray<keyof Row & string>) {
    this.name = name;
    this.columns = columns;
  }

  add(row: Row): this {
    if (this.built) {
      throw new Error(`Table ${this.name} has already been built`);
    }
    this.rows.push(row);
    return this;
  }

  addAll(rows: Iterable<Row>): this {
    for (const row of rows) {
      this.add(row);
    }
    return this;
  }

  get size(): number {
    return this.rows.length;
  }

  build(): Table<Row> {
    this.built = true;
    for (const row of this.rows) {
      Object.freeze(row);
    }
    const rows = Object.freeze(this.rows);
    return Object.freeze({ name: this.name, columns: this.columns, rows });
  }
}

export function rowCounts(tables: HrTables): Partial<Record<TableName, number>> {
  const counts: Partial<Record<TableName, number>> = {};
  const all: Array<HrTables[TableName]> = Object.values(tables);
  for (const table of all) {
    if (table) counts[table.name] = table.rows.length;
  }
  return counts;
}
