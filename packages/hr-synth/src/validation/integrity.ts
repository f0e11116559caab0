/**
 * Post-generation integrity pass.
 *
 * Walks the assembled tables once and reports every violation it finds. A
 * non-empty result means a generator defect, never bad input.
 */

import type { GeneratorConfig } from '../config.js';
import { DataIntegrityError, type IntegrityRule, type IntegrityViolation } from '../errors.js';
import type { ReferenceCatalog } from '../reference/catalog.js';
import type { HrTables, TableName } from '../tables.js';
import type {
  EmployeeRecord,
  IsoDate,
  JobAssignmentRecord,
  OrgAssignmentRecord,
  SimulationWindow
} from '../types.js';

export interface IntegrityContext {
  window: SimulationWindow;
  catalog: ReferenceCatalog;
  salaryBands: Readonly<GeneratorConfig['compensation']['salaryBands']>;
}

interface ChainRecord {
  employee_id: string;
  start_date: IsoDate;
  end_date: IsoDate | null;
}

class ViolationCollector {
  readonly violations: IntegrityViolation[] = [];

  add(rule: IntegrityRule, table: TableName, message: string, employeeId?: string): void {
    this.violations.push({ rule, table, employeeId, message });
  }
}

function groupByEmployee<Row extends { employee_id: string }>(rows: readonly Row[]): Map<string, Row[]> {
  const groups = new Map<string, Row[]>();
  for (const row of rows) {
    const bucket = groups.get(row.employee_id) ?? [];
    bucket.push(row);
    groups.set(row.employee_id, bucket);
  }
  return groups;
}

function byStartDate<Row extends ChainRecord>(rows: readonly Row[]): Row[] {
  return [...rows].sort((a, b) => (a.start_date < b.start_date ? -1 : a.start_date > b.start_date ? 1 : 0));
}

function inForce<Row extends ChainRecord>(chain: readonly Row[], date: IsoDate): Row | undefined {
  let current: Row | undefined;
  for (const row of chain) {
    if (row.start_date <= date) current = row;
  }
  return current;
}

export function validateDataset(tables: HrTables, context: IntegrityContext): IntegrityViolation[] {
  const out = new ViolationCollector();
  const employees = tables.employee.rows;
  const byId = new Map(employees.map((employee) => [employee.employee_id, employee]));

  checkHierarchy(employees, byId, context, out);

  const jobChains = groupByEmployee(tables.employee_job_assignment.rows);
  const orgChains = groupByEmployee(tables.employee_org_assignment.rows);

  checkChains('employee_job_assignment', employees, jobChains, context.window, out);
  checkChains('employee_org_assignment', employees, orgChains, context.window, out);
  checkForeignKeys(tables, byId, context.catalog, out);
  checkJobChains(jobChains, out);
  checkAlignment(jobChains, orgChains, context.catalog, out);

  if (tables.employee_compensation) {
    const compChains = groupByEmployee(tables.employee_compensation.rows);
    checkChains('employee_compensation', employees, compChains, context.window, out);

    for (const [employeeId, chain] of compChains) {
      const jobs = byStartDate(jobChains.get(employeeId) ?? []);
      let prior = 0;
      for (const record of byStartDate(chain)) {
        if (record.base_salary < prior) {
          out.add('salary-monotonicity', 'employee_compensation',
            `${employeeId}: salary fell from ${prior} to ${record.base_salary} on ${record.start_date}`, employeeId);
        }
        prior = record.base_salary;

        const job = inForce(jobs, record.start_date);
        if (job) {
          const band = context.salaryBands[job.seniority_level];
          if (record.base_salary < band.min || record.base_salary > band.max) {
            out.add('salary-band', 'employee_compensation',
              `${employeeId}: salary ${record.base_salary} on ${record.start_date} is outside the level ${job.seniority_level} band`,
              employeeId);
          }
        }
      }
    }
  }

  if (tables.employee_performance) {
    const seen = new Set<string>();
    for (const review of tables.employee_performance.rows) {
      const key = `${review.employee_id}:${review.review_period_year}`;
      if (seen.has(key)) {
        out.add('review-uniqueness', 'employee_performance',
          `${review.employee_id}: more than one review for ${review.review_period_year}`, review.employee_id);
      }
      seen.add(key);

      const employee = byId.get(review.employee_id);
      if (!employee) {
        out.add('foreign-key', 'employee_performance', `unknown employee ${review.employee_id}`, review.employee_id);
      } else if (employee.manager_id !== review.manager_id) {
        out.add('manager-reference', 'employee_performance',
          `${review.employee_id}: review manager ${review.manager_id} differs from ${employee.manager_id}`,
          review.employee_id);
      }
    }
  }

  return out.violations;
}

/**
 * Throw `DataIntegrityError` listing every violation, if there are any.
 */
export function assertDatasetIntegrity(tables: HrTables, context: IntegrityContext): void {
  const violations = validateDataset(tables, context);
  if (violations.length > 0) {
    throw new DataIntegrityError(violations);
  }
}

/**
 * Managers rank strictly above their reports; the root ranks above every level.
 */
function outranks(manager: EmployeeRecord, report: EmployeeRecord): boolean {
  return manager.manager_id === null
    ? manager.seniority_level >= report.seniority_level
    : manager.seniority_level > report.seniority_level;
}

function checkHierarchy(
  employees: readonly EmployeeRecord[],
  byId: ReadonlyMap<string, EmployeeRecord>,
  context: IntegrityContext,
  out: ViolationCollector
): void {
  const roots = employees.filter((employee) => employee.manager_id === null);
  if (roots.length !== 1) {
    out.add('single-root', 'employee', `expected exactly one employee without a manager, found ${roots.length}`);
  } else {
    const top = employees.reduce((max, employee) => Math.max(max, employee.seniority_level), 0);
    if (roots[0].seniority_level !== top) {
      out.add('single-root', 'employee',
        `root ${roots[0].employee_id} is level ${roots[0].seniority_level}, below the maximum ${top}`,
        roots[0].employee_id);
    }
  }

  for (const employee of employees) {
    if (!context.catalog.hasLocation(employee.location_id)) {
      out.add('foreign-key', 'employee', `${employee.employee_id}: unknown location ${employee.location_id}`,
        employee.employee_id);
    }
    if (employee.manager_id === null) continue;

    const manager = byId.get(employee.manager_id);
    if (!manager) {
      out.add('manager-reference', 'employee', `${employee.employee_id}: unknown manager ${employee.manager_id}`,
        employee.employee_id);
    } else if (!outranks(manager, employee)) {
      out.add('manager-seniority', 'employee',
        `${employee.employee_id} (level ${employee.seniority_level}) reports to ${manager.employee_id} (level ${manager.seniority_level})`,
        employee.employee_id);
    }
  }
}

function checkChains<Row extends ChainRecord>(
  table: TableName,
  employees: readonly EmployeeRecord[],
  chains: ReadonlyMap<string, readonly Row[]>,
  window: SimulationWindow,
  out: ViolationCollector
): void {
  for (const employee of employees) {
    const id = employee.employee_id;
    const chain = byStartDate(chains.get(id) ?? []);
    if (chain.length === 0) {
      out.add('chain-contiguity', table, `${id}: no records`, id);
      continue;
    }
    if (chain[0].start_date !== employee.hire_date) {
      out.add('chain-contiguity', table, `${id}: first record starts ${chain[0].start_date}, hired ${employee.hire_date}`, id);
    }

    for (let i = 0; i < chain.length - 1; i++) {
      if (chain[i].end_date !== chain[i + 1].start_date) {
        out.add('chain-contiguity', table,
          `${id}: record ending ${chain[i].end_date ?? 'open'} is followed by one starting ${chain[i + 1].start_date}`, id);
      }
    }

    const last = chain[chain.length - 1];
    if (employee.termination_date !== null) {
      if (last.end_date !== employee.termination_date) {
        out.add('chain-contiguity', table,
          `${id}: terminated ${employee.termination_date} but last record ends ${last.end_date ?? 'open'}`, id);
      }
    } else if (last.end_date !== null || last.start_date > window.endDate) {
      out.add('chain-contiguity', table, `${id}: last record must be open and start by ${window.endDate}`, id);
    }
  }

  const known = new Set(employees.map((employee) => employee.employee_id));
  for (const id of chains.keys()) {
    if (!known.has(id)) {
      out.add('foreign-key', table, `records for unknown employee ${id}`, id);
    }
  }
}

function checkForeignKeys(
  tables: HrTables,
  byId: ReadonlyMap<string, EmployeeRecord>,
  catalog: ReferenceCatalog,
  out: ViolationCollector
): void {
  for (const job of tables.employee_job_assignment.rows) {
    if (!catalog.hasJob(job.job_id)) {
      out.add('foreign-key', 'employee_job_assignment', `${job.employee_id}: unknown job ${job.job_id}`, job.employee_id);
    }
  }
  for (const org of tables.employee_org_assignment.rows) {
    if (!catalog.hasOrg(org.org_id)) {
      out.add('foreign-key', 'employee_org_assignment', `${org.employee_id}: unknown org ${org.org_id}`, org.employee_id);
    }
  }
  for (const record of tables.employee_compensation?.rows ?? []) {
    if (!byId.has(record.employee_id)) {
      out.add('foreign-key', 'employee_compensation', `unknown employee ${record.employee_id}`, record.employee_id);
    }
  }
}

function checkJobChains(jobChains: ReadonlyMap<string, readonly JobAssignmentRecord[]>, out: ViolationCollector): void {
  for (const [id, chain] of jobChains) {
    let level = 0;
    for (const job of byStartDate(chain)) {
      if (job.seniority_level < level) {
        out.add('seniority-monotonicity', 'employee_job_assignment',
          `${id}: level drops to ${job.seniority_level} on ${job.start_date}`, id);
      }
      level = job.seniority_level;
    }
  }
}

function checkAlignment(
  jobChains: ReadonlyMap<string, readonly JobAssignmentRecord[]>,
  orgChains: ReadonlyMap<string, readonly OrgAssignmentRecord[]>,
  catalog: ReferenceCatalog,
  out: ViolationCollector
): void {
  for (const [id, chain] of jobChains) {
    const jobs = byStartDate(chain);
    const orgs = byStartDate(orgChains.get(id) ?? []);
    const boundaries = new Set([...jobs, ...orgs].map((record) => record.start_date));

    for (const date of boundaries) {
      const job = inForce(jobs, date);
      const org = inForce(orgs, date);
      if (!job || !org) continue;
      const expected = catalog.businessUnitFor(job.job_family);
      if (org.business_unit !== expected) {
        out.add('job-org-alignment', 'employee_org_assignment',
          `${id}: on ${date} job family ${job.job_family} sits in ${org.business_unit}, expected ${expected}`, id);
      }
    }
  }
}
