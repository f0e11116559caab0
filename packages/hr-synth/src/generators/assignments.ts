/**
 * Assignment Timeline Simulator
 *
 * Turns career events into the job and org chains of one employee. The org in
 * force always belongs to the business unit of the job family in force.
 */

import { AlignmentError } from '../errors.js';
import type { SeededRandom } from '../random.js';
import type { ReferenceCatalog } from '../reference/catalog.js';
import type {
  CareerEvent,
  EmployeeRecord,
  IsoDate,
  JobAssignmentRecord,
  JobRole,
  OrgAssignmentRecord,
  OrganizationUnit,
  SeniorityLevel
} from '../types.js';

export interface AssignmentTimeline {
  jobs: JobAssignmentRecord[];
  orgs: OrgAssignmentRecord[];
}

export class AssignmentTimelineSimulator {
  private readonly catalog: ReferenceCatalog;

  constructor(catalog: ReferenceCatalog) {
    this.catalog = catalog;
  }

  simulate(employee: EmployeeRecord, events: readonly CareerEvent[], rng: SeededRandom): AssignmentTimeline {
    const id = employee.employee_id;
    const firstJob = rng.pick(this.jobsAt(employee.seniority_level));
    const jobs = [jobRecord(id, firstJob, employee.hire_date)];
    const orgs = [orgRecord(id, rng.pick(this.orgsFor(firstJob.job_family)), employee.hire_date)];

    for (const event of events) {
      const date = event.effectiveDate;
      const currentJob = jobs[jobs.length - 1];
      const currentOrg = orgs[orgs.length - 1];

      if (event.type === 'promotion') {
        const sameFamily = this.catalog.jobsAtLevel(event.seniorityLevel, currentJob.job_family);
        const job = rng.pick(sameFamily.length > 0 ? sameFamily : this.jobsAt(event.seniorityLevel));
        currentJob.end_date = date;
        jobs.push(jobRecord(id, job, date));

        // A lateral move into another business unit takes the org with it
        if (this.catalog.businessUnitFor(job.job_family) !== currentOrg.business_unit) {
          currentOrg.end_date = date;
          orgs.push(orgRecord(id, rng.pick(this.orgsFor(job.job_family)), date));
        }
        continue;
      }

      if (currentOrg.start_date === date) {
        continue;
      }
      const others = this.orgsFor(currentJob.job_family).filter((org) => org.org_id !== currentOrg.org_id);
      if (others.length === 0) {
        continue;
      }
      currentOrg.end_date = date;
      orgs.push(orgRecord(id, rng.pick(others), date));
    }

    if (employee.termination_date !== null) {
      jobs[jobs.length - 1].end_date = employee.termination_date;
      orgs[orgs.length - 1].end_date = employee.termination_date;
    }

    return { jobs, orgs };
  }

  private jobsAt(level: SeniorityLevel): readonly JobRole[] {
    const jobs = this.catalog.jobsAtLevel(level);
    if (jobs.length === 0) {
      throw new AlignmentError(`Job catalog has no role at seniority level ${level}`, { level });
    }
    return jobs;
  }

  private orgsFor(jobFamily: string): readonly OrganizationUnit[] {
    const orgs = this.catalog.compatibleOrgs(jobFamily);
    if (orgs.length === 0) {
      throw new AlignmentError(`No organization unit is compatible with job family "${jobFamily}"`, {
        jobFamily,
        businessUnit: this.catalog.businessUnitFor(jobFamily)
      });
    }
    return orgs;
  }
}

function jobRecord(employeeId: string, job: JobRole, startDate: IsoDate): JobAssignmentRecord {
  return {
    employee_id: employeeId,
    job_id: job.job_id,
    job_title: job.job_title,
    job_family: job.job_family,
    job_level: job.job_level,
    seniority_level: job.seniority_level,
    start_date: startDate,
    end_date: null
  };
}

function orgRecord(employeeId: string, org: OrganizationUnit, startDate: IsoDate): OrgAssignmentRecord {
  return {
    employee_id: employeeId,
    org_id: org.org_id,
    org_name: org.org_name,
    cost_center: org.cost_center,
    business_unit: org.business_unit,
    start_date: startDate,
    end_date: null
  };
}
