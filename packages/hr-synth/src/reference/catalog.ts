/**
 * Indexed, read-only view over the reference collections.
 */

import { AlignmentError } from '../errors.js';
import {
  SENIORITY_LEVELS,
  type JobRole,
  type Location,
  type NameLists,
  type OrganizationUnit,
  type ReferenceData,
  type SeniorityLevel
} from '../types.js';

export class ReferenceCatalog {
  readonly organizationUnits: readonly OrganizationUnit[];
  readonly jobRoles: readonly JobRole[];
  readonly locations: readonly Location[];
  readonly names: NameLists;

  private readonly familyToBusinessUnit: Readonly<Record<string, string>>;
  private readonly jobsByLevel = new Map<SeniorityLevel, JobRole[]>();
  private readonly orgsByBusinessUnit = new Map<string, OrganizationUnit[]>();
  private readonly jobIds: Set<string>;
  private readonly orgIds: Set<string>;
  private readonly locationIds: Set<string>;

  constructor(reference: ReferenceData, familyToBusinessUnit: Readonly<Record<string, string>> = {}) {
    this.organizationUnits = reference.organizationUnits;
    this.jobRoles = reference.jobRoles;
    this.locations = reference.locations;
    this.names = reference.names;
    this.familyToBusinessUnit = familyToBusinessUnit;

    for (const job of this.jobRoles) {
      const bucket = this.jobsByLevel.get(job.seniority_level) ?? [];
      bucket.push(job);
      this.jobsByLevel.set(job.seniority_level, bucket);
    }

    // Employees are placed in leaf orgs; a unit with no leaves uses all its orgs
    const parents = new Set(
      this.organizationUnits.flatMap((org) => (org.parent_org_id ? [org.parent_org_id] : []))
    );
    const byUnit = new Map<string, OrganizationUnit[]>();
    for (const org of this.organizationUnits) {
      const bucket = byUnit.get(org.business_unit) ?? [];
      bucket.push(org);
      byUnit.set(org.business_unit, bucket);
    }
    for (const [unit, orgs] of byUnit) {
      const leaves = orgs.filter((org) => !parents.has(org.org_id));
      this.orgsByBusinessUnit.set(unit, leaves.length > 0 ? leaves : orgs);
    }

    this.jobIds = new Set(this.jobRoles.map((job) => job.job_id));
    this.orgIds = new Set(this.organizationUnits.map((org) => org.org_id));
    this.locationIds = new Set(this.locations.map((location) => location.location_id));
  }

  businessUnitFor(jobFamily: string): string {
    return this.familyToBusinessUnit[jobFamily] ?? jobFamily;
  }

  jobsAtLevel(level: SeniorityLevel, jobFamily?: string): readonly JobRole[] {
    const jobs = this.jobsByLevel.get(level) ?? [];
    return jobFamily === undefined ? jobs : jobs.filter((job) => job.job_family === jobFamily);
  }

  /**
   * Orgs an employee in `jobFamily` may be placed in.
   */
  compatibleOrgs(jobFamily: string): readonly OrganizationUnit[] {
    return this.orgsByBusinessUnit.get(this.businessUnitFor(jobFamily)) ?? [];
  }

  hasJob(jobId: string): boolean {
    return this.jobIds.has(jobId);
  }

  hasOrg(orgId: string): boolean {
    return this.orgIds.has(orgId);
  }

  hasLocation(locationId: string): boolean {
    return this.locationIds.has(locationId);
  }

  /**
   * Every level needs at least one job and every job family at least one
   * org in its business unit.
   */
  assertAlignment(): void {
    for (const level of SENIORITY_LEVELS) {
      if (this.jobsAtLevel(level).length === 0) {
        throw new AlignmentError(`Job catalog has no role at seniority level ${level}`, { level });
      }
    }

    const families = new Set(this.jobRoles.map((job) => job.job_family));
    for (const family of families) {
      if (this.compatibleOrgs(family).length === 0) {
        throw new AlignmentError(
          `No organization unit in business unit "${this.businessUnitFor(family)}" for job family "${family}"`,
          { jobFamily: family, businessUnit: this.businessUnitFor(family) }
        );
      }
    }
  }
}
