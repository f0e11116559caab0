/**
 * Small in-memory reference catalogs for unit tests
 */

import type {
  EmployeeRecord,
  JobRole,
  Location,
  NameLists,
  OrganizationUnit,
  ReferenceData,
  SeniorityLevel
} from '../src/types.js';

export const TEST_ORGS: OrganizationUnit[] = [
  { org_id: 'ROOT', org_name: 'Company', parent_org_id: null, cost_center: 'CC-0', business_unit: 'Corporate' },
  { org_id: 'ENG', org_name: 'Engineering', parent_org_id: 'ROOT', cost_center: 'CC-1', business_unit: 'Engineering' },
  { org_id: 'ENG-A', org_name: 'Platform', parent_org_id: 'ENG', cost_center: 'CC-11', business_unit: 'Engineering' },
  { org_id: 'ENG-B', org_name: 'Data', parent_org_id: 'ENG', cost_center: 'CC-12', business_unit: 'Engineering' },
  { org_id: 'SAL', org_name: 'Sales', parent_org_id: 'ROOT', cost_center: 'CC-2', business_unit: 'Sales' },
  { org_id: 'SAL-A', org_name: 'Field Sales', parent_org_id: 'SAL', cost_center: 'CC-21', business_unit: 'Sales' },
  { org_id: 'COR-A', org_name: 'Finance', parent_org_id: 'ROOT', cost_center: 'CC-31', business_unit: 'Corporate' }
];

export function job(family: string, level: SeniorityLevel, jobLevel = level >= 5 ? 'Director' : level === 4 ? 'Manager' : 'IC'): JobRole {
  return {
    job_id: `${family.slice(0, 3).toUpperCase()}-${level}`,
    job_title: `${family} ${level}`,
    job_family: family,
    job_level: jobLevel,
    seniority_level: level
  };
}

export const TEST_JOBS: JobRole[] = [
  job('Engineering', 1), job('Engineering', 2), job('Engineering', 3), job('Engineering', 4), job('Engineering', 5),
  job('Sales', 1), job('Sales', 2), job('Sales', 3)
];

export const TEST_LOCATIONS: Location[] = [
  { location_id: 'LOC-A', city: 'Springfield', country: 'Testland', region: 'North', latitude: 10, longitude: 20 },
  { location_id: 'LOC-B', city: 'Shelbyville', country: 'Testland', region: 'South', latitude: -10, longitude: -20 }
];

export const TEST_NAMES: NameLists = {
  female_first_names: ['Ada', 'Bea'],
  male_first_names: ['Cal', 'Dov'],
  neutral_first_names: ['Eli'],
  last_names: ['Stone', 'Rivers', 'Fields']
};

export function testReference(overrides: Partial<ReferenceData> = {}): ReferenceData {
  return {
    organizationUnits: TEST_ORGS,
    jobRoles: TEST_JOBS,
    locations: TEST_LOCATIONS,
    names: TEST_NAMES,
    ...overrides
  };
}

export function testEmployee(overrides: Partial<EmployeeRecord> = {}): EmployeeRecord {
  return {
    employee_id: 'EMP000002',
    first_name: 'Ada',
    last_name: 'Stone',
    gender: 'female',
    birth_date: '1990-05-05',
    hire_date: '2018-03-01',
    termination_date: null,
    employment_type: 'Full-time',
    employment_status: 'Active',
    location_id: 'LOC-A',
    manager_id: 'EMP000001',
    seniority_level: 1,
    ...overrides
  };
}

/** Whole years between two ISO dates. */
export function ageAt(birthDate: string, date: string): number {
  const [by, bm, bd] = birthDate.split('-').map(Number);
  const [y, m, d] = date.split('-').map(Number);
  return y - by - (m < bm || (m === bm && d < bd) ? 1 : 0);
}
