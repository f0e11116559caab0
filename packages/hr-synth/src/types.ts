/**
 * Core types and interfaces for hr-synth
 */

import { z } from 'zod';

/** Calendar date as `YYYY-MM-DD`. Sorts chronologically as a string. */
export type IsoDate = string;

export const SENIORITY_LEVELS = [1, 2, 3, 4, 5] as const;
export type SeniorityLevel = typeof SENIORITY_LEVELS[number];

export const SeniorityLevelSchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5)
]);

export type Gender = 'female' | 'male' | 'na';
export type EmploymentType = 'Full-time' | 'Contract' | 'Part-time';
export type EmploymentStatus = 'Active' | 'Terminated';
export type ChangeReason = 'New Hire' | 'Annual Merit' | 'Promotion';

// Reference collections (collaborator contract)
export const OrganizationUnitSchema = z.object({
  org_id: z.string().min(1),
  org_name: z.string().min(1),
  parent_org_id: z.string().nullable(),
  cost_center: z.string(),
  business_unit: z.string().min(1)
});
export type OrganizationUnit = z.infer<typeof OrganizationUnitSchema>;

export const JobRoleSchema = z.object({
  job_id: z.string().min(1),
  job_title: z.string().min(1),
  job_family: z.string().min(1),
  job_level: z.string().min(1),
  seniority_level: SeniorityLevelSchema
});
export type JobRole = z.infer<typeof JobRoleSchema>;

export const LocationSchema = z.object({
  location_id: z.string().min(1),
  city: z.string(),
  country: z.string(),
  region: z.string(),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180)
});
export type Location = z.infer<typeof LocationSchema>;

export const NameListsSchema = z.object({
  female_first_names: z.array(z.string().min(1)).min(1),
  male_first_names: z.array(z.string().min(1)).min(1),
  neutral_first_names: z.array(z.string().min(1)).min(1),
  last_names: z.array(z.string().min(1)).min(1)
});
export type NameLists = z.infer<typeof NameListsSchema>;

export interface ReferenceData {
  organizationUnits: readonly OrganizationUnit[];
  jobRoles: readonly JobRole[];
  locations: readonly Location[];
  names: NameLists;
}

// Hub and satellite records (column names are the table contract)
export interface EmployeeRecord {
  employee_id: string;
  first_name: string;
  last_name: string;
  gender: Gender;
  birth_date: IsoDate;
  hire_date: IsoDate;
  termination_date: IsoDate | null;
  employment_type: EmploymentType;
  employment_status: EmploymentStatus;
  location_id: string;
  manager_id: string | null;
  seniority_level: SeniorityLevel;
}

export interface JobAssignmentRecord {
  employee_id: string;
  job_id: string;
  job_title: string;
  job_family: string;
  job_level: string;
  seniority_level: SeniorityLevel;
  start_date: IsoDate;
  end_date: IsoDate | null;
}

export interface OrgAssignmentRecord {
  employee_id: string;
  org_id: string;
  org_name: string;
  cost_center: string;
  business_unit: string;
  start_date: IsoDate;
  end_date: IsoDate | null;
}

export interface CompensationRecord {
  employee_id: string;
  base_salary: number;
  bonus_target_pct: number;
  currency: string;
  start_date: IsoDate;
  end_date: IsoDate | null;
  change_reason: ChangeReason;
}

export interface PerformanceReviewRecord {
  employee_id: string;
  review_period_year: number;
  review_date: IsoDate;
  rating: PerformanceRating;
  rating_label: string;
  manager_id: string | null;
}

export type PerformanceRating = 1 | 2 | 3 | 4 | 5;

/** Ephemeral; consumed by the timeline simulators, never tabulated. */
export interface CareerEvent {
  employeeId: string;
  type: 'promotion' | 'transfer';
  effectiveDate: IsoDate;
  /** Level after the event; unchanged for transfers. */
  seniorityLevel: SeniorityLevel;
}

/** Inclusive simulation window. */
export interface SimulationWindow {
  startDate: IsoDate;
  endDate: IsoDate;
}

// Generation request
export const MAX_SEED = 0xffffffff;

const DateInputSchema = z.union([z.string(), z.date()]);

export const GenerateRequestSchema = z.object({
  nEmployees: z.number().int().min(1),
  startDate: DateInputSchema,
  endDate: DateInputSchema,
  // Stream derivation reads the seed as uint32
  seed: z.number().int().min(0).max(MAX_SEED).optional(),
  includePerformance: z.boolean().optional().default(true),
  includeCompensation: z.boolean().optional().default(true)
});

export type GenerateRequest = z.input<typeof GenerateRequestSchema>;
