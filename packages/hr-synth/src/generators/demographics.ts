/**
 * Demographics Generator
 *
 * Samples the employee master row for one hierarchy slot. Ages follow the
 * slot's seniority band; hire dates follow a career that starts at
 * `careerStartAge`.
 */

import type { GeneratorConfig } from '../config.js';
import { addDays, addYears, diffDays, isoDate, maxDate, yearOf } from '../dates.js';
import type { SeededRandom } from '../random.js';
import type { ReferenceCatalog } from '../reference/catalog.js';
import type {
  EmployeeRecord,
  EmploymentType,
  Gender,
  IsoDate,
  SimulationWindow
} from '../types.js';
import type { HierarchySlot } from './hierarchy.js';

const DAYS_PER_YEAR = 365.25;

export interface DemographicsInput {
  slot: HierarchySlot;
  managerId: string | null;
  /** Only employees with no direct reports (never the CEO) may leave. */
  canTerminate: boolean;
}

export class DemographicsGenerator {
  private readonly config: Readonly<GeneratorConfig['demographics']>;
  private readonly catalog: ReferenceCatalog;
  private readonly window: SimulationWindow;

  constructor(
    config: Readonly<GeneratorConfig['demographics']>,
    catalog: ReferenceCatalog,
    window: SimulationWindow
  ) {
    this.config = config;
    this.catalog = catalog;
    this.window = window;
  }

  generate(input: DemographicsInput, rng: SeededRandom): EmployeeRecord {
    const { slot } = input;
    const band = this.config.ageBands[slot.seniorityLevel];
    const age = rng.int(band.min, band.max);

    const gender = rng.weighted<Gender>([
      ['female', this.config.gender.female],
      ['male', this.config.gender.male],
      ['na', this.config.gender.na]
    ]);
    const firstName = rng.pick(this.firstNames(gender));
    const lastName = rng.pick(this.catalog.names.last_names);

    // Age at end_date is exactly `age`
    const birthDate = addDays(addYears(this.window.endDate, -age), -rng.int(0, 364));
    const hireDate = this.sampleHireDate(age, rng);

    const employmentType = rng.weighted<EmploymentType>([
      ['Full-time', this.config.employmentType.fullTime],
      ['Contract', this.config.employmentType.contract],
      ['Part-time', this.config.employmentType.partTime]
    ]);
    const location = rng.pick(this.catalog.locations);

    const terminationDate = input.canTerminate ? this.sampleTermination(hireDate, rng) : null;

    return {
      employee_id: slot.employeeId,
      first_name: firstName,
      last_name: lastName,
      gender,
      birth_date: birthDate,
      hire_date: hireDate,
      termination_date: terminationDate,
      employment_type: employmentType,
      employment_status: terminationDate === null ? 'Active' : 'Terminated',
      location_id: location.location_id,
      manager_id: input.managerId,
      seniority_level: slot.seniorityLevel
    };
  }

  private firstNames(gender: Gender): readonly string[] {
    switch (gender) {
      case 'female':
        return this.catalog.names.female_first_names;
      case 'male':
        return this.catalog.names.male_first_names;
      case 'na':
        return this.catalog.names.neutral_first_names;
    }
  }

  /**
   * Uniform between Jan 1 of the career-start year and end_date. A career that
   * would start after end_date hires on end_date.
   */
  private sampleHireDate(age: number, rng: SeededRandom): IsoDate {
    const { endDate } = this.window;
    const careerStartYear = yearOf(endDate) - age + this.config.careerStartAge;
    const earliest = maxDate(isoDate(careerStartYear, 1, 1), this.config.earliestHireDate);

    if (earliest >= endDate) {
      return endDate;
    }
    return addDays(earliest, rng.int(0, diffDays(earliest, endDate)));
  }

  private sampleTermination(hireDate: IsoDate, rng: SeededRandom): IsoDate | null {
    const rate = this.config.annualAttritionRate;
    if (rate <= 0) {
      return null;
    }
    const from = maxDate(hireDate, this.window.startDate);
    const waitDays = Math.max(1, Math.ceil(rng.exponential(DAYS_PER_YEAR / rate)));
    const terminationDate = addDays(from, waitDays);
    return terminationDate <= this.window.endDate ? terminationDate : null;
  }
}
