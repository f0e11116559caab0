/**
 * Compensation Timeline Simulator
 */

import type { GeneratorConfig } from '../config.js';
import { addYears, diffDays, isoDate, yearOf } from '../dates.js';
import type { SeededRandom } from '../random.js';
import type {
  CareerEvent,
  ChangeReason,
  CompensationRecord,
  EmployeeRecord,
  IsoDate,
  JobAssignmentRecord,
  SeniorityLevel,
  SimulationWindow
} from '../types.js';

interface SalaryChange {
  date: IsoDate;
  reason: Exclude<ChangeReason, 'New Hire'>;
  level?: SeniorityLevel;
}

export function roundCurrency(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * The job record in force on `date`: the last one starting on or before it.
 */
export function jobInForce(
  jobs: readonly JobAssignmentRecord[],
  date: IsoDate
): JobAssignmentRecord | undefined {
  let current: JobAssignmentRecord | undefined;
  for (const job of jobs) {
    if (job.start_date <= date) current = job;
  }
  return current;
}

export class CompensationTimelineSimulator {
  private readonly config: Readonly<GeneratorConfig['compensation']>;
  private readonly window: SimulationWindow;

  constructor(config: Readonly<GeneratorConfig['compensation']>, window: SimulationWindow) {
    this.config = config;
    this.window = window;
  }

  bonusTarget(jobLevel: string): number {
    return this.config.bonusTargets[jobLevel] ?? this.config.defaultBonusTarget;
  }

  /**
   * Merit boundaries that qualify for a raise. Promotion dates and the
   * blackout period after each promotion are excluded.
   */
  meritDates(employee: EmployeeRecord, promotionDates: readonly IsoDate[]): IsoDate[] {
    const { meritCycle, meritMinTenureDays, promotionBlackoutDays } = this.config;
    const hire = employee.hire_date;
    const candidates: IsoDate[] = [];

    if (meritCycle.mode === 'calendar') {
      for (let year = yearOf(hire); year <= yearOf(this.window.endDate); year++) {
        candidates.push(isoDate(year, meritCycle.month, meritCycle.day));
      }
    } else {
      for (let k = 1; addYears(hire, k) <= this.window.endDate; k++) {
        candidates.push(addYears(hire, k));
      }
    }

    return candidates.filter((date) =>
      date > hire &&
      date >= this.window.startDate &&
      date <= this.window.endDate &&
      (employee.termination_date === null || date < employee.termination_date) &&
      diffDays(hire, date) >= meritMinTenureDays &&
      promotionDates.every((promoted) => {
        const since = diffDays(promoted, date);
        return since < 0 || since >= Math.max(1, promotionBlackoutDays);
      })
    );
  }

  simulate(
    employee: EmployeeRecord,
    events: readonly CareerEvent[],
    jobs: readonly JobAssignmentRecord[],
    rng: SeededRandom
  ): CompensationRecord[] {
    const { salaryBands, promotionRaise, meritRaise, currency } = this.config;
    const id = employee.employee_id;

    const bonusAt = (date: IsoDate) => {
      const job = jobInForce(jobs, date);
      return this.bonusTarget(job ? job.job_level : '');
    };
    const levelAt = (date: IsoDate): SeniorityLevel =>
      jobInForce(jobs, date)?.seniority_level ?? employee.seniority_level;

    const hireBand = salaryBands[employee.seniority_level];
    const records: CompensationRecord[] = [{
      employee_id: id,
      base_salary: roundCurrency(rng.float(hireBand.min, hireBand.max)),
      bonus_target_pct: bonusAt(employee.hire_date),
      currency,
      start_date: employee.hire_date,
      end_date: null,
      change_reason: 'New Hire'
    }];

    const promotions = events.filter((event) => event.type === 'promotion');
    const changes: SalaryChange[] = [
      ...promotions.map((event): SalaryChange => ({
        date: event.effectiveDate,
        reason: 'Promotion',
        level: event.seniorityLevel
      })),
      ...this.meritDates(employee, promotions.map((event) => event.effectiveDate)).map(
        (date): SalaryChange => ({ date, reason: 'Annual Merit' })
      )
    ].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

    for (const change of changes) {
      const current = records[records.length - 1];
      const prior = current.base_salary;
      let salary: number;

      if (change.reason === 'Promotion') {
        const band = salaryBands[change.level ?? levelAt(change.date)];
        const raised = prior * (1 + rng.float(promotionRaise.min, promotionRaise.max));
        salary = Math.max(prior, roundCurrency(Math.min(band.max, Math.max(band.min, raised))));
      } else {
        const band = salaryBands[levelAt(change.date)];
        const raised = prior * (1 + rng.float(meritRaise.min, meritRaise.max));
        salary = roundCurrency(Math.min(band.max, raised));
        if (salary <= prior) continue;
      }

      current.end_date = change.date;
      records.push({
        employee_id: id,
        base_salary: salary,
        bonus_target_pct: bonusAt(change.date),
        currency,
        start_date: change.date,
        end_date: null,
        change_reason: change.reason
      });
    }

    if (employee.termination_date !== null) {
      records[records.length - 1].end_date = employee.termination_date;
    }
    return records;
  }
}
