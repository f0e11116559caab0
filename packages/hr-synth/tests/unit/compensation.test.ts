/**
 * CompensationTimelineSimulator - Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { createConfig, type GeneratorConfigInput } from '../../src/config.js';
import {
  CompensationTimelineSimulator,
  jobInForce,
  roundCurrency
} from '../../src/generators/compensation.js';
import { SeededRandom } from '../../src/random.js';
import type { CareerEvent, JobAssignmentRecord, SimulationWindow } from '../../src/types.js';
import { testEmployee } from '../fixtures.js';

const WINDOW: SimulationWindow = { startDate: '2020-01-01', endDate: '2023-12-31' };

const wideBand = { min: 50_000, max: 1_000_000 };
const WIDE_BANDS: GeneratorConfigInput = {
  compensation: { salaryBands: { 1: wideBand, 2: wideBand, 3: wideBand, 4: wideBand, 5: wideBand } }
};

function simulator(config: GeneratorConfigInput = {}, window: SimulationWindow = WINDOW) {
  return new CompensationTimelineSimulator(createConfig(config).compensation, window);
}

function jobRecord(overrides: Partial<JobAssignmentRecord>): JobAssignmentRecord {
  return {
    employee_id: 'EMP000002',
    job_id: 'ENG-1',
    job_title: 'Engineering 1',
    job_family: 'Engineering',
    job_level: 'IC',
    seniority_level: 1,
    start_date: '2020-01-15',
    end_date: null,
    ...overrides
  };
}

describe('CompensationTimelineSimulator', () => {
  describe('meritDates', () => {
    const hired = testEmployee({ hire_date: '2020-01-15' });

    it('should skip boundaries inside the minimum tenure', () => {
      // 2020-04-01 is 77 days after hire
      expect(simulator().meritDates(hired, [])).toEqual(['2021-04-01', '2022-04-01', '2023-04-01']);
    });

    it('should skip boundaries in the blackout after a promotion', () => {
      expect(simulator().meritDates(hired, ['2021-01-01'])).toEqual(['2022-04-01', '2023-04-01']);
    });

    it('should skip a boundary that falls on a promotion date', () => {
      expect(simulator({ compensation: { promotionBlackoutDays: 0 } }).meritDates(hired, ['2022-04-01']))
        .toEqual(['2021-04-01', '2023-04-01']);
    });

    it('should use hire anniversaries in anniversary mode', () => {
      expect(simulator({ compensation: { meritCycle: { mode: 'anniversary' } } }).meritDates(hired, []))
        .toEqual(['2021-01-15', '2022-01-15', '2023-01-15']);
    });

    it('should ignore boundaries before the window start', () => {
      const veteran = testEmployee({ hire_date: '2015-06-01' });
      expect(simulator({}, { startDate: '2020-01-01', endDate: '2021-12-31' }).meritDates(veteran, []))
        .toEqual(['2020-04-01', '2021-04-01']);
    });

    it('should stop before termination', () => {
      const leaver = testEmployee({ hire_date: '2020-01-15', termination_date: '2022-04-01', employment_status: 'Terminated' });
      expect(simulator().meritDates(leaver, [])).toEqual(['2021-04-01']);
    });
  });

  describe('simulate', () => {
    it('should open a New Hire record inside the band', () => {
      const employee = testEmployee({ hire_date: '2020-01-15' });
      for (let seed = 0; seed < 50; seed++) {
        const [first] = simulator().simulate(employee, [], [jobRecord({})], new SeededRandom(seed));
        expect(first.change_reason).toBe('New Hire');
        expect(first.start_date).toBe('2020-01-15');
        expect(first.currency).toBe('USD');
        expect(first.bonus_target_pct).toBe(0.1);
        expect(first.base_salary).toBeGreaterThanOrEqual(50_000);
        expect(first.base_salary).toBeLessThanOrEqual(75_000);
        expect(roundCurrency(first.base_salary)).toBe(first.base_salary);
      }
    });

    it('should chain annual merit records with raises in range', () => {
      const employee = testEmployee({ hire_date: '2020-01-15' });
      const records = simulator(WIDE_BANDS).simulate(employee, [], [jobRecord({})], new SeededRandom(3));

      expect(records.map((r) => [r.change_reason, r.start_date, r.end_date])).toEqual([
        ['New Hire', '2020-01-15', '2021-04-01'],
        ['Annual Merit', '2021-04-01', '2022-04-01'],
        ['Annual Merit', '2022-04-01', '2023-04-01'],
        ['Annual Merit', '2023-04-01', null]
      ]);
      for (let i = 1; i < records.length; i++) {
        const raise = records[i].base_salary / records[i - 1].base_salary - 1;
        expect(raise).toBeGreaterThanOrEqual(0.02 - 1e-4);
        expect(raise).toBeLessThanOrEqual(0.05 + 1e-4);
      }
    });

    it('should cap merit at the band maximum and skip raises that bring nothing', () => {
      const tight = { min: 50_000, max: 50_000 };
      const employee = testEmployee({ hire_date: '2020-01-15' });
      const records = simulator({
        compensation: { salaryBands: { 1: tight, 2: tight, 3: tight, 4: tight, 5: tight } }
      }).simulate(employee, [], [jobRecord({})], new SeededRandom(3));
      expect(records).toEqual([
        {
          employee_id: 'EMP000002',
          base_salary: 50_000,
          bonus_target_pct: 0.1,
          currency: 'USD',
          start_date: '2020-01-15',
          end_date: null,
          change_reason: 'New Hire'
        }
      ]);
    });

    it('should raise into the new band on promotion and follow the new job level bonus', () => {
      const employee = testEmployee({ hire_date: '2019-02-01', seniority_level: 3 });
      const events: CareerEvent[] = [
        { employeeId: 'EMP000002', type: 'promotion', effectiveDate: '2021-06-01', seniorityLevel: 4 }
      ];
      const jobs = [
        jobRecord({ seniority_level: 3, start_date: '2019-02-01', end_date: '2021-06-01' }),
        jobRecord({ job_id: 'ENG-4', job_level: 'Manager', seniority_level: 4, start_date: '2021-06-01' })
      ];

      for (let seed = 0; seed < 30; seed++) {
        const records = simulator().simulate(employee, events, jobs, new SeededRandom(seed));
        const promoted = records.find((r) => r.change_reason === 'Promotion');
        expect(promoted).toBeDefined();
        if (!promoted) continue;

        const before = records[records.indexOf(promoted) - 1];
        expect(promoted.start_date).toBe('2021-06-01');
        expect(before.end_date).toBe('2021-06-01');
        expect(promoted.bonus_target_pct).toBe(0.15);
        expect(promoted.base_salary).toBeGreaterThanOrEqual(130_000);
        expect(promoted.base_salary).toBeLessThanOrEqual(200_000);
        expect(promoted.base_salary).toBeGreaterThanOrEqual(before.base_salary);
        // Merit resumes once the blackout after the promotion has passed
        expect(records.some((r) => r.start_date === '2022-04-01' && r.change_reason === 'Annual Merit')).toBe(true);
      }
    });

    it('should keep salaries non-decreasing', () => {
      const employee = testEmployee({ hire_date: '2015-01-01', seniority_level: 1 });
      const events: CareerEvent[] = [
        { employeeId: 'EMP000002', type: 'promotion', effectiveDate: '2020-09-01', seniorityLevel: 2 },
        { employeeId: 'EMP000002', type: 'promotion', effectiveDate: '2022-10-01', seniorityLevel: 3 }
      ];
      const jobs = [
        jobRecord({ start_date: '2015-01-01', end_date: '2020-09-01' }),
        jobRecord({ seniority_level: 2, start_date: '2020-09-01', end_date: '2022-10-01' }),
        jobRecord({ seniority_level: 3, start_date: '2022-10-01' })
      ];
      for (let seed = 0; seed < 50; seed++) {
        const records = simulator().simulate(employee, events, jobs, new SeededRandom(seed));
        for (let i = 1; i < records.length; i++) {
          expect(records[i].base_salary).toBeGreaterThanOrEqual(records[i - 1].base_salary);
          expect(records[i - 1].end_date).toBe(records[i].start_date);
        }
      }
    });

    it('should close the last record at termination', () => {
      const employee = testEmployee({ hire_date: '2020-01-15', termination_date: '2020-11-30', employment_status: 'Terminated' });
      const records = simulator().simulate(employee, [], [jobRecord({})], new SeededRandom(1));
      expect(records).toHaveLength(1);
      expect(records[0].end_date).toBe('2020-11-30');
    });
  });

  it('should fall back to the default bonus target', () => {
    expect(simulator().bonusTarget('Director')).toBe(0.2);
    expect(simulator().bonusTarget('Fellow')).toBe(0.1);
  });

  it('should round to cents', () => {
    expect(roundCurrency(1234.5678)).toBe(1234.57);
    expect(roundCurrency(10)).toBe(10);
  });

  it('should find the job in force on a date', () => {
    const jobs = [
      jobRecord({ job_id: 'A', start_date: '2020-01-01', end_date: '2021-01-01' }),
      jobRecord({ job_id: 'B', start_date: '2021-01-01' })
    ];
    expect(jobInForce(jobs, '2019-12-31')).toBeUndefined();
    expect(jobInForce(jobs, '2020-12-31')?.job_id).toBe('A');
    expect(jobInForce(jobs, '2021-01-01')?.job_id).toBe('B');
  });
});
