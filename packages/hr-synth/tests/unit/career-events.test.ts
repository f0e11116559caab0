/**
 * CareerEventScheduler - Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { createConfig } from '../../src/config.js';
import { diffDays } from '../../src/dates.js';
import { CareerEventScheduler, sortEvents } from '../../src/generators/career-events.js';
import { SeededRandom } from '../../src/random.js';
import type { CareerEvent, SimulationWindow } from '../../src/types.js';
import { testEmployee } from '../fixtures.js';

const WINDOW: SimulationWindow = { startDate: '2010-01-01', endDate: '2024-12-31' };

const scheduler = (window: SimulationWindow = WINDOW) =>
  new CareerEventScheduler(createConfig().career, window);

describe('CareerEventScheduler', () => {
  it('should scale the promotion mean with the levels remaining', () => {
    expect(scheduler().promotionMeanDays(1)).toBe(1095.75);
    expect(scheduler().promotionMeanDays(4)).toBe(4383);
  });

  it('should produce nothing in a window shorter than the minimum gap', () => {
    const short = scheduler({ startDate: '2020-01-01', endDate: '2020-12-30' });
    for (let seed = 0; seed < 50; seed++) {
      expect(short.schedule(testEmployee({ hire_date: '2015-01-01' }), new SeededRandom(seed))).toEqual([]);
    }
  });

  it('should keep every event inside the employed window', () => {
    const employee = testEmployee({ hire_date: '2012-06-15' });
    for (let seed = 0; seed < 200; seed++) {
      for (const event of scheduler().schedule(employee, new SeededRandom(seed))) {
        expect(event.employeeId).toBe(employee.employee_id);
        expect(event.effectiveDate > employee.hire_date).toBe(true);
        expect(event.effectiveDate <= WINDOW.endDate).toBe(true);
      }
    }
  });

  it('should promote one level at a time with at least the minimum gap', () => {
    const employee = testEmployee({ hire_date: '2005-01-01', seniority_level: 1 });
    let promoted = 0;
    for (let seed = 0; seed < 200; seed++) {
      const promotions = scheduler()
        .schedule(employee, new SeededRandom(seed))
        .filter((event) => event.type === 'promotion');
      let level = 1;
      let previous = WINDOW.startDate;
      for (const promotion of promotions) {
        expect(promotion.seniorityLevel).toBe(level + 1);
        expect(diffDays(previous, promotion.effectiveDate)).toBeGreaterThanOrEqual(365);
        level = promotion.seniorityLevel;
        previous = promotion.effectiveDate;
        promoted++;
      }
      expect(level).toBeLessThanOrEqual(5);
    }
    expect(promoted).toBeGreaterThan(0);
  });

  it('should never promote beyond level 5', () => {
    const ceo = testEmployee({ hire_date: '2000-01-01', seniority_level: 5, manager_id: null });
    for (let seed = 0; seed < 100; seed++) {
      const events = scheduler().schedule(ceo, new SeededRandom(seed));
      expect(events.filter((event) => event.type === 'promotion')).toEqual([]);
      for (const event of events) {
        expect(event.seniorityLevel).toBe(5);
      }
    }
  });

  it('should carry the level in force on transfers', () => {
    const employee = testEmployee({ hire_date: '2005-01-01', seniority_level: 2 });
    for (let seed = 0; seed < 100; seed++) {
      let level = 2;
      for (const event of scheduler().schedule(employee, new SeededRandom(seed))) {
        if (event.type === 'promotion') level = event.seniorityLevel;
        else expect(event.seniorityLevel).toBe(level);
      }
    }
  });

  it('should stop before the termination date', () => {
    const employee = testEmployee({
      hire_date: '2005-01-01',
      termination_date: '2016-03-01',
      employment_status: 'Terminated'
    });
    for (let seed = 0; seed < 100; seed++) {
      for (const event of scheduler().schedule(employee, new SeededRandom(seed))) {
        expect(event.effectiveDate < '2016-03-01').toBe(true);
      }
    }
  });

  it('should return events in chronological order', () => {
    const employee = testEmployee({ hire_date: '2001-01-01' });
    for (let seed = 0; seed < 100; seed++) {
      const events = scheduler().schedule(employee, new SeededRandom(seed));
      for (let i = 1; i < events.length; i++) {
        expect(events[i].effectiveDate >= events[i - 1].effectiveDate).toBe(true);
      }
    }
  });
});

describe('sortEvents', () => {
  it('should place a promotion before a transfer on the same day', () => {
    const transfer: CareerEvent = { employeeId: 'E', type: 'transfer', effectiveDate: '2020-05-01', seniorityLevel: 2 };
    const promotion: CareerEvent = { employeeId: 'E', type: 'promotion', effectiveDate: '2020-05-01', seniorityLevel: 2 };
    const earlier: CareerEvent = { employeeId: 'E', type: 'transfer', effectiveDate: '2019-01-01', seniorityLevel: 1 };
    expect(sortEvents([transfer, promotion, earlier])).toEqual([earlier, promotion, transfer]);
  });
});
