/**
 * Career Event Scheduler
 *
 * Promotions and transfers are two independent renewal processes over the
 * employed part of the window. Each gap is a fixed minimum plus an exponential
 * tail, so a window shorter than the minimum produces nothing.
 */

import type { GeneratorConfig } from '../config.js';
import { addDays, maxDate, minDate } from '../dates.js';
import type { SeededRandom } from '../random.js';
import type { CareerEvent, EmployeeRecord, IsoDate, SimulationWindow, SeniorityLevel } from '../types.js';

const DAYS_PER_YEAR = 365.25;

const EVENT_ORDER: Record<CareerEvent['type'], number> = {
  promotion: 0,
  transfer: 1
};

/**
 * Chronological order; a promotion precedes a transfer on the same day.
 */
export function sortEvents(events: readonly CareerEvent[]): CareerEvent[] {
  return [...events].sort((a, b) =>
    a.effectiveDate < b.effectiveDate ? -1
    : a.effectiveDate > b.effectiveDate ? 1
    : EVENT_ORDER[a.type] - EVENT_ORDER[b.type]
  );
}

export class CareerEventScheduler {
  private readonly config: Readonly<GeneratorConfig['career']>;
  private readonly window: SimulationWindow;

  constructor(config: Readonly<GeneratorConfig['career']>, window: SimulationWindow) {
    this.config = config;
    this.window = window;
  }

  /**
   * Mean promotion gap in days at `level`: faster while more levels remain.
   */
  promotionMeanDays(level: SeniorityLevel): number {
    return ((this.config.promotion.baseIntervalYears * 4) / (5 - level)) * DAYS_PER_YEAR;
  }

  schedule(employee: EmployeeRecord, rng: SeededRandom): CareerEvent[] {
    const anchor = maxDate(employee.hire_date, this.window.startDate);
    const last = employee.termination_date === null
      ? this.window.endDate
      : minDate(this.window.endDate, addDays(employee.termination_date, -1));

    if (last <= anchor) {
      return [];
    }

    const events: CareerEvent[] = [];

    let level = employee.seniority_level;
    let cursor = anchor;
    while (level < 5) {
      const { minIntervalDays } = this.config.promotion;
      const date = this.nextDate(cursor, minIntervalDays, this.promotionMeanDays(level), rng);
      if (date > last) break;
      level = nextLevel(level);
      events.push({
        employeeId: employee.employee_id,
        type: 'promotion',
        effectiveDate: date,
        seniorityLevel: level
      });
      cursor = date;
    }

    const transferLevel = (date: IsoDate): SeniorityLevel => {
      let current = employee.seniority_level;
      for (const event of events) {
        if (event.type === 'promotion' && event.effectiveDate <= date) {
          current = event.seniorityLevel;
        }
      }
      return current;
    };

    const { meanIntervalYears, minIntervalDays } = this.config.transfer;
    cursor = anchor;
    for (;;) {
      const date = this.nextDate(cursor, minIntervalDays, meanIntervalYears * DAYS_PER_YEAR, rng);
      if (date > last) break;
      events.push({
        employeeId: employee.employee_id,
        type: 'transfer',
        effectiveDate: date,
        seniorityLevel: transferLevel(date)
      });
      cursor = date;
    }

    return sortEvents(events);
  }

  private nextDate(from: IsoDate, minDays: number, meanDays: number, rng: SeededRandom): IsoDate {
    const tail = Math.round(rng.exponential(Math.max(0, meanDays - minDays)));
    return addDays(from, minDays + tail);
  }
}

function nextLevel(level: SeniorityLevel): SeniorityLevel {
  switch (level) {
    case 1:
      return 2;
    case 2:
      return 3;
    case 3:
      return 4;
    case 4:
    case 5:
      return 5;
  }
}
