/**
 * Performance Review Generator
 */

import type { GeneratorConfig } from '../config.js';
import { isoDate, yearOf } from '../dates.js';
import type { SeededRandom } from '../random.js';
import type {
  EmployeeRecord,
  PerformanceRating,
  PerformanceReviewRecord,
  SimulationWindow
} from '../types.js';

export const RATING_DISTRIBUTION: ReadonlyArray<readonly [PerformanceRating, number]> = [
  [1, 0.05],
  [2, 0.15],
  [3, 0.5],
  [4, 0.25],
  [5, 0.05]
];

export const RATING_LABELS: Readonly<Record<PerformanceRating, string>> = {
  1: 'Needs Improvement',
  2: 'Partially Meets Expectations',
  3: 'Meets Expectations',
  4: 'Exceeds Expectations',
  5: 'Outstanding'
};

export class PerformanceReviewGenerator {
  private readonly config: Readonly<GeneratorConfig['performance']>;
  private readonly window: SimulationWindow;

  constructor(config: Readonly<GeneratorConfig['performance']>, window: SimulationWindow) {
    this.config = config;
    this.window = window;
  }

  generate(employee: EmployeeRecord, rng: SeededRandom): PerformanceReviewRecord[] {
    const { reviewMonth, reviewDay, hireCutoffMonth } = this.config;
    const { startDate, endDate } = this.window;
    const reviews: PerformanceReviewRecord[] = [];

    const firstYear = Math.max(yearOf(startDate), yearOf(employee.hire_date));
    for (let year = firstYear; year <= yearOf(endDate); year++) {
      const reviewDate = isoDate(year, reviewMonth, reviewDay);
      if (reviewDate < startDate || reviewDate > endDate) continue;
      if (employee.termination_date !== null && reviewDate >= employee.termination_date) continue;
      // Too little of the year worked
      if (employee.hire_date >= isoDate(year, hireCutoffMonth, 1)) continue;

      const rating = rng.weighted(RATING_DISTRIBUTION);
      reviews.push({
        employee_id: employee.employee_id,
        review_period_year: year,
        review_date: reviewDate,
        rating,
        rating_label: RATING_LABELS[rating],
        manager_id: employee.manager_id
      });
    }
    return reviews;
  }
}
