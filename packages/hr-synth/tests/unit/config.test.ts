/**
 * Generator configuration - Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { configFromEnv, createConfig } from '../../src/config.js';
import { ConfigurationError } from '../../src/errors.js';

const distribution = (percents: [number, number, number, number, number]) => ({
  1: { percent: percents[0] },
  2: { percent: percents[1] },
  3: { percent: percents[2] },
  4: { percent: percents[3] },
  5: { percent: percents[4], minCount: 1 }
});

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) return error.issues;
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('createConfig', () => {
  it('should fill every default', () => {
    const config = createConfig();
    expect(config.seniority.ceoMode).toBe('highest-level-5');
    expect(config.seniority.distribution[5]).toEqual({ percent: 5, minCount: 1 });
    expect(config.compensation.salaryBands[3]).toEqual({ min: 90_000, max: 140_000 });
    expect(config.compensation.bonusTargets).toEqual({ IC: 0.1, Manager: 0.15, Director: 0.2 });
    expect(config.compensation.meritCycle).toEqual({ mode: 'calendar', month: 4, day: 1 });
    expect(config.performance).toEqual({ reviewMonth: 12, reviewDay: 15, hireCutoffMonth: 7 });
    expect(config.career.promotion).toEqual({ baseIntervalYears: 3, minIntervalDays: 365 });
    expect(config.demographics.annualAttritionRate).toBe(0);
    expect(config.execution).toEqual({ concurrency: 8, validate: true });
    expect(config.logging.level).toBe('info');
  });

  it('should deep-freeze the result', () => {
    const config = createConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.compensation.salaryBands[1])).toBe(true);
  });

  it('should keep overrides next to defaults', () => {
    const config = createConfig({ compensation: { currency: 'EUR' }, execution: { concurrency: 2 } });
    expect(config.compensation.currency).toBe('EUR');
    expect(config.compensation.meritRaise).toEqual({ min: 0.02, max: 0.05 });
    expect(config.execution.concurrency).toBe(2);
  });

  it('should reject a distribution that does not sum to 100', () => {
    const issues = issuesOf(() => createConfig({ seniority: { distribution: distribution([25, 30, 25, 10, 5]) } }));
    expect(issues).toEqual(['seniority.distribution: percentages must sum to 100, got 95']);
  });

  it('should require a level-5 minimum for the CEO', () => {
    const issues = issuesOf(() =>
      createConfig({
        seniority: {
          distribution: { ...distribution([25, 30, 25, 15, 5]), 5: { percent: 5, minCount: 0 } }
        }
      })
    );
    expect(issues).toEqual(['seniority.distribution.5.minCount: level 5 needs a minimum of at least 1 for the CEO']);
  });

  it('should reject probability tables that do not sum to 1', () => {
    const issues = issuesOf(() => createConfig({ demographics: { gender: { female: 0.5, male: 0.4, na: 0 } } }));
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^demographics\.gender: probabilities must sum to 1/);
  });

  it('should reject salary bands that decrease with level', () => {
    const issues = issuesOf(() =>
      createConfig({
        compensation: {
          salaryBands: {
            1: { min: 50_000, max: 75_000 },
            2: { min: 40_000, max: 100_000 },
            3: { min: 90_000, max: 140_000 },
            4: { min: 130_000, max: 200_000 },
            5: { min: 180_000, max: 300_000 }
          }
        }
      })
    );
    expect(issues).toEqual(['compensation.salaryBands.2: band for level 2 must not start or end below level 1']);
  });

  it('should reject an inverted range', () => {
    const issues = issuesOf(() => createConfig({ compensation: { meritRaise: { min: 0.05, max: 0.02 } } }));
    expect(issues).toEqual(['compensation.meritRaise: min must not exceed max']);
  });
});

describe('configFromEnv', () => {
  it('should read the HR_SYNTH_* variables', () => {
    expect(configFromEnv({
      HR_SYNTH_LOG_LEVEL: 'debug',
      HR_SYNTH_LOG_PRETTY: 'true',
      HR_SYNTH_CONCURRENCY: '16'
    })).toEqual({
      logging: { level: 'debug', pretty: true },
      execution: { concurrency: 16 }
    });
  });

  it('should ignore unknown log levels and an empty environment', () => {
    expect(configFromEnv({ HR_SYNTH_LOG_LEVEL: 'loud' })).toEqual({});
    expect(configFromEnv({})).toEqual({});
  });
});
