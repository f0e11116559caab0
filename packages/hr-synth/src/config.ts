/**
 * Generator configuration management
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { isIsoDate } from './dates.js';
import { SENIORITY_LEVELS } from './types.js';

// ============================================================================
// Configuration Schema
// ============================================================================

const RangeSchema = z
  .object({
    min: z.number(),
    max: z.number(),
  })
  .refine((range) => range.min <= range.max, { message: 'min must not exceed max' });

export type Range = z.infer<typeof RangeSchema>;

const levelMap = <T extends z.ZodTypeAny>(schema: T) =>
  z.object({ 1: schema, 2: schema, 3: schema, 4: schema, 5: schema });

const probability = z.number().min(0).max(1);

export const SeniorityConfigSchema = z.object({
  distribution: levelMap(
    z.object({
      percent: z.number().min(0).max(100),
      minCount: z.number().int().min(0).default(0),
    })
  ).default({
    1: { percent: 25, minCount: 0 },
    2: { percent: 30, minCount: 0 },
    3: { percent: 25, minCount: 0 },
    4: { percent: 15, minCount: 0 },
    5: { percent: 5, minCount: 1 },
  }),
  // highest-level-5: the CEO is the first level-5 slot of the distribution.
  // dedicated-slot: the CEO is reserved outside the distribution.
  ceoMode: z.enum(['highest-level-5', 'dedicated-slot']).default('highest-level-5'),
});

export const DemographicsConfigSchema = z.object({
  ageBands: levelMap(RangeSchema).default({
    1: { min: 21, max: 40 },
    2: { min: 22, max: 45 },
    3: { min: 30, max: 60 },
    4: { min: 40, max: 65 },
    5: { min: 45, max: 65 },
  }),
  careerStartAge: z.number().int().min(14).max(40).default(21),
  earliestHireDate: z.string().refine(isIsoDate, { message: 'must be a YYYY-MM-DD date' }).default('1985-01-01'),
  gender: z.object({
    female: probability,
    male: probability,
    na: probability,
  }).default({ female: 0.48, male: 0.48, na: 0.04 }),
  employmentType: z.object({
    fullTime: probability,
    contract: probability,
    partTime: probability,
  }).default({ fullTime: 0.7, contract: 0.1, partTime: 0.2 }),
  annualAttritionRate: probability.default(0),
});

export const CareerConfigSchema = z.object({
  promotion: z.object({
    // Mean gap at level 1; scaled by 4 / (levels remaining below 5)
    baseIntervalYears: z.number().positive().default(3),
    minIntervalDays: z.number().int().min(1).default(365),
  }).default({}),
  transfer: z.object({
    meanIntervalYears: z.number().positive().default(7),
    minIntervalDays: z.number().int().min(1).default(365),
  }).default({}),
});

export const CompensationConfigSchema = z.object({
  currency: z.string().length(3).default('USD'),
  salaryBands: levelMap(RangeSchema).default({
    1: { min: 50_000, max: 75_000 },
    2: { min: 70_000, max: 100_000 },
    3: { min: 90_000, max: 140_000 },
    4: { min: 130_000, max: 200_000 },
    5: { min: 180_000, max: 300_000 },
  }),
  bonusTargets: z.record(z.string(), probability).default({
    IC: 0.1,
    Manager: 0.15,
    Director: 0.2,
  }),
  defaultBonusTarget: probability.default(0.1),
  promotionRaise: RangeSchema.default({ min: 0.08, max: 0.15 }),
  meritRaise: RangeSchema.default({ min: 0.02, max: 0.05 }),
  meritCycle: z.object({
    mode: z.enum(['calendar', 'anniversary']).default('calendar'),
    month: z.number().int().min(1).max(12).default(4),
    day: z.number().int().min(1).max(28).default(1),
  }).default({}),
  meritMinTenureDays: z.number().int().min(0).default(90),
  promotionBlackoutDays: z.number().int().min(0).default(180),
});

export const PerformanceConfigSchema = z.object({
  reviewMonth: z.number().int().min(1).max(12).default(12),
  reviewDay: z.number().int().min(1).max(28).default(15),
  // Hired on or after the 1st of this month: no review for that year
  hireCutoffMonth: z.number().int().min(1).max(12).default(7),
});

export const AlignmentConfigSchema = z.object({
  familyToBusinessUnit: z.record(z.string(), z.string().min(1)).default({
    Engineering: 'Engineering',
    Sales: 'Sales',
    Corporate: 'Corporate',
  }),
});

export const ExecutionConfigSchema = z.object({
  // Employees generated between event-loop yields; does not run them in parallel
  concurrency: z.number().int().min(1).max(4096).default(8),
  validate: z.boolean().default(true),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  pretty: z.boolean().default(false),
  name: z.string().default('hr-synth'),
});

export const GeneratorConfigSchema = z
  .object({
    seniority: SeniorityConfigSchema.default({}),
    demographics: DemographicsConfigSchema.default({}),
    career: CareerConfigSchema.default({}),
    compensation: CompensationConfigSchema.default({}),
    performance: PerformanceConfigSchema.default({}),
    alignment: AlignmentConfigSchema.default({}),
    execution: ExecutionConfigSchema.default({}),
    logging: LoggingConfigSchema.default({}),
  })
  .superRefine((config, ctx) => {
    const { distribution } = config.seniority;
    const percentTotal = SENIORITY_LEVELS.reduce((sum, level) => sum + distribution[level].percent, 0);
    if (Math.abs(percentTotal - 100) > 1e-6) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['seniority', 'distribution'],
        message: `percentages must sum to 100, got ${percentTotal}`,
      });
    }
    if (distribution[5].minCount < 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['seniority', 'distribution', '5', 'minCount'],
        message: 'level 5 needs a minimum of at least 1 for the CEO',
      });
    }

    const probabilityTables: Array<[string, number[]]> = [
      ['gender', Object.values(config.demographics.gender)],
      ['employmentType', Object.values(config.demographics.employmentType)],
    ];
    for (const [name, values] of probabilityTables) {
      const total = values.reduce((sum, p) => sum + p, 0);
      if (Math.abs(total - 1) > 1e-6) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['demographics', name],
          message: `probabilities must sum to 1, got ${total}`,
        });
      }
    }

    // Salary monotonicity across promotions relies on ordered bands
    const bands = config.compensation.salaryBands;
    for (let i = 1; i < SENIORITY_LEVELS.length; i++) {
      const lower = bands[SENIORITY_LEVELS[i - 1]];
      const level = SENIORITY_LEVELS[i];
      if (bands[level].min < lower.min || bands[level].max < lower.max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['compensation', 'salaryBands', String(level)],
          message: `band for level ${level} must not start or end below level ${level - 1}`,
        });
      }
    }
  });

export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>;
export type GeneratorConfigInput = z.input<typeof GeneratorConfigSchema>;
export type LogLevel = z.infer<typeof LoggingConfigSchema>['level'];

// ============================================================================
// Construction
// ============================================================================

/**
 * Parse, check and deep-freeze a configuration. Any malformed band, range or
 * table is reported as a `ConfigurationError` listing every issue.
 */
export function createConfig(input: GeneratorConfigInput = {}): Readonly<GeneratorConfig> {
  const result = GeneratorConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid generator configuration',
      formatIssues(result.error)
    );
  }
  return deepFreeze(result.data);
}

/**
 * Configuration overrides from HR_SYNTH_* environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): GeneratorConfigInput {
  const logging: z.input<typeof LoggingConfigSchema> = {};
  const execution: z.input<typeof ExecutionConfigSchema> = {};

  const level = LoggingConfigSchema.shape.level.safeParse(env.HR_SYNTH_LOG_LEVEL);
  if (env.HR_SYNTH_LOG_LEVEL && level.success) {
    logging.level = level.data;
  }
  if (env.HR_SYNTH_LOG_PRETTY) {
    logging.pretty = env.HR_SYNTH_LOG_PRETTY === 'true' || env.HR_SYNTH_LOG_PRETTY === '1';
  }
  if (env.HR_SYNTH_CONCURRENCY) {
    execution.concurrency = parseInt(env.HR_SYNTH_CONCURRENCY, 10);
  }

  const config: GeneratorConfigInput = {};
  if (Object.keys(logging).length > 0) config.logging = logging;
  if (Object.keys(execution).length > 0) config.execution = execution;
  return config;
}

export function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
