/**
 * HrDataGenerator - orchestrates one generation run
 *
 * Builds the hierarchy, then runs every employee through demographics, career
 * events and the timeline simulators in batches. Each (employee, component)
 * pair draws from its own seeded stream, so the output does not depend on the
 * batch size or on which optional tables were requested.
 */

import { EventEmitter } from 'eventemitter3';

import { createConfig, formatIssues, type GeneratorConfig, type GeneratorConfigInput } from './config.js';
import { toIsoDate } from './dates.js';
import { ConfigurationError, DataIntegrityError } from './errors.js';
import {
  AssignmentTimelineSimulator,
  CareerEventScheduler,
  CompensationTimelineSimulator,
  DemographicsGenerator,
  HierarchyBuilder,
  PerformanceReviewGenerator,
  type HierarchySlot,
  type LevelCounts
} from './generators/index.js';
import { createLogger, type Logger } from './logger.js';
import { createStream, randomSeed } from './random.js';
import { ReferenceCatalog } from './reference/catalog.js';
import { loadReferenceData } from './reference/loader.js';
import { TABLE_COLUMNS, TableBuilder, rowCounts, type HrTables, type TableName } from './tables.js';
import {
  GenerateRequestSchema,
  type CompensationRecord,
  type EmployeeRecord,
  type GenerateRequest,
  type IsoDate,
  type JobAssignmentRecord,
  type JobRole,
  type Location,
  type OrgAssignmentRecord,
  type OrganizationUnit,
  type PerformanceReviewRecord,
  type ReferenceData,
  type SimulationWindow
} from './types.js';
import { validateDataset } from './validation/integrity.js';

// ============================================================================
// Types
// ============================================================================

export type GenerationPhase = 'hierarchy' | 'employees' | 'assembly' | 'validation';

export interface GenerationProgress {
  completed: number;
  total: number;
}

export interface GenerationMetadata {
  seed: number;
  startDate: IsoDate;
  endDate: IsoDate;
  nEmployees: number;
  levelCounts: LevelCounts;
  rowCounts: Partial<Record<TableName, number>>;
  durationMs: number;
  generatedAt: string;
}

export interface GenerationResult {
  tables: HrTables;
  metadata: GenerationMetadata;
}

export interface HrDataGeneratorEvents {
  phase: (phase: GenerationPhase) => void;
  progress: (progress: GenerationProgress) => void;
  complete: (metadata: GenerationMetadata) => void;
}

export interface HrDataGeneratorOptions {
  config?: GeneratorConfigInput;
  logger?: Logger;
}

interface ResolvedRequest {
  nEmployees: number;
  window: SimulationWindow;
  seed: number;
  includePerformance: boolean;
  includeCompensation: boolean;
}

interface EmployeeBundle {
  employee: EmployeeRecord;
  jobs: JobAssignmentRecord[];
  orgs: OrgAssignmentRecord[];
  compensation: CompensationRecord[];
  reviews: PerformanceReviewRecord[];
}

interface RunContext {
  request: ResolvedRequest;
  slots: readonly HierarchySlot[];
  directReports: readonly number[];
  demographics: DemographicsGenerator;
  career: CareerEventScheduler;
  assignments: AssignmentTimelineSimulator;
  compensation: CompensationTimelineSimulator;
  performance: PerformanceReviewGenerator;
}

// ============================================================================
// HrDataGenerator
// ============================================================================

export class HrDataGenerator extends EventEmitter<HrDataGeneratorEvents> {
  private readonly config: Readonly<GeneratorConfig>;
  private readonly catalog: ReferenceCatalog;
  private readonly logger: Logger;

  constructor(reference: ReferenceData, options: HrDataGeneratorOptions = {}) {
    super();
    this.config = createConfig(options.config);
    this.catalog = new ReferenceCatalog(reference, this.config.alignment.familyToBusinessUnit);
    this.logger = options.logger ?? createLogger(this.config.logging);
  }

  getConfig(): Readonly<GeneratorConfig> {
    return this.config;
  }

  /**
   * Generate the full dataset. Either every table is returned or an error is
   * thrown; there are no partial results.
   */
  async generate(input: GenerateRequest): Promise<GenerationResult> {
    const started = Date.now();
    const request = this.resolveRequest(input);
    const { window, seed, nEmployees } = request;

    this.catalog.assertAlignment();
    this.logger.info({ nEmployees, seed, ...window }, 'Starting HR data generation');

    this.emit('phase', 'hierarchy');
    const hierarchy = new HierarchyBuilder(this.config.seniority).build(nEmployees, createStream(seed, 'hierarchy'));
    this.logger.debug({ levelCounts: hierarchy.levelCounts }, 'Hierarchy built');

    const context: RunContext = {
      request,
      slots: hierarchy.slots,
      directReports: hierarchy.directReports,
      demographics: new DemographicsGenerator(this.config.demographics, this.catalog, window),
      career: new CareerEventScheduler(this.config.career, window),
      assignments: new AssignmentTimelineSimulator(this.catalog),
      compensation: new CompensationTimelineSimulator(this.config.compensation, window),
      performance: new PerformanceReviewGenerator(this.config.performance, window)
    };

    this.emit('phase', 'employees');
    const bundles = await this.generateBatch(context);

    this.emit('phase', 'assembly');
    const tables = this.assemble(bundles, request);

    if (this.config.execution.validate) {
      this.emit('phase', 'validation');
      const violations = validateDataset(tables, {
        window,
        catalog: this.catalog,
        salaryBands: this.config.compensation.salaryBands
      });
      if (violations.length > 0) {
        const error = new DataIntegrityError(violations);
        this.logger.error({ violations: violations.slice(0, 20), count: violations.length }, error.message);
        throw error;
      }
    }

    const metadata: GenerationMetadata = {
      seed,
      startDate: window.startDate,
      endDate: window.endDate,
      nEmployees,
      levelCounts: hierarchy.levelCounts,
      rowCounts: rowCounts(tables),
      durationMs: Date.now() - started,
      generatedAt: new Date().toISOString()
    };

    this.logger.info({ rowCounts: metadata.rowCounts, durationMs: metadata.durationMs }, 'HR data generation complete');
    this.emit('complete', metadata);
    return { tables, metadata };
  }

  /**
   * Process employees `execution.concurrency` at a time, placing each result
   * by its slot index. Per-employee work is synchronous; the loop yields to
   * the event loop after every batch.
   */
  private async generateBatch(context: RunContext): Promise<EmployeeBundle[]> {
    const { slots } = context;
    const batchSize = this.config.execution.concurrency;
    const results = new Array<EmployeeBundle>(slots.length);

    for (let i = 0; i < slots.length; i += batchSize) {
      const batch = slots.slice(i, i + batchSize);
      batch.forEach((slot, offset) => {
        results[i + offset] = this.processEmployee(slot, context);
      });

      const completed = Math.min(i + batchSize, slots.length);
      this.logger.debug({ completed, total: slots.length }, 'Employee batch complete');
      this.emit('progress', { completed, total: slots.length });
      await yieldToEventLoop();
    }

    return results;
  }

  private processEmployee(slot: HierarchySlot, context: RunContext): EmployeeBundle {
    const { request, slots, directReports } = context;
    const stream = (label: string) => createStream(request.seed, label, slot.index);

    const employee = context.demographics.generate(
      {
        slot,
        managerId: slot.managerIndex === null ? null : slots[slot.managerIndex].employeeId,
        canTerminate: !slot.isCeo && directReports[slot.index] === 0
      },
      stream('demographics')
    );

    const events = context.career.schedule(employee, stream('career'));
    const { jobs, orgs } = context.assignments.simulate(employee, events, stream('assignments'));

    const compensation = request.includeCompensation
      ? context.compensation.simulate(employee, events, jobs, stream('compensation'))
      : [];
    const reviews = request.includePerformance
      ? context.performance.generate(employee, stream('performance'))
      : [];

    return { employee, jobs, orgs, compensation, reviews };
  }

  private assemble(bundles: readonly EmployeeBundle[], request: ResolvedRequest): HrTables {
    const employees = new TableBuilder<EmployeeRecord>('employee', TABLE_COLUMNS.employee);
    const jobs = new TableBuilder<JobAssignmentRecord>('employee_job_assignment', TABLE_COLUMNS.employee_job_assignment);
    const orgs = new TableBuilder<OrgAssignmentRecord>('employee_org_assignment', TABLE_COLUMNS.employee_org_assignment);
    const compensation = new TableBuilder<CompensationRecord>('employee_compensation', TABLE_COLUMNS.employee_compensation);
    const reviews = new TableBuilder<PerformanceReviewRecord>('employee_performance', TABLE_COLUMNS.employee_performance);

    for (const bundle of bundles) {
      employees.add(bundle.employee);
      jobs.addAll(bundle.jobs);
      orgs.addAll(bundle.orgs);
      compensation.addAll(bundle.compensation);
      reviews.addAll(bundle.reviews);
    }

    const tables: HrTables = {
      employee: employees.build(),
      employee_job_assignment: jobs.build(),
      employee_org_assignment: orgs.build(),
      organization_unit: new TableBuilder<OrganizationUnit>('organization_unit', TABLE_COLUMNS.organization_unit)
        .addAll(this.catalog.organizationUnits.map((org) => ({ ...org }))).build(),
      job_role: new TableBuilder<JobRole>('job_role', TABLE_COLUMNS.job_role)
        .addAll(this.catalog.jobRoles.map((job) => ({ ...job }))).build(),
      location: new TableBuilder<Location>('location', TABLE_COLUMNS.location)
        .addAll(this.catalog.locations.map((location) => ({ ...location }))).build()
    };
    if (request.includeCompensation) {
      tables.employee_compensation = compensation.build();
    }
    if (request.includePerformance) {
      tables.employee_performance = reviews.build();
    }
    return tables;
  }

  private resolveRequest(input: GenerateRequest): ResolvedRequest {
    const parsed = GenerateRequestSchema.safeParse(input);
    if (!parsed.success) {
      throw new ConfigurationError('Invalid generation request', formatIssues(parsed.error));
    }
    const request = parsed.data;

    let startDate: IsoDate;
    let endDate: IsoDate;
    try {
      startDate = toIsoDate(request.startDate);
      endDate = toIsoDate(request.endDate);
    } catch (error) {
      if (error instanceof RangeError) {
        throw new ConfigurationError(`Invalid simulation window: ${error.message}`, [error.message]);
      }
      throw error;
    }

    if (startDate >= endDate) {
      throw new ConfigurationError(
        `startDate (${startDate}) must be before endDate (${endDate})`,
        ['startDate: must be before endDate'],
        { startDate, endDate }
      );
    }

    return {
      nEmployees: request.nEmployees,
      window: { startDate, endDate },
      seed: request.seed ?? randomSeed(),
      includePerformance: request.includePerformance,
      includeCompensation: request.includeCompensation
    };
  }
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

// ============================================================================
// Convenience
// ============================================================================

export interface GenerateHrDataOptions extends HrDataGeneratorOptions {
  /** Reference-data directory; the bundled catalogs by default. */
  dataDir?: string;
}

/**
 * Load reference data and run one generation.
 */
export async function generateHrData(
  request: GenerateRequest,
  options: GenerateHrDataOptions = {}
): Promise<GenerationResult> {
  const reference = await loadReferenceData(options.dataDir);
  const generator = new HrDataGenerator(reference, { config: options.config, logger: options.logger });
  return generator.generate(request);
}
