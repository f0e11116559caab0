/**
 * hr-synth - synthetic HR dataset generator
 *
 * @packageDocumentation
 */

export { HrDataGenerator, generateHrData } from './generator.js';
export type {
  GenerateHrDataOptions,
  GenerationMetadata,
  GenerationPhase,
  GenerationProgress,
  GenerationResult,
  HrDataGeneratorEvents,
  HrDataGeneratorOptions
} from './generator.js';

export { createConfig, configFromEnv, GeneratorConfigSchema } from './config.js';
export type { GeneratorConfig, GeneratorConfigInput, LogLevel } from './config.js';

export { createLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';

export {
  HrSynthError,
  ConfigurationError,
  AlignmentError,
  DataIntegrityError,
  ErrorCodes
} from './errors.js';
export type { ErrorCode, IntegrityRule, IntegrityViolation } from './errors.js';

export { SeededRandom, createStream, deriveSeed } from './random.js';
export { loadReferenceData, DEFAULT_DATA_DIR } from './reference/loader.js';
export { ReferenceCatalog } from './reference/catalog.js';
export { TableBuilder, TABLE_COLUMNS } from './tables.js';
export type { HrTables, Table, TableName } from './tables.js';
export { toCSV, toJSON, writeTables } from './export/csv.js';
export type { OutputFormat } from './export/csv.js';
export { validateDataset, assertDatasetIntegrity } from './validation/integrity.js';
export type { IntegrityContext } from './validation/integrity.js';

export * from './generators/index.js';
export * from './types.js';
