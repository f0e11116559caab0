/**
 * Reference-data loader for the bundled catalogs.
 *
 * Read and parse failures propagate unchanged; the loader never retries.
 */

import { open } from 'fs/promises';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import {
  JobRoleSchema,
  LocationSchema,
  NameListsSchema,
  OrganizationUnitSchema,
  type ReferenceData
} from '../types.js';

export const DEFAULT_DATA_DIR = fileURLToPath(new URL('../../data/', import.meta.url));

export const REFERENCE_FILES = {
  organizationUnits: 'organization_units.json',
  jobRoles: 'job_roles.json',
  locations: 'locations.json',
  names: 'employee_params.json'
} as const;

/**
 * Load all reference collections from `dataDir` (the bundled `data/` directory
 * by default).
 */
export async function loadReferenceData(dataDir: string = DEFAULT_DATA_DIR): Promise<ReferenceData> {
  const [organizationUnits, jobRoles, locations, names] = await Promise.all([
    readJsonFile(join(dataDir, REFERENCE_FILES.organizationUnits), z.array(OrganizationUnitSchema).min(1)),
    readJsonFile(join(dataDir, REFERENCE_FILES.jobRoles), z.array(JobRoleSchema).min(1)),
    readJsonFile(join(dataDir, REFERENCE_FILES.locations), z.array(LocationSchema).min(1)),
    readJsonFile(join(dataDir, REFERENCE_FILES.names), NameListsSchema)
  ]);

  return Object.freeze({
    organizationUnits: Object.freeze(organizationUnits),
    jobRoles: Object.freeze(jobRoles),
    locations: Object.freeze(locations),
    names: Object.freeze(names)
  });
}

/**
 * Read one JSON file, releasing the handle whether or not parsing succeeds.
 */
export async function readJsonFile<T extends z.ZodTypeAny>(path: string, schema: T): Promise<z.infer<T>> {
  const handle = await open(path, 'r');
  try {
    const content = await handle.readFile({ encoding: 'utf-8' });
    return schema.parse(JSON.parse(content));
  } finally {
    await handle.close();
  }
}
