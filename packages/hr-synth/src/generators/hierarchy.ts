/**
 * Hierarchy Builder
 * Seniority allocation and the manager graph
 */

import type { GeneratorConfig } from '../config.js';
import { ConfigurationError } from '../errors.js';
import type { SeededRandom } from '../random.js';
import { SENIORITY_LEVELS, type SeniorityLevel } from '../types.js';

export type LevelCounts = Record<SeniorityLevel, number>;

export interface HierarchySlot {
  index: number;
  employeeId: string;
  seniorityLevel: SeniorityLevel;
  /** Slot index of the manager; null only for the CEO. */
  managerIndex: number | null;
  isCeo: boolean;
}

export interface Hierarchy {
  slots: readonly HierarchySlot[];
  levelCounts: LevelCounts;
  /** Direct-report count per slot index. */
  directReports: readonly number[];
}

export function formatEmployeeId(index: number): string {
  return `EMP${String(index + 1).padStart(6, '0')}`;
}

function mapLevels(fn: (level: SeniorityLevel) => number): LevelCounts {
  return { 1: fn(1), 2: fn(2), 3: fn(3), 4: fn(4), 5: fn(5) };
}

function total(counts: LevelCounts): number {
  return SENIORITY_LEVELS.reduce((sum, level) => sum + counts[level], 0);
}

export class HierarchyBuilder {
  private readonly config: Readonly<GeneratorConfig['seniority']>;

  constructor(config: Readonly<GeneratorConfig['seniority']>) {
    this.config = config;
  }

  /**
   * Split `n` slots into level buckets: rounded shares, raised to each
   * level's minimum, then the remainder moved one slot at a time into (or out
   * of) the largest bucket.
   */
  allocateLevels(n: number): LevelCounts {
    if (!Number.isInteger(n) || n < 1) {
      throw new ConfigurationError(`Employee count must be a positive integer, got ${n}`, [
        'nEmployees: must be at least 1'
      ]);
    }

    const { distribution, ceoMode } = this.config;
    const dedicated = ceoMode === 'dedicated-slot';
    const pool = dedicated ? n - 1 : n;

    const minimums = mapLevels((level) =>
      level === 5 && dedicated
        ? Math.max(0, distribution[5].minCount - 1)
        : distribution[level].minCount
    );
    const required = total(minimums) + (dedicated ? 1 : 0);
    if (required > n) {
      throw new ConfigurationError(
        `Seniority minimums need at least ${required} employees, but ${n} were requested`,
        [`nEmployees: must be at least ${required} for the configured seniority minimums`],
        { required, requested: n }
      );
    }

    const counts = mapLevels((level) =>
      Math.max(minimums[level], Math.round((pool * distribution[level].percent) / 100))
    );

    let remainder = pool - total(counts);
    while (remainder !== 0) {
      const step = remainder > 0 ? 1 : -1;
      const target = SENIORITY_LEVELS
        .filter((level) => step > 0 || counts[level] > minimums[level])
        .sort((a, b) =>
          counts[b] - counts[a] ||
          distribution[b].percent - distribution[a].percent ||
          a - b
        )[0];
      counts[target] += step;
      remainder -= step;
    }

    if (dedicated) {
      counts[5] += 1;
    }
    return counts;
  }

  /**
   * Lay slots out by level (highest first), make slot 0 the CEO and draw every
   * other slot's manager from the pool above it.
   */
  build(n: number, rng: SeededRandom): Hierarchy {
    const levelCounts = this.allocateLevels(n);
    const byLevel = new Map<SeniorityLevel, number[]>();
    const levels: SeniorityLevel[] = [];

    for (const level of [...SENIORITY_LEVELS].reverse()) {
      const indices: number[] = [];
      for (let i = 0; i < levelCounts[level]; i++) {
        indices.push(levels.length);
        levels.push(level);
      }
      byLevel.set(level, indices);
    }

    const slots: HierarchySlot[] = [];
    const directReports = new Array<number>(levels.length).fill(0);

    levels.forEach((level, index) => {
      const isCeo = index === 0;
      let managerIndex: number | null = null;
      if (!isCeo) {
        managerIndex = rng.pick(this.managerPool(level, byLevel));
        directReports[managerIndex] += 1;
      }
      slots.push({
        index,
        employeeId: formatEmployeeId(index),
        seniorityLevel: level,
        managerIndex,
        isCeo
      });
    });

    return { slots, levelCounts, directReports };
  }

  /**
   * Level 5 reports to the CEO, 4 to 5, 3 to 4, and 1–2 to senior ICs or
   * managers (3 ∪ 4). An empty pool falls through to the nearest non-empty
   * level above.
   */
  private managerPool(level: SeniorityLevel, byLevel: Map<SeniorityLevel, number[]>): number[] {
    const indicesAt = (l: SeniorityLevel) => byLevel.get(l) ?? [];

    if (level === 5) return [0];

    const preferred =
      level === 4 ? indicesAt(5)
      : level === 3 ? indicesAt(4)
      : [...indicesAt(3), ...indicesAt(4)];
    if (preferred.length > 0) return preferred;

    for (const above of SENIORITY_LEVELS) {
      if (above > level && indicesAt(above).length > 0) {
        return indicesAt(above);
      }
    }
    return [0];
  }
}
