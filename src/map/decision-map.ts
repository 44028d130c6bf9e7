/**
 * Bross Sequential Analysis - Decision Map
 * =========================================
 * Canonical 31x31 region grid of Bross' plan and the walk's starting cell.
 *
 * Axes: moving up (row - 1) records a preference for A, moving right
 * (col + 1) a preference for B. The grid is validated once and never
 * mutated; every walk works on its own copy from initialGrid().
 */

import brossGrid from './bross-map.json';
import { InvalidMapError } from '../core/errors';
import { Position, REGION, RegionCode, RegionGrid } from '../types';

export const MAP_SIZE = 31;

const START: Readonly<Position> = { row: 30, col: 1 };

/** Codes allowed in a canonical (never walked) grid */
const CANONICAL_CODES: ReadonlySet<number> = new Set<number>([
  REGION.TWILIGHT,
  REGION.NO_DIFFERENCE,
  REGION.A_BETTER,
  REGION.B_BETTER,
  REGION.PATH,
]);

/**
 * Check shape and codes of a candidate grid.
 * Throws InvalidMapError on the first problem found.
 */
export function validateGrid(grid: unknown): RegionGrid {
  if (!Array.isArray(grid) || grid.length !== MAP_SIZE) {
    const rows = Array.isArray(grid) ? grid.length : typeof grid;
    throw new InvalidMapError(`Decision map must have ${MAP_SIZE} rows, got ${rows}`);
  }

  const out: RegionGrid = [];
  grid.forEach((row: unknown, r: number) => {
    if (!Array.isArray(row) || row.length !== MAP_SIZE) {
      throw new InvalidMapError(`Decision map row ${r + 1} must have ${MAP_SIZE} columns`);
    }
    const cells: number[] = [];
    row.forEach((value: unknown, c: number) => {
      if (typeof value !== 'number' || !CANONICAL_CODES.has(value)) {
        throw new InvalidMapError(
          `Decision map cell (${r + 1}, ${c + 1}) holds invalid region code ${String(value)}`
        );
      }
      cells.push(value);
    });
    out.push(cells);
  });

  return out;
}

export function isInsideMap(position: Position, size = MAP_SIZE): boolean {
  return position.row >= 1 && position.row <= size && position.col >= 1 && position.col <= size;
}

export class DecisionMap {
  private readonly grid: ReadonlyArray<ReadonlyArray<number>>;

  constructor(grid: unknown) {
    this.grid = validateGrid(grid);
  }

  get size(): number {
    return MAP_SIZE;
  }

  /**
   * Fresh mutable copy of the canonical grid
   */
  initialGrid(): RegionGrid {
    return this.grid.map(row => [...row]);
  }

  startingPosition(): Position {
    return { ...START };
  }

  /**
   * Region of a cell on the canonical grid (1-indexed)
   */
  regionAt(position: Position): RegionCode {
    if (!isInsideMap(position)) {
      throw new InvalidMapError(`Position (${position.row}, ${position.col}) is outside the decision map`);
    }
    return toRegionCode(this.grid[position.row - 1][position.col - 1]);
  }

  private static shared: DecisionMap | null = null;

  /**
   * Bross' plan, loaded from the bundled grid
   */
  static bross(): DecisionMap {
    if (!DecisionMap.shared) {
      DecisionMap.shared = new DecisionMap(brossGrid);
    }
    return DecisionMap.shared;
  }
}

const REGION_CODES: readonly RegionCode[] = Object.values(REGION);

export function isRegionCode(value: number): value is RegionCode {
  return REGION_CODES.some(code => code === value);
}

export function toRegionCode(value: number): RegionCode {
  if (!isRegionCode(value)) {
    throw new InvalidMapError(`Unknown region code ${value}`);
  }
  return value;
}
