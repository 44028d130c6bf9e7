/**
 * Bross Sequential Analysis - Traversal Engine
 * =============================================
 * Walks an informative-pair sequence over the decision map
 */

import { DecisionMap, isInsideMap, toRegionCode } from '../map/decision-map';
import { OutOfBoundsError } from '../core/errors';
import {
  Decision,
  InformativePair,
  Position,
  REGION,
  TraversalResult,
} from '../types';
import { getLogger } from '../utils/logger';

// ============================================================================
// DECISION MESSAGES
// ============================================================================

export function describeDecision(decision: Decision): string {
  switch (decision) {
    case REGION.TWILIGHT: return 'Inconclusive: twilight zone';
    case REGION.NO_DIFFERENCE: return 'No difference between A and B';
    case REGION.A_BETTER: return 'A is better';
    case REGION.B_BETTER: return 'B is better';
    default: return 'No informative pairs';
  }
}

// ============================================================================
// TRAVERSAL ENGINE
// ============================================================================

export class TraversalEngine {
  private map: DecisionMap;

  constructor(map: DecisionMap = DecisionMap.bross()) {
    this.map = map;
  }

  getMap(): DecisionMap {
    return this.map;
  }

  /**
   * Run one walk.
   * A-preferences move up, B-preferences move right; the first conclusive
   * region ends the walk and later pairs are never read.
   */
  run(pairs: readonly InformativePair[]): TraversalResult {
    if (pairs.length === 0) {
      return { decision: null, grid: null, path: [], steps: 0, terminal: null };
    }

    const grid = this.map.initialGrid();
    const position = this.map.startingPosition();
    const path: Position[] = [];
    const last = pairs.length - 1;
    let decision: Decision = null;
    let steps = 0;

    for (let k = 0; k <= last; k++) {
      if (pairs[k][0] === 1) {
        position.row -= 1;
      } else {
        position.col += 1;
      }

      if (!isInsideMap(position, this.map.size)) {
        throw new OutOfBoundsError(position.row, position.col, this.map.size);
      }

      steps++;
      path.push({ ...position });

      const r = position.row - 1;
      const c = position.col - 1;
      const region = toRegionCode(grid[r][c]);

      if (
        region === REGION.NO_DIFFERENCE ||
        region === REGION.A_BETTER ||
        region === REGION.B_BETTER
      ) {
        grid[r][c] = REGION.BOUNDARY;
        decision = region;
        break;
      }

      if (region === REGION.TWILIGHT) {
        decision = REGION.TWILIGHT;
        grid[r][c] = k === last ? REGION.BOUNDARY : REGION.PATH;
        continue;
      }

      grid[r][c] = REGION.PATH;
    }

    getLogger().debug(`Walk ended after ${steps}/${pairs.length} pairs: ${describeDecision(decision)}`);

    return {
      decision,
      grid,
      path,
      steps,
      terminal: { ...position },
    };
  }
}

export function createTraversalEngine(map?: DecisionMap): TraversalEngine {
  return new TraversalEngine(map);
}
