/**
 * Bross Sequential Analysis - Map Renderer
 * =========================================
 * Text rendering of a walked decision map for the terminal
 */

import { describeDecision } from '../engine/traversal';
import { InvalidMapError } from '../core/errors';
import { toRegionCode } from '../map/decision-map';
import { Decision, REGION, RegionCode, RegionGrid } from '../types';

// ============================================================================
// CELL STYLES
// ============================================================================

const RESET = '\x1b[0m';

interface CellStyle {
  glyph: string;
  background: string;
  name: string;
}

const CELL_STYLES: ReadonlyMap<RegionCode, CellStyle> = new Map<RegionCode, CellStyle>([
  [REGION.TWILIGHT, { glyph: '~', background: '\x1b[43m', name: 'twilight zone' }],
  [REGION.NO_DIFFERENCE, { glyph: '=', background: '\x1b[45m', name: 'no difference' }],
  [REGION.A_BETTER, { glyph: 'A', background: '\x1b[41m', name: 'A better' }],
  [REGION.B_BETTER, { glyph: 'B', background: '\x1b[44m', name: 'B better' }],
  [REGION.PATH, { glyph: 'o', background: '\x1b[46m', name: 'path' }],
  [REGION.BOUNDARY, { glyph: 'X', background: '\x1b[42m', name: 'end of walk' }],
]);

function styleOf(value: number): CellStyle {
  const style = CELL_STYLES.get(toRegionCode(value));
  if (!style) {
    throw new InvalidMapError(`No style for region code ${value}`);
  }
  return style;
}

export interface RenderOptions {
  /** ANSI background colours instead of glyphs */
  color?: boolean;
}

function renderCell(value: number, color: boolean): string {
  const style = styleOf(value);
  return color ? `${style.background}  ${RESET}` : `${style.glyph} `;
}

/**
 * Title line followed by one line per grid row
 */
export function renderMap(grid: RegionGrid, decision: Decision, options: RenderOptions = {}): string {
  const color = options.color ?? false;
  const lines = [describeDecision(decision)];
  for (const row of grid) {
    lines.push(row.map(value => renderCell(value, color)).join('').trimEnd());
  }
  return lines.join('\n');
}

export function renderLegend(options: RenderOptions = {}): string {
  const color = options.color ?? false;
  return [...CELL_STYLES.values()]
    .map(style => (color ? `${style.background}  ${RESET} ${style.name}` : `${style.glyph}  ${style.name}`))
    .join('\n');
}
