/**
 * Bross Sequential Analysis - Pair Input
 * =======================================
 * Validation, informative-pair filtering and text parsing
 */

import * as fs from 'fs';
import * as path from 'path';
import { InvalidInputError } from '../core/errors';
import { Bit, InformativePair, Pair } from '../types';

// ============================================================================
// VALIDATION
// ============================================================================

function toBit(value: unknown, row: number, column: 'A' | 'B'): Bit {
  if (value === 0 || value === 1) return value;
  throw new InvalidInputError(
    `Pair ${row + 1}: ${column} response must be 0 or 1, got ${JSON.stringify(value)}`,
    row
  );
}

/**
 * Validate an N-by-2 matrix of 0/1 responses.
 * At least one pair is required.
 */
export function validatePairs(value: unknown): Pair[] {
  if (!Array.isArray(value)) {
    throw new InvalidInputError('Pairs must be an array of [A, B] responses');
  }
  if (value.length === 0) {
    throw new InvalidInputError('At least one pair is required');
  }

  // Array.from visits holes in sparse arrays, which map() skips
  return Array.from(value, (entry: unknown, row: number): Pair => {
    if (!Array.isArray(entry) || entry.length !== 2) {
      throw new InvalidInputError(`Pair ${row + 1} must have exactly 2 columns`, row);
    }
    return [toBit(entry[0], row, 'A'), toBit(entry[1], row, 'B')];
  });
}

// ============================================================================
// FILTERING
// ============================================================================

export function isInformativePair(pair: Pair): pair is InformativePair {
  return pair[0] !== pair[1];
}

/**
 * Drop pairs with equal responses, keeping the order of the rest
 */
export function filterInformative(pairs: readonly Pair[]): InformativePair[] {
  return pairs.filter(isInformativePair);
}

export function countInformative(pairs: readonly Pair[]): number {
  let n = 0;
  for (const pair of pairs) {
    if (isInformativePair(pair)) n++;
  }
  return n;
}

// ============================================================================
// PARSING
// ============================================================================

const SEPARATOR = /[\s,;]+/;

/**
 * Parse pairs from text: a JSON array, or one "a b" pair per line.
 * Blank lines and lines starting with # are ignored.
 */
export function parsePairsText(text: string): Pair[] {
  const trimmed = text.trim();

  if (trimmed.startsWith('[')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidInputError(`Invalid JSON pair list: ${reason}`);
    }
    return validatePairs(parsed);
  }

  const rows: unknown[][] = [];
  for (const line of trimmed.split(/\r?\n/)) {
    const content = line.trim();
    if (!content || content.startsWith('#')) continue;
    rows.push(content.split(SEPARATOR).map(token => (/^[01]$/.test(token) ? Number(token) : token)));
  }

  return validatePairs(rows);
}

/**
 * Read and parse a pair file (CSV-like text or JSON)
 */
export function loadPairsFile(filePath: string): Pair[] {
  const absolutePath = path.resolve(filePath);
  const content = fs.readFileSync(absolutePath, 'utf-8');
  return parsePairsText(content);
}
