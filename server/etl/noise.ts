import { stripAccents } from './locale';
import type { Cell, RawRow } from './types';

export const DEFAULT_EMPTY_RATIO_THRESHOLD = 0.8;

// Matched against the first cell, lower-cased with accents stripped.
const BOILERPLATE_PATTERNS: RegExp[] = [
  // footnote markers
  /^\(\d+\)/,
  /^\*/,
  /^[¹²³]/,
  /^\d+\s*[-)]\s+[a-z]/,
  // attribution and notes
  /^(fonte|source|elaboracao|nota|notas|note|notes|obs|observacao|observacoes)\s*[:.]/,
  // methodology captions
  /nova metodologia/,
  /precos correntes/,
  /variacoes percentuais/,
  /banco de dados/,
  /nbr\s*12\.?721/,
  /dado nao disponivel/,
  // header text repeated inside the data block
  /^(ano|mes|mes\/ano|periodo|localidade|uf|regiao|unidade da federacao)$/,
  // placeholders left behind by exports
  /^unnamed/,
  /^(nan|nat)$/,
];

export interface NoiseOptions {
  /** A row whose share of empty cells is above this is dropped. */
  emptyRatioThreshold?: number;
}

const isEmptyCell = (cell: Cell | undefined): boolean => !cell || cell.trim() === '';

export function isBoilerplate(firstCell: Cell): boolean {
  const normalized = stripAccents(firstCell).trim().toLowerCase();
  if (!normalized) return false;
  return BOILERPLATE_PATTERNS.some(pattern => pattern.test(normalized));
}

/**
 * True when a row carries no data: blank, boilerplate in the first cell, or
 * mostly empty. Ambiguous rows are dropped rather than kept.
 */
export function isNoise(row: RawRow | readonly Cell[], options: NoiseOptions = {}): boolean {
  const cells = 'cells' in row ? row.cells : row;
  const threshold = options.emptyRatioThreshold ?? DEFAULT_EMPTY_RATIO_THRESHOLD;

  if (cells.length === 0) return true;

  const emptyCount = cells.filter(isEmptyCell).length;
  if (emptyCount === cells.length) return true;

  if (isBoilerplate(cells[0] ?? '')) return true;

  return emptyCount / cells.length > threshold;
}
