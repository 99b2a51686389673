import { AppError, ERR } from '@life/shared';
import type { Board, Cell, Pos } from './types';

function isDimension(n: number): boolean {
  return Number.isInteger(n) && n >= 0;
}

export function makeEmptyBoard(rows: number, cols: number): Board {
  if (!isDimension(rows) || !isDimension(cols)) {
    throw new AppError(ERR.INVALID_DIMENSIONS, `invalid board dimensions ${rows}x${cols}`);
  }
  const grid: Cell[][] = [];
  for (let r = 0; r < rows; r++) {
    const row: Cell[] = [];
    for (let c = 0; c < cols; c++) row.push(false);
    grid.push(row);
  }
  return { rows, cols, grid };
}

export function inBounds(b: Board, p: Pos): boolean {
  return p.r >= 0 && p.r < b.rows && p.c >= 0 && p.c < b.cols;
}

function assertInBounds(b: Board, p: Pos): void {
  if (!inBounds(b, p)) {
    throw new AppError(
      ERR.OUT_OF_BOUNDS,
      `cell (${p.r}, ${p.c}) is outside ${b.rows}x${b.cols} board`
    );
  }
}

export function get(b: Board, p: Pos): Cell {
  assertInBounds(b, p);
  return b.grid[p.r][p.c];
}

export function set(b: Board, p: Pos, alive: Cell): void {
  assertInBounds(b, p);
  b.grid[p.r][p.c] = alive;
}

export function liveCells(b: Board): Pos[] {
  const out: Pos[] = [];
  for (let r = 0; r < b.rows; r++) {
    for (let c = 0; c < b.cols; c++) {
      if (b.grid[r][c]) out.push({ r, c });
    }
  }
  return out;
}

export function population(b: Board): number {
  let n = 0;
  for (const row of b.grid) {
    for (const alive of row) if (alive) n++;
  }
  return n;
}

export function cloneBoard(b: Board): Board {
  return {
    rows: b.rows,
    cols: b.cols,
    grid: b.grid.map((row) => row.slice())
  };
}
