import type { Board, Cell, Pos } from './types';

// The 8 surrounding offsets, row-major
const NEIGHBORS = [
  { dr: -1, dc: -1 },
  { dr: -1, dc: 0 },
  { dr: -1, dc: 1 },
  { dr: 0, dc: -1 },
  { dr: 0, dc: 1 },
  { dr: 1, dc: -1 },
  { dr: 1, dc: 0 },
  { dr: 1, dc: 1 }
];

// Off-board positions count as dead; there is no wraparound.
export function countLiveNeighbors(b: Board, p: Pos): number {
  let count = 0;
  for (const { dr, dc } of NEIGHBORS) {
    const r = p.r + dr;
    const c = p.c + dc;
    if (r < 0 || r >= b.rows || c < 0 || c >= b.cols) continue;
    if (b.grid[r][c]) count++;
  }
  return count;
}

/**
 * B3/S23: a live cell survives with 2 or 3 live neighbors, a dead cell is
 * born with exactly 3. Everything else is dead in the next generation.
 */
export function nextCellState(alive: Cell, neighbors: number): Cell {
  if (alive) return neighbors === 2 || neighbors === 3;
  return neighbors === 3;
}

/**
 * Next grid, computed into a fresh buffer. Every neighbor count reads the
 * current grid, never cells already written for the next generation.
 */
export function nextGeneration(b: Board): Cell[][] {
  const next: Cell[][] = [];
  for (let r = 0; r < b.rows; r++) {
    const row: Cell[] = [];
    for (let c = 0; c < b.cols; c++) {
      row.push(nextCellState(b.grid[r][c], countLiveNeighbors(b, { r, c })));
    }
    next.push(row);
  }
  return next;
}

export function tick(b: Board): void {
  b.grid = nextGeneration(b);
}
