export type Pos = { r: number; c: number };

// true = alive
export type Cell = boolean;

export type Board = {
  readonly rows: number;
  readonly cols: number;
  // row-major, replaced wholesale on every tick
  grid: Cell[][];
};

export type SeedParseResult = {
  seeds: Pos[];
  // 1-based line numbers that did not hold a coordinate pair
  skipped: number[];
};
