import { AppError, ERR } from '@life/shared';
import { inBounds, set } from './board';
import type { Board, Pos, SeedParseResult } from './types';

// "(y, x)": row first. Parentheses and inner whitespace are optional.
const SEED_LINE = /^\(?\s*(-?\d+)\s*,\s*(-?\d+)\s*\)?$/;

export function parseSeedText(text: string): SeedParseResult {
  const seeds: Pos[] = [];
  const skipped: number[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((line, i) => {
    const trimmed = line.trim();
    if (!trimmed) return;
    const match = SEED_LINE.exec(trimmed);
    if (!match) {
      skipped.push(i + 1);
      return;
    }
    seeds.push({ r: Number(match[1]), c: Number(match[2]) });
  });

  return { seeds, skipped };
}

// All seeds are checked before any cell is touched.
export function applySeed(b: Board, seeds: Pos[]): void {
  const outside = seeds.find((p) => !inBounds(b, p));
  if (outside) {
    throw new AppError(
      ERR.SEED_OUT_OF_BOUNDS,
      `position (${outside.r}, ${outside.c}) does not fit within ${b.rows}x${b.cols} board`
    );
  }
  for (const p of seeds) set(b, p, true);
}

function clamp(v: number, extent: number): number {
  return Math.min(Math.max(Math.floor(v), 0), Math.max(extent - 1, 0));
}

/**
 * Moves the pattern's bounding box to the middle of a rows x cols board.
 * A pattern spanning at least the board's extent on either axis is shrunk
 * by one uniform scale so it keeps its aspect ratio; results are floored
 * and clamped onto the board. Negative coordinates are rejected, as they are
 * when seeding without centering.
 */
export function centerSeed(seeds: Pos[], rows: number, cols: number): Pos[] {
  if (seeds.length === 0) return [];
  const negative = seeds.find((p) => p.r < 0 || p.c < 0);
  if (negative) {
    throw new AppError(
      ERR.SEED_OUT_OF_BOUNDS,
      `position (${negative.r}, ${negative.c}) has a negative coordinate`
    );
  }

  let minR = Infinity;
  let maxR = -Infinity;
  let minC = Infinity;
  let maxC = -Infinity;
  for (const p of seeds) {
    minR = Math.min(minR, p.r);
    maxR = Math.max(maxR, p.r);
    minC = Math.min(minC, p.c);
    maxC = Math.max(maxC, p.c);
  }

  const spanR = maxR - minR;
  const spanC = maxC - minC;
  const scaleR = spanR > 0 && spanR >= rows ? (rows - 2) / spanR : 1;
  const scaleC = spanC > 0 && spanC >= cols ? (cols - 2) / spanC : 1;
  const scale = Math.min(scaleR, scaleC);

  const offR = (rows - spanR * scale) / 2 - minR * scale;
  const offC = (cols - spanC * scale) / 2 - minC * scale;

  return seeds.map((p) => ({
    r: clamp(p.r * scale + offR, rows),
    c: clamp(p.c * scale + offC, cols)
  }));
}
