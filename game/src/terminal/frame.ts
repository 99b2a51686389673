import type { Board } from '../life_core/types';

export type Glyphs = { live: string; dead: string };

export const DEFAULT_GLYPHS: Glyphs = { live: '█', dead: ' ' };

export function renderRows(b: Board, glyphs: Glyphs = DEFAULT_GLYPHS): string[] {
  return b.grid.map((row) => row.map((alive) => (alive ? glyphs.live : glyphs.dead)).join(''));
}

export function instructionLine(generation: number): string {
  return `press q to quit · generation ${generation}`;
}
