import { describe, expect, it } from 'vitest';
import { makeEmptyBoard } from '../life_core/board';
import { applySeed } from '../life_core/seed';
import { instructionLine, renderRows } from './frame';

describe('renderRows', () => {
  const board = makeEmptyBoard(2, 3);
  applySeed(board, [
    { r: 0, c: 1 },
    { r: 1, c: 0 },
    { r: 1, c: 2 }
  ]);

  it('draws one block per live cell', () => {
    expect(renderRows(board)).toEqual([' █ ', '█ █']);
  });

  it('accepts custom glyphs', () => {
    expect(renderRows(board, { live: '#', dead: '.' })).toEqual(['.#.', '#.#']);
  });

  it('renders an empty board as no rows', () => {
    expect(renderRows(makeEmptyBoard(0, 0))).toEqual([]);
  });
});

describe('instructionLine', () => {
  it('tells the user how to quit', () => {
    expect(instructionLine(7)).toBe('press q to quit · generation 7');
  });
});
