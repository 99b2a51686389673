import { setTimeout as delay } from 'node:timers/promises';
import { AppError, ERR } from '@life/shared';
import { population } from '../life_core/board';
import { tick } from '../life_core/rules';
import type { Board } from '../life_core/types';

// Read-only consumer of the board; must not mutate it while drawing.
export type Screen = {
  draw(board: Board, generation: number): void;
};

export type QuitSignal = {
  quitRequested(): boolean;
};

export type Sleep = (ms: number) => Promise<void>;

export type RunOptions = {
  board: Board;
  screen: Screen;
  quit: QuitSignal;
  intervalMs: number;
  sleep?: Sleep;
};

export type RunSummary = {
  generations: number;
  population: number;
};

const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

/**
 * Draws the current generation, advances the board once, then waits.
 * Quit is only checked between iterations, so a tick is never interrupted.
 */
export async function runLife(opts: RunOptions): Promise<RunSummary> {
  const { board, screen, quit, intervalMs } = opts;
  const sleep = opts.sleep ?? defaultSleep;
  if (!Number.isInteger(intervalMs) || intervalMs <= 0) {
    throw new AppError(
      ERR.INVALID_PARAM,
      `update rate must be a positive integer, got ${intervalMs}`
    );
  }

  let generation = 0;
  while (!quit.quitRequested()) {
    screen.draw(board, generation);
    tick(board);
    generation++;
    await sleep(intervalMs);
  }

  return { generations: generation, population: population(board) };
}
