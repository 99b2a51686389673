import * as clack from '@clack/prompts';
import { AppError, describeError } from '@life/shared';
import { runLife } from '../driver/loop';
import { loadSeedFile } from '../io/loadSeedFile';
import { makeEmptyBoard } from '../life_core/board';
import { applySeed, centerSeed } from '../life_core/seed';
import { InkScreen } from '../terminal/InkScreen';
import { readTerminalSize } from '../terminal/size';
import { parseCliArgs } from './args';
import { USAGE } from './config';

async function main(argv: string[]): Promise<void> {
  const command = parseCliArgs(argv);
  if (command.kind === 'help') {
    console.log(USAGE);
    return;
  }
  const { config } = command;

  const { seeds, skipped } = await loadSeedFile(config.seedFile);
  for (const line of skipped) {
    clack.log.warn(`${config.seedFile}:${line}: not a (row, col) pair, ignored`);
  }

  // last terminal row is reserved for the instruction line
  const size = readTerminalSize(process.stdout, process.stdin);
  const board = makeEmptyBoard(Math.max(size.rows - 1, 0), size.cols);
  applySeed(board, config.center ? centerSeed(seeds, board.rows, board.cols) : seeds);

  const screen = new InkScreen();
  screen.open();
  const summary = await runLife({
    board,
    screen,
    quit: screen,
    intervalMs: config.intervalMs
  }).finally(() => screen.close());

  clack.outro(
    `stopped after ${summary.generations} generations with ${summary.population} live cells`
  );
}

main(process.argv.slice(2)).then(
  () => process.exit(0),
  (err: unknown) => {
    clack.log.error(`error: ${describeError(err)}`);
    process.exit(err instanceof AppError ? err.status : 1);
  }
);
