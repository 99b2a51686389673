import { AppError, ERR } from '@life/shared';

export type TerminalSize = { rows: number; cols: number };

type OutputTty = { isTTY?: boolean; rows: number; columns: number };
type InputTty = { isTTY?: boolean };

// Raw-mode key polling needs a real terminal on both ends.
export function readTerminalSize(stdout: OutputTty, stdin: InputTty): TerminalSize {
  if (!stdout.isTTY || !stdin.isTTY) {
    throw new AppError(
      ERR.TERMINAL_UNAVAILABLE,
      'stdin and stdout must both be attached to a terminal'
    );
  }
  return { rows: stdout.rows, cols: stdout.columns };
}
