import type { ReactElement } from 'react';
import { render } from 'ink';
import type { QuitSignal, Screen } from '../driver/loop';
import type { Board } from '../life_core/types';
import { renderRows } from './frame';
import { LifeView } from './LifeView';

export const ENTER_ALT_SCREEN = '\u001b[?1049h';
export const LEAVE_ALT_SCREEN = '\u001b[?1049l';

// The part of an Ink instance the screen drives.
export type MountedView = {
  rerender(node: ReactElement): void;
  unmount(): void;
};

export type InkScreenOptions = {
  out?: { write(chunk: string): unknown };
  mount?: (node: ReactElement) => MountedView;
};

const mountOnTerminal = (node: ReactElement): MountedView =>
  render(node, { exitOnCtrlC: false, patchConsole: false });

/**
 * Full-screen Ink renderer. Key presses are only delivered while the event
 * loop is free, i.e. while the driver sleeps between generations.
 */
export class InkScreen implements Screen, QuitSignal {
  private mounted: MountedView | null = null;
  private quit = false;
  private readonly out: { write(chunk: string): unknown };
  private readonly mount: (node: ReactElement) => MountedView;

  constructor(opts: InkScreenOptions = {}) {
    this.out = opts.out ?? process.stdout;
    this.mount = opts.mount ?? mountOnTerminal;
  }

  open(): void {
    if (this.mounted) return;
    this.out.write(ENTER_ALT_SCREEN);
    this.mounted = this.mount(this.view([], 0));
  }

  draw(board: Board, generation: number): void {
    this.mounted?.rerender(this.view(renderRows(board), generation, board.cols));
  }

  quitRequested(): boolean {
    return this.quit;
  }

  close(): void {
    if (!this.mounted) return;
    this.mounted.unmount();
    this.mounted = null;
    this.out.write(LEAVE_ALT_SCREEN);
  }

  private view(rows: string[], generation: number, width?: number) {
    return (
      <LifeView
        rows={rows}
        generation={generation}
        width={width}
        onQuit={() => {
          this.quit = true;
        }}
      />
    );
  }
}
