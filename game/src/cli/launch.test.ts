import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { render } from 'ink-testing-library';
import { tsImport } from 'tsx/esm/api';
import { afterEach, describe, expect, it } from 'vitest';
import { tsImportOptions } from '../../bin/launch.mjs';

describe('tsImportOptions', () => {
  const startDir = process.cwd();

  afterEach(() => {
    process.chdir(startDir);
  });

  it('points tsx at the root tsconfig whatever the working directory', () => {
    const opts = tsImportOptions();
    const rootConfig = fileURLToPath(new URL('../../../tsconfig.json', import.meta.url));
    expect(opts.tsconfig).toBe(rootConfig);
    expect(opts.parentURL).toBe(new URL('../../bin/launch.mjs', import.meta.url).href);
  });

  it('loads the JSX terminal screen from another working directory', async () => {
    process.chdir(tmpdir());
    const screenModule: typeof import('../terminal/InkScreen') = await tsImport(
      '../src/terminal/InkScreen.tsx',
      tsImportOptions()
    );
    let frame: string | undefined;
    const screen = new screenModule.InkScreen({
      out: { write: () => true },
      mount: (node) => {
        const mounted = render(node);
        frame = mounted.lastFrame();
        return mounted;
      }
    });

    expect(() => screen.open()).not.toThrow();
    expect(frame).toContain('press q to quit · generation 0');
    screen.close();
  });
});
