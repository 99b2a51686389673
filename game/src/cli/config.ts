export type LifeConfig = {
  seedFile: string;
  intervalMs: number;
  center: boolean;
};

export const DEFAULT_INTERVAL_MS = 100;

// exit status for usage errors
export const USAGE_STATUS = 2;

export const USAGE = [
  'usage: life [OPTION]... INIT_STATE',
  "terminal rendering of Conway's game of life",
  '  -t, --update-rate-ms <ms>  delay between generations in milliseconds (default 100)',
  '  -c, --center               center the initial pattern on the board',
  '  -h, --help                 print this help page',
  '  INIT_STATE                 file with one "(row, col)" live cell per line'
].join('\n');
