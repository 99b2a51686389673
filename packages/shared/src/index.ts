export const ERR = {
  INVALID_PARAM: 1001,
  INVALID_DIMENSIONS: 1002,
  OUT_OF_BOUNDS: 1003,
  SEED_OUT_OF_BOUNDS: 1004,
  SEED_FILE_UNREADABLE: 1005,
  TERMINAL_UNAVAILABLE: 1006
} as const;

export type ErrCode = (typeof ERR)[keyof typeof ERR];

export class AppError extends Error {
  // status doubles as the process exit status when the error reaches main
  constructor(public code: ErrCode, message: string, public status = 1) {
    super(message);
    this.name = 'AppError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
