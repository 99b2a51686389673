import { readFile } from 'node:fs/promises';
import { AppError, ERR, describeError } from '@life/shared';
import { parseSeedText } from '../life_core/seed';
import type { SeedParseResult } from '../life_core/types';

export async function loadSeedFile(path: string): Promise<SeedParseResult> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new AppError(
      ERR.SEED_FILE_UNREADABLE,
      `cannot read initial state file ${path}: ${describeError(err)}`
    );
  }
  return parseSeedText(text);
}
