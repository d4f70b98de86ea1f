import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';

/** Create a directory (and parents) unless it exists. */
export function ensureDirSync(dirPath: string): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true });
  }
}

/** Write a UTF-8 file, creating its directory first. `mode` applies to new files. */
export function writeFileSafe(filePath: string, content: string, mode?: number): void {
  ensureDirSync(dirname(filePath));
  writeFileSync(filePath, content, { encoding: 'utf-8', mode });
}
