import { promises as fs, mkdirSync } from 'node:fs';
import path from 'node:path';

export function ensureDirectorySync(dirPath: string): void {
  mkdirSync(dirPath, { recursive: true });
}

export async function ensureDirectory(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function appendLine(filePath: string, line: string): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  await fs.appendFile(filePath, `${line}\n`, 'utf-8');
}

export function getDataDirectory(): string {
  const baseDir = process.env.SWITCHBOARD_DATA_DIR || process.cwd();
  return path.join(baseDir, 'data');
}

export function getDatabasePath(name: string): string {
  return path.join(getDataDirectory(), `${name}.db`);
}
