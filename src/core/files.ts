import { mkdir, chmod, access, readFile, writeFile } from 'node:fs/promises';
import { constants } from 'node:fs';
import { platform } from 'node:os';

const isWindows = platform() === 'win32';

/** Ensure a directory exists with 0700 permissions. */
export async function ensureSecureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
  if (!isWindows) {
    await chmod(dirPath, 0o700);
  }
}

/** Check if a file exists and is accessible. */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  return JSON.parse(await readFile(filePath, 'utf-8'));
}

/** Writes pretty JSON readable only by the owner (0600). */
export async function writeSecureJson(filePath: string, data: unknown): Promise<void> {
  await writeFile(filePath, JSON.stringify(data, null, 2) + '\n', { mode: 0o600 });
  if (!isWindows) {
    await chmod(filePath, 0o600);
  }
}
