/**
 * File access for keyword lists, dialect definitions and exported dialects.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/** Keyword lists load while a dialect is being built, which is synchronous. */
export function readFileSync(filePath: string): string {
  return fs.readFileSync(filePath, 'utf-8');
}

/**
 * Write an export, creating the target directory first.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * Resolve the `definitions` globs of the config to absolute file paths.
 *
 * Results are sorted so that dialects register in a stable order.
 */
export async function globFiles(patterns: string | string[], options: { cwd?: string } = {}): Promise<string[]> {
  const files = await fg(patterns, {
    cwd: options.cwd || process.cwd(),
    ignore: ['**/node_modules/**', '**/dist/**'],
    absolute: true,
    onlyFiles: true,
  });
  return files.sort();
}
