import { copyFileSync, existsSync, mkdirSync, readdirSync, readFileSync, unlinkSync, writeFileSync } from 'fs';
import path from 'path';

const SAVES_BEFORE_BACKUP = 10;
const BACKUP_DIR_NAME = 'backup';
const MAX_BACKUPS = 10;
const saveCounter: Record<string, number> = {};

/**
 * Loads and parses JSON data from a file
 * @template T - The expected type of the loaded data
 * @param fn - Filename relative to `baseDir`
 * @throws Error if file cannot be read or parsed
 */
export function load<T>(fn: string, baseDir: string): T {
  const data = readFileSync(path.join(baseDir, fn), 'utf8');
  return JSON.parse(data) as T;
}

/**
 * Like {@link load}, but returns `fallback` when the file does not exist yet
 */
export function loadOrDefault<T>(fn: string, fallback: T, baseDir: string): T {
  if (!checkExists(fn, baseDir)) {
    return fallback;
  }
  return load<T>(fn, baseDir);
}

/**
 * Creates a timestamped backup copy of a file, keeping at most MAX_BACKUPS per file
 */
export function backup(fn: string, baseDir: string): void {
  const backupDir = path.join(baseDir, BACKUP_DIR_NAME);
  if (!existsSync(backupDir)) {
    mkdirSync(backupDir, { recursive: true });
  }
  const backups = readdirSync(backupDir)
    .filter((f) => f.startsWith(`${fn}.`))
    .sort((a, b) => a.localeCompare(b));
  if (backups.length >= MAX_BACKUPS) {
    unlinkSync(path.join(backupDir, backups[0]));
  }
  copyFileSync(path.join(baseDir, fn), path.join(backupDir, `${fn}.${Date.now()}`));
}

/**
 * Counts saves per file and reports every SAVES_BEFORE_BACKUP-th one
 */
export function shouldBackup(fn: string): boolean {
  saveCounter[fn] = (saveCounter[fn] ?? 0) + 1;
  if (saveCounter[fn] >= SAVES_BEFORE_BACKUP) {
    saveCounter[fn] = 0;
    return true;
  }
  return false;
}

/**
 * Saves data as pretty-printed JSON, backing up the previous file periodically
 */
export function save<T>(data: T, fn: string, baseDir: string): void {
  if (!existsSync(baseDir)) {
    mkdirSync(baseDir, { recursive: true });
  }
  if (shouldBackup(fn) && checkExists(fn, baseDir)) {
    backup(fn, baseDir);
  }
  writeFileSync(path.join(baseDir, fn), JSON.stringify(data, null, 2));
}

export function checkExists(fn: string, baseDir: string): boolean {
  return existsSync(path.join(baseDir, fn));
}
