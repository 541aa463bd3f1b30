import { copyFileSync, existsSync, mkdirSync, readdirSync, readFileSync, unlinkSync, writeFileSync } from 'fs';
import path from 'path';

const SAVES_BEFORE_BACKUP = 10;
const MAX_BACKUPS = 10;
const BACKUP_DIR_NAME = 'backup';
let saveCounter: Record<string, number> = {};

/**
 * Reads a whole text file. A leading byte order mark is removed.
 * @throws Error if the file cannot be read
 */
export function readText(filePath: string): string {
  const data = readFileSync(filePath, 'utf8');
  return data.startsWith('\uFEFF') ? data.slice(1) : data;
}

/**
 * Loads and parses JSON data from a file
 * @template T - The expected type of the loaded data
 * @throws Error if file cannot be read or parsed
 */
export function loadJson<T>(filePath: string): T {
  return JSON.parse(readText(filePath)) as T;
}

/**
 * Copies a file into the `backup` directory beside it with a timestamp suffix.
 * Keeps at most MAX_BACKUPS copies per file, deleting the oldest first.
 */
export const backup = (filePath: string) => {
  const backupDir = path.join(path.dirname(filePath), BACKUP_DIR_NAME);
  const fn = path.basename(filePath);
  if (!existsSync(backupDir)) {
    mkdirSync(backupDir);
  }
  const backups = readdirSync(backupDir).filter((f) => f.startsWith(fn));
  if (backups.length >= MAX_BACKUPS) {
    const oldest = backups.sort((a, b) => a.localeCompare(b))[0];
    unlinkSync(path.join(backupDir, oldest));
  }
  copyFileSync(filePath, path.join(backupDir, `${fn}.${Date.now()}`));
};

/**
 * Determines if a file should be backed up based on save counter
 * @returns True on every SAVES_BEFORE_BACKUP-th save of the file
 */
export const shouldBackup = (filePath: string) => {
  if (!saveCounter[filePath]) {
    saveCounter[filePath] = 0;
  }
  saveCounter[filePath]++;
  if (saveCounter[filePath] >= SAVES_BEFORE_BACKUP) {
    saveCounter[filePath] = 0;
    return true;
  }
  return false;
};

export function resetSaveCounters() {
  saveCounter = {};
}

/**
 * Writes a text file, creating its directory when missing. An existing file is copied to
 * the backup directory every SAVES_BEFORE_BACKUP saves.
 */
export function writeText(filePath: string, content: string) {
  const dir = path.dirname(filePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  if (existsSync(filePath) && shouldBackup(filePath)) {
    backup(filePath);
  }
  writeFileSync(filePath, content);
}

/**
 * Saves data to a JSON file
 * @template T - Type of data being saved
 */
export function saveJson<T>(data: T, filePath: string) {
  writeText(filePath, JSON.stringify(data, null, 2));
}

export function checkExists(filePath: string) {
  return existsSync(filePath);
}
