import fs from 'fs/promises';
import path from 'path';
import logger from '../utils/logger';

export async function readJSON<T>(filePath: string): Promise<T> {
  try {
    const data = await fs.readFile(filePath, 'utf-8');
    return JSON.parse(data) as T;
  } catch (error) {
    logger.error(`Failed to read JSON file: ${filePath}`, { error: (error as Error).message });
    throw error;
  }
}

/** Returns null when the file does not exist; other read errors propagate. */
export async function readTextIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

export async function writeText(filePath: string, content: string): Promise<void> {
  try {
    await ensureDirectoryExists(path.dirname(filePath));
    await fs.writeFile(filePath, content, 'utf-8');

    logger.debug(`File written successfully: ${filePath}`);
  } catch (error) {
    logger.error(`Failed to write file: ${filePath}`, { error: (error as Error).message });
    throw error;
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function ensureDirectoryExists(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (error) {
    logger.error(`Failed to create directory: ${dirPath}`, { error: (error as Error).message });
    throw error;
  }
}

/** Structural check: under Jest, fs errors come from another realm and fail `instanceof Error`. */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}
