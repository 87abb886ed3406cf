import * as fs from 'fs/promises';
import * as path from 'path';
import { minimatch } from 'minimatch';
import type { Dirent } from 'fs';
import { FileUnreadableError } from '../errors/file-unreadable-error';
import { Logger } from './cli-utils';

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Check if a directory exists
 */
export async function directoryExists(dirPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(dirPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Read a text file. Fails with FileUnreadableError instead of a raw fs error.
 */
export async function readSourceFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new FileUnreadableError(filePath, error instanceof Error ? error : undefined);
  }
}

/**
 * Read a text file that may legitimately be missing or unreadable; returns null in both cases
 */
export async function tryReadText(filePath: string, logger?: Logger): Promise<string | null> {
  if (!(await fileExists(filePath))) {
    return null;
  }
  try {
    return await readSourceFile(filePath);
  } catch (error) {
    if (error instanceof FileUnreadableError) {
      logger?.debug(error.message);
      return null;
    }
    throw error;
  }
}

interface WalkContext {
  root: string;
  maxDepth: number;
  excludeDirectories: Set<string>;
  excludePatterns: string[];
  files: string[];
  logger: Logger | undefined;
}

export interface FindFilesOptions {
  excludeDirectories?: string[];
  excludePatterns?: string[];
  maxDepth?: number;
  logger?: Logger;
}

/**
 * Find files recursively in a directory with optional filtering.
 * Returns POSIX paths relative to `dir`, in a stable (name-sorted) traversal order.
 */
export async function findFiles(dir: string, options: FindFilesOptions = {}): Promise<string[]> {
  const { excludeDirectories = [], excludePatterns = [], maxDepth = 32, logger } = options;
  const context: WalkContext = {
    root: dir,
    maxDepth,
    excludeDirectories: new Set(excludeDirectories),
    excludePatterns,
    files: [],
    logger,
  };

  await walkDirectory(dir, 0, context);
  return context.files;
}

async function walkDirectory(currentDir: string, depth: number, context: WalkContext): Promise<void> {
  if (depth > context.maxDepth) return;

  let entries: Dirent[];
  try {
    entries = await fs.readdir(currentDir, { withFileTypes: true });
  } catch (error) {
    context.logger?.debug(
      `Skipping unreadable directory ${currentDir}: ${error instanceof Error ? error.message : String(error)}`
    );
    return;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  await processDirectoryEntries(entries, currentDir, depth, context);
}

async function processDirectoryEntries(
  entries: Dirent[],
  currentDir: string,
  depth: number,
  context: WalkContext
): Promise<void> {
  for (const entry of entries) {
    const fullPath = path.join(currentDir, entry.name);

    if (entry.isDirectory()) {
      if (!context.excludeDirectories.has(entry.name)) {
        await walkDirectory(fullPath, depth + 1, context);
      }
    } else if (entry.isFile()) {
      const relativePath = toPosixPath(path.relative(context.root, fullPath));
      if (!shouldExclude(relativePath, context.excludePatterns)) {
        context.files.push(relativePath);
      }
    }
  }
}

/**
 * Check if a file path should be excluded based on patterns
 */
export function shouldExclude(filePath: string, patterns: string[]): boolean {
  const normalizedPath = toPosixPath(filePath);
  return patterns.some(pattern => minimatch(normalizedPath, pattern, { dot: true }));
}

export function toPosixPath(filePath: string): string {
  return filePath.replace(/\\/g, '/');
}

/**
 * File name without directory or (last) extension
 */
export function fileStem(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

export function countLines(text: string): number {
  return text.split('\n').length;
}
