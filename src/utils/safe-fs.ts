/**
 * Path-validated file system helpers.
 *
 * Every artifact the scan reads or writes (the gene list, per-window reports,
 * the workbook, the optional config file) goes through these wrappers so that
 * empty or null-byte paths fail with a single error type before touching disk.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The path that failed validation. */
  public readonly invalidPath: string;

  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates a path and resolves it against the working directory.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty or contains null bytes.
 */
export function validatePath(filePath: string): string {
  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  return path.resolve(filePath);
}

/**
 * Reads a UTF-8 text file.
 *
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be read.
 */
export async function safeReadText(filePath: string): Promise<string> {
  const validatedPath = validatePath(filePath);
  return fs.readFile(validatedPath, 'utf-8');
}

/**
 * Writes a UTF-8 text file, replacing any existing content.
 *
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be written.
 */
export async function safeWriteText(filePath: string, content: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  await fs.writeFile(validatedPath, content, 'utf-8');
}

/**
 * Writes binary content, replacing any existing file.
 *
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be written.
 */
export async function safeWriteBinary(filePath: string, content: Uint8Array): Promise<void> {
  const validatedPath = validatePath(filePath);
  await fs.writeFile(validatedPath, content);
}

/**
 * Creates a directory and any missing parents. Existing directories are fine.
 *
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeMkdir(dirPath: string): Promise<void> {
  const validatedPath = validatePath(dirPath);
  await fs.mkdir(validatedPath, { recursive: true });
}

/**
 * Checks whether a path exists.
 *
 * @returns True if something exists at the path, false otherwise (including invalid paths).
 */
export async function safeExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(validatePath(filePath));
    return true;
  } catch {
    return false;
  }
}
