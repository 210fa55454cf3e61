import { constants } from 'fs';
import { access, stat } from 'fs/promises';
import { dirname, resolve } from 'path';
import { LocalFileError, type ErrorContext } from '../errors.js';

/**
 * Ensure `filePath` is an existing, readable regular file
 *
 * @throws LocalFileError otherwise
 */
export async function requireReadableFile(filePath: string, context: ErrorContext): Promise<void> {
  try {
    await access(filePath, constants.R_OK);
  } catch (error) {
    throw new LocalFileError(filePath, 'Local file does not exist or is not readable', context, error);
  }

  const stats = await stat(filePath);
  if (!stats.isFile()) {
    throw new LocalFileError(filePath, 'Local path is not a file', context);
  }
}

/**
 * Ensure the parent directory of `filePath` exists
 *
 * @throws LocalFileError otherwise
 */
export async function requireParentDirectory(filePath: string, context: ErrorContext): Promise<void> {
  const directory = dirname(resolve(filePath));

  let isDirectory: boolean;
  try {
    isDirectory = (await stat(directory)).isDirectory();
  } catch (error) {
    throw new LocalFileError(directory, 'Destination directory does not exist', context, error);
  }

  if (!isDirectory) {
    throw new LocalFileError(directory, 'Destination parent is not a directory', context);
  }
}
