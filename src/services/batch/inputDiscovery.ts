import { promises as fs, type Dirent } from 'fs';
import { extname, join } from 'path';
import { ConfigurationError, getErrorCode } from '../../types/errors.js';

/**
 * List the input documents of a batch: regular files directly inside `inputDir` whose
 * extension (case-insensitive, without dot) is one of `extensions`. Sorted by name.
 *
 * @throws {ConfigurationError} if the directory does not exist or is not a directory
 */
export async function discoverInputs(inputDir: string, extensions: readonly string[]): Promise<string[]> {
  const wanted = new Set(extensions.map(ext => ext.replace(/^\./, '').toLowerCase()));

  let entries: Dirent[];
  try {
    entries = await fs.readdir(inputDir, { withFileTypes: true });
  } catch (error) {
    const code = getErrorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      throw new ConfigurationError(`Input directory not found: ${inputDir}`, { inputDir });
    }
    throw error;
  }

  return entries
    .filter(entry => entry.isFile() && wanted.has(extname(entry.name).slice(1).toLowerCase()))
    .map(entry => entry.name)
    .sort()
    .map(name => join(inputDir, name));
}
