import { readFile } from 'fs/promises';
import { parseAbc } from './importers';
import type { AbcDocument, ParseOptions } from './types';

/**
 * Parse an ABC file from disk
 * @param filePath - Path to the file
 * @returns The parsed document
 */
export async function parseFile(filePath: string, options: ParseOptions = {}): Promise<AbcDocument> {
  const text = await readFile(filePath, 'utf-8');
  return parseAbc(text, options);
}
