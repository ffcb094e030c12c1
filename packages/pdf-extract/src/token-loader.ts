/**
 * Loading pre-extracted token documents from JSON.
 */
import { readFile } from 'fs/promises';
import { TokenDocumentSchema, type TokenDocument } from '@colstream/types';

/**
 * Validate a parsed JSON value as a token document.
 * Throws a ZodError naming the offending path when a token is malformed.
 */
export function parseTokenDocument(data: unknown): TokenDocument {
  return TokenDocumentSchema.parse(data);
}

/**
 * Read and validate a token document from a JSON file.
 */
export async function loadTokenDocument(filePath: string): Promise<TokenDocument> {
  const content = await readFile(filePath, 'utf-8');

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid JSON in ${filePath}: ${message}`);
  }

  return parseTokenDocument(data);
}
