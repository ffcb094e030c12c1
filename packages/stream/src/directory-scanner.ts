import { readdir, stat } from 'fs/promises';
import { join, normalize } from 'path';
import { detectInputFormat, type InputFormat } from '@colstream/pdf-extract';

export interface InputFileInfo {
  filePath: string;
  fileName: string;
  format: InputFormat;
  sizeBytes: number;
}

export interface ScanResult {
  files: InputFileInfo[];
  skipped: Array<{ fileName: string; reason: string }>;
  directoryPath: string;
}

/**
 * Scans a directory for PDF and JSON token files, filtering out temporary
 * and empty files. Returns files sorted by filename ascending.
 */
export async function scanDirectoryForInputs(directoryPath: string): Promise<ScanResult> {
  const normalizedPath = normalize(directoryPath);
  const entries = await readdir(normalizedPath, { withFileTypes: true });

  const files: InputFileInfo[] = [];
  const skipped: Array<{ fileName: string; reason: string }> = [];

  for (const entry of entries) {
    if (entry.isDirectory()) {
      continue;
    }

    const fileName = entry.name;
    const format = detectInputFormat(fileName);
    if (format === null) {
      continue;
    }

    // Editor lock files and dotfiles
    if (fileName.startsWith('~$') || fileName.startsWith('.')) {
      skipped.push({ fileName, reason: 'Temporary file (starts with ~$ or .)' });
      continue;
    }

    const filePath = join(normalizedPath, fileName);
    const fileStat = await stat(filePath);

    if (fileStat.size === 0) {
      skipped.push({ fileName, reason: 'Zero-byte file' });
      continue;
    }

    files.push({
      filePath,
      fileName,
      format,
      sizeBytes: fileStat.size,
    });
  }

  files.sort((a, b) => a.fileName.localeCompare(b.fileName));

  return {
    files,
    skipped,
    directoryPath: normalizedPath,
  };
}

/**
 * Validates that a directory exists and is accessible.
 */
export async function validateDirectory(directoryPath: string): Promise<{ valid: boolean; error?: string }> {
  try {
    const normalizedPath = normalize(directoryPath);
    const dirStat = await stat(normalizedPath);

    if (!dirStat.isDirectory()) {
      return { valid: false, error: `Path is not a directory: ${normalizedPath}` };
    }

    return { valid: true };
  } catch (error) {
    if (isErrnoException(error)) {
      if (error.code === 'ENOENT') {
        return { valid: false, error: `Directory does not exist: ${directoryPath}` };
      }
      if (error.code === 'EACCES') {
        return { valid: false, error: `Permission denied: ${directoryPath}` };
      }
    }
    return { valid: false, error: `Cannot access directory: ${directoryPath}` };
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
