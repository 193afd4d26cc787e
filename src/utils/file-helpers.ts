// src/utils/file-helpers.ts
import * as fs from 'fs';
import * as path from 'path';

export class FileHelpers {
  /**
   * Ensure directory exists
   */
  static ensureDirectory(dirPath: string): void {
    if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
    }
  }

  static writeJsonFile(filePath: string, data: unknown): void {
    FileHelpers.ensureDirectory(path.dirname(filePath));
    fs.writeFileSync(filePath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
  }

  /**
   * Write one JSON document per line
   */
  static writeJsonLines(filePath: string, records: unknown[]): void {
    FileHelpers.ensureDirectory(path.dirname(filePath));
    const content = records.map(record => JSON.stringify(record) + '\n').join('');
    fs.writeFileSync(filePath, content, 'utf-8');
  }

  /**
   * Names of the regular files in a directory with the given extension (case-insensitive),
   * in directory-listing order
   */
  static getFilesByExtension(dirPath: string, extension: string): string[] {
    const wanted = normalizeExtension(extension);
    return fs.readdirSync(dirPath, { withFileTypes: true })
      .filter(entry => entry.isFile() && path.extname(entry.name).toLowerCase() === wanted)
      .map(entry => entry.name);
  }
}

export function normalizeExtension(extension: string): string {
  const lower = extension.toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}
