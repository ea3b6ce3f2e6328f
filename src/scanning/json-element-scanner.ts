/**
 * JSON Element Scanner
 *
 * Reads a scan result written by an external tool: a JSON array of
 * `{ id, boundingBox: { x, y, width, height }, role }` objects.
 */

import { readFile } from 'fs/promises';
import { ScanError, ErrorCode } from '../shared/errors/index.js';
import { ElementListSchema } from '../shared/schemas/index.js';
import type { Element } from '../shared/types/index.js';
import type { ElementScanner } from './scanner.interface.js';

export class JsonElementScanner implements ElementScanner {
  readonly name: string;

  constructor(private readonly filePath: string) {
    this.name = `json:${filePath}`;
  }

  /**
   * @throws ScanError with SCAN_FAILED when the file is unreadable or invalid
   */
  async scan(): Promise<Element[]> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (error) {
      throw new ScanError(
        `Cannot read element file ${this.filePath}`,
        ErrorCode.SCAN_FAILED,
        { filePath: this.filePath },
        error instanceof Error ? error : undefined,
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new ScanError(
        `Element file ${this.filePath} is not valid JSON`,
        ErrorCode.SCAN_FAILED,
        { filePath: this.filePath },
        error instanceof Error ? error : undefined,
      );
    }

    const parsed = ElementListSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ScanError(`Element file ${this.filePath} has invalid entries`, ErrorCode.SCAN_FAILED, {
        filePath: this.filePath,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      });
    }

    return parsed.data;
  }
}
