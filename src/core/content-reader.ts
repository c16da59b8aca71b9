/**
 * Bounded, cached file reads shared by the detector and the analyzers.
 * Only the first maxFileBytes bytes of a file are ever read.
 */

import { closeSync, openSync, readSync } from 'fs';
import { InventoryFile } from '../types.js';
import { EvidenceReadError } from './errors.js';

export type ReadOutcome =
  | { success: true; data: string }
  | { success: false; error: EvidenceReadError };

export class ContentReader {
  private cache = new Map<string, ReadOutcome>();

  constructor(private readonly maxFileBytes: number) {}

  read(file: InventoryFile): ReadOutcome {
    const cached = this.cache.get(file.path);
    if (cached) {
      return cached;
    }

    const outcome = this.readBounded(file);
    this.cache.set(file.path, outcome);
    return outcome;
  }

  /**
   * Lines of a readable text file, or null for unreadable/binary files
   */
  lines(file: InventoryFile): string[] | null {
    const outcome = this.read(file);
    if (!outcome.success || outcome.data.length === 0) {
      return null;
    }
    return outcome.data.split(/\r?\n/);
  }

  private readBounded(file: InventoryFile): ReadOutcome {
    const length = Math.min(file.size, this.maxFileBytes);
    let fd: number | undefined;

    try {
      fd = openSync(file.absolutePath, 'r');
      const buffer = Buffer.alloc(length);
      const bytesRead = readSync(fd, buffer, 0, length, 0);
      const content = buffer.subarray(0, bytesRead);

      // Binary files carry no textual evidence
      if (content.includes(0)) {
        return { success: true, data: '' };
      }
      return { success: true, data: content.toString('utf-8') };
    } catch (error) {
      return { success: false, error: new EvidenceReadError(file.path, error) };
    } finally {
      if (fd !== undefined) {
        closeSync(fd);
      }
    }
  }
}
