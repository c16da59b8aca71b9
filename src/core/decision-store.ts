/**
 * Decision Store
 *
 * The persisted set of accepted decision records, shared by every run
 * against the same tree. The store is only ever read whole, merged by
 * the reconciler, and written back whole through a temp-file rename, so
 * a concurrently starting run never sees a half-written file.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'fs';
import { basename, dirname, isAbsolute, join } from 'path';
import { z } from 'zod';
import { DecisionRecord } from '../types.js';
import { safeParseJson } from './validation.js';
import { InputError } from './errors.js';
import { parseDecisionNumber } from './extractor.js';

const STORE_VERSION = '1';

export const DecisionStoreFile = z.object({
  version: z.string(),
  updatedAt: z.string(),
  decisions: z.array(DecisionRecord),
});
export type DecisionStoreFile = z.infer<typeof DecisionStoreFile>;

/**
 * Knowledge-index write side: persist one record, get back its node id
 */
export interface KnowledgeIndex {
  persistDecision(record: DecisionRecord): string;
}

export function resolveStorePath(root: string, storePath: string): string {
  return isAbsolute(storePath) ? storePath : join(root, storePath);
}

export function createEmptyStore(): DecisionStoreFile {
  return {
    version: STORE_VERSION,
    updatedAt: new Date().toISOString(),
    decisions: [],
  };
}

/**
 * Load the store. A missing file is an empty store; a corrupt one is an
 * input error, never silently replaced.
 */
export function loadStore(path: string): DecisionStoreFile {
  if (!existsSync(path)) {
    return createEmptyStore();
  }

  const result = safeParseJson(readFileSync(path, 'utf-8'), DecisionStoreFile);
  if (!result.success) {
    throw new InputError('invalid-store', `Decision store ${path} is invalid: ${result.error}`);
  }
  return result.data;
}

/**
 * Write the store atomically: temp file in the same directory, then rename
 */
export function saveStore(path: string, store: DecisionStoreFile): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const tmpPath = join(dir, `.${basename(path)}.${process.pid}.${Date.now()}.tmp`);
  try {
    writeFileSync(tmpPath, JSON.stringify(store, null, 2) + '\n');
    renameSync(tmpPath, path);
  } catch (error) {
    rmSync(tmpPath, { force: true });
    throw error;
  }
}

/**
 * Highest ADR number in the store, so a run's ids continue after it
 */
export function highestDecisionNumber(store: DecisionStoreFile): number {
  let highest = 0;
  for (const record of store.decisions) {
    const n = parseDecisionNumber(record.id);
    if (n !== null && n > highest) {
      highest = n;
    }
  }
  return highest;
}

export function countByCategory(store: DecisionStoreFile): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const record of store.decisions) {
    counts[record.category] = (counts[record.category] || 0) + 1;
  }
  return counts;
}

/**
 * JSON-file knowledge index. Records are collected in memory and
 * committed in one atomic write; a record with an existing id
 * supersedes the stored one, anything else is appended.
 */
export class JsonKnowledgeIndex implements KnowledgeIndex {
  private decisions: DecisionRecord[];

  constructor(
    private readonly path: string,
    base: DecisionStoreFile
  ) {
    this.decisions = [...base.decisions];
  }

  persistDecision(record: DecisionRecord): string {
    const index = this.decisions.findIndex((d) => d.id === record.id);
    if (index >= 0) {
      this.decisions = this.decisions.map((d, i) => (i === index ? record : d));
    } else {
      this.decisions = [...this.decisions, record];
    }
    return record.id;
  }

  snapshot(): DecisionStoreFile {
    return {
      version: STORE_VERSION,
      updatedAt: new Date().toISOString(),
      decisions: this.decisions,
    };
  }

  commit(): DecisionStoreFile {
    const store = this.snapshot();
    saveStore(this.path, store);
    return store;
  }
}
