import { FileKind, FileInventory, InventoryFile } from '../../types.js';
import { ContentReader } from '../content-reader.js';

export interface LineRule {
  id: string;
  pattern: RegExp;
  // Matched text that disqualifies the hit (placeholders, env lookups)
  unless?: RegExp;
}

export interface LineHit<R extends LineRule> {
  rule: R;
  file: InventoryFile;
  line: number;
  text: string;
}

/**
 * Run line rules over every readable file of the given kinds, in
 * inventory order. Unreadable files were already reported by the
 * detector and are skipped here.
 */
export function scanLines<R extends LineRule>(
  inventory: FileInventory,
  reader: ContentReader,
  kinds: FileKind[],
  rules: R[]
): LineHit<R>[] {
  const hits: LineHit<R>[] = [];

  for (const file of inventory.files) {
    if (!kinds.includes(file.kind)) continue;
    const lines = reader.lines(file);
    if (!lines) continue;

    lines.forEach((text, index) => {
      for (const rule of rules) {
        const match = text.match(rule.pattern);
        if (match && !(rule.unless && rule.unless.test(match[0]))) {
          hits.push({ rule, file, line: index + 1, text });
        }
      }
    });
  }

  return hits;
}

export function locationOf(hit: { file: InventoryFile; line: number }): string {
  return `${hit.file.path}:${hit.line}`;
}

export function formatSequenceId(prefix: string, n: number): string {
  return `${prefix}-${String(n).padStart(3, '0')}`;
}
