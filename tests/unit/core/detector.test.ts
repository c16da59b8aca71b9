import { describe, it, expect, afterEach, vi } from 'vitest';
import { rmSync } from 'fs';
import { join } from 'path';
import { detectTechnologies } from '../../../src/core/detector.js';
import { compileSignatures, loadSignatures, mergeSignatures, parseRegistry } from '../../../src/core/signatures.js';
import { ContentReader } from '../../../src/core/content-reader.js';
import { scanTree } from '../../../src/core/tree-scanner.js';
import { defaultConfig } from '../../../src/core/config.js';
import { InputError } from '../../../src/core/errors.js';
import type { TechnologySignature } from '../../../src/types.js';
import { createTree } from '../../helpers/fixtures.js';

async function detect(files: Record<string, string>, signatures?: TechnologySignature[]) {
  const tree = createTree(files);
  cleanups.push(tree.cleanup);
  const inventory = await scanTree(tree.root, defaultConfig());
  const compiled = compileSignatures(signatures ?? loadSignatures(tree.root));
  return detectTechnologies(inventory, compiled, new ContentReader(64 * 1024));
}

const cleanups: Array<() => void> = [];

describe('core/detector', () => {
  afterEach(() => {
    cleanups.splice(0).forEach((fn) => fn());
  });

  it('should detect a database and an ORM named in one config file', async () => {
    const { evidence } = await detect({
      'config/database.yml': 'production:\n  dialect: postgres\n  orm: sequelize\n  host: db.internal\n',
    });

    expect(evidence).toEqual([
      {
        technologyId: 'postgresql',
        category: 'database',
        filePath: 'config/database.yml',
        lineRef: 2,
        matchStrength: 'content',
      },
      {
        technologyId: 'sequelize',
        category: 'orm',
        filePath: 'config/database.yml',
        lineRef: 3,
        matchStrength: 'content',
      },
    ]);
  });

  it('should skip a file that can no longer be read and keep detecting', async () => {
    const tree = createTree({
      'config/cache.yml': 'url: redis://cache:6379\n',
      'config/database.yml': 'production:\n  dialect: postgres\n',
    });
    cleanups.push(tree.cleanup);
    const inventory = await scanTree(tree.root, defaultConfig());
    rmSync(join(tree.root, 'config', 'cache.yml'));
    const onWarning = vi.fn();

    const result = detectTechnologies(
      inventory,
      compileSignatures(loadSignatures(tree.root)),
      new ContentReader(64 * 1024),
      { onWarning }
    );

    expect(result.unreadable.map((e) => e.filePath)).toEqual(['config/cache.yml']);
    expect(onWarning).toHaveBeenCalledTimes(1);
    expect(onWarning).toHaveBeenCalledWith(expect.stringMatching(/^Could not read config\/cache\.yml: ENOENT/));
    expect(result.evidence).toEqual([
      {
        technologyId: 'postgresql',
        category: 'database',
        filePath: 'config/database.yml',
        lineRef: 2,
        matchStrength: 'content',
      },
    ]);
  });

  it('should record path-only evidence for language files', async () => {
    const { evidence } = await detect({ 'src/app.py': 'print("hi")\n' });

    expect(evidence).toEqual([
      { technologyId: 'python', category: 'language', filePath: 'src/app.py', matchStrength: 'path' },
    ]);
  });

  it('should reject a path match whose disambiguator does not hold', async () => {
    const signatures: TechnologySignature[] = [
      {
        id: 'widgetdb',
        name: 'WidgetDB',
        category: 'database',
        filePatterns: ['**/*.conf'],
        contentPatterns: [],
        disambiguators: [{ markerFile: 'widget.marker' }],
        pathOnly: true,
      },
    ];

    const without = await detect({ 'app.conf': 'x = 1\n' }, signatures);
    expect(without.evidence).toEqual([]);

    const withMarker = await detect({ 'app.conf': 'x = 1\n', 'db/widget.marker': '' }, signatures);
    expect(withMarker.evidence.map((e) => e.filePath)).toEqual(['app.conf']);
  });

  it('should accept a content token disambiguator', async () => {
    const signatures: TechnologySignature[] = [
      {
        id: 'widgetdb',
        name: 'WidgetDB',
        category: 'database',
        filePatterns: ['**/*.conf'],
        contentPatterns: [],
        disambiguators: [{ contentToken: 'WIDGET' }],
        pathOnly: true,
      },
    ];

    const { evidence } = await detect({ 'a.conf': 'engine = widget\n', 'b.conf': 'engine = other\n' }, signatures);

    expect(evidence.map((e) => e.filePath)).toEqual(['a.conf']);
  });

  it('should not match a content signature on path alone', async () => {
    const { evidence } = await detect({ 'config/app.yml': 'name: service\n' });

    expect(evidence.filter((e) => e.category !== 'language')).toEqual([]);
  });

  describe('registry', () => {
    it('should reject duplicate ids', () => {
      const text = [
        'signatures:',
        '  - { id: a, name: A, category: database, filePatterns: ["*.x"] }',
        '  - { id: a, name: A2, category: database, filePatterns: ["*.y"] }',
      ].join('\n');

      expect(() => parseRegistry(text, 'test.yml')).toThrow(/Duplicate signature id "a"/);
    });

    it('should reject an invalid content pattern at compile time', () => {
      const signature: TechnologySignature = {
        id: 'broken',
        name: 'Broken',
        category: 'database',
        filePatterns: ['*.x'],
        contentPatterns: ['(unclosed'],
        disambiguators: [],
        pathOnly: false,
      };

      expect(() => compileSignatures([signature])).toThrow(InputError);
    });

    it('should let project signatures replace built-in ones by id', () => {
      const base = loadSignatures(process.cwd());
      const override: TechnologySignature = {
        id: 'postgresql',
        name: 'Postgres (internal fork)',
        category: 'database',
        filePatterns: ['**/*.pgconf'],
        contentPatterns: [],
        disambiguators: [],
        pathOnly: true,
      };

      const merged = mergeSignatures(base, [override]);

      expect(merged).toHaveLength(base.length);
      expect(merged.find((s) => s.id === 'postgresql')?.name).toBe('Postgres (internal fork)');
    });
  });
});
