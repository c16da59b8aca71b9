/**
 * Tree Scanner
 *
 * Walks the input directory, drops build output, vendored dependencies
 * and generated code, and classifies what is left. The walk only stats
 * files; contents are read later, bounded, by the detector.
 *
 * A tree larger than the configured ceilings is rejected outright with
 * an InputError. It is never truncated.
 */

import { existsSync, statSync } from 'fs';
import { resolve, join } from 'path';
import fg from 'fast-glob';
import picomatch from 'picomatch';
import { ArchscryConfig, FileInventory, FileKind, InventoryFile } from '../types.js';
import { InputError } from './errors.js';

// ─────────────────────────────────────────────────────────────
// Exclusion Rules
// ─────────────────────────────────────────────────────────────

export const BUILT_IN_EXCLUDES = [
  // VCS and our own state
  '**/.git/**',
  '**/.archscry/**',
  // Build artifacts
  '**/dist/**',
  '**/build/**',
  '**/out/**',
  '**/target/**',
  '**/.next/**',
  '**/.nuxt/**',
  '**/coverage/**',
  '**/__pycache__/**',
  '**/*.pyc',
  '**/*.class',
  // Vendored dependencies
  '**/node_modules/**',
  '**/vendor/**',
  '**/third_party/**',
  '**/.venv/**',
  '**/venv/**',
  '**/bower_components/**',
  // Generated code
  '**/*.min.js',
  '**/*.min.css',
  '**/*.map',
  '**/*.generated.*',
  '**/__generated__/**',
  '**/*.pb.go',
  '**/*_pb2.py',
  '**/*.lock',
  '**/package-lock.json',
  '**/pnpm-lock.yaml',
];

// ─────────────────────────────────────────────────────────────
// Classification
// ─────────────────────────────────────────────────────────────

const CLASSIFIERS: Array<{ kind: FileKind; patterns: string[] }> = [
  {
    kind: 'fixture',
    patterns: [
      '**/fixtures/**',
      '**/__fixtures__/**',
      '**/testdata/**',
      '**/test-data/**',
      '**/stubs/**',
      '**/fakes/**',
      '**/doubles/**',
      '**/__mocks__/**',
      '**/mocks/**',
    ],
  },
  {
    kind: 'test',
    patterns: [
      '**/__tests__/**',
      '**/test/**',
      '**/tests/**',
      '**/spec/**',
      '**/e2e/**',
      '**/*.test.*',
      '**/*.spec.*',
      '**/test_*.py',
      '**/*_test.py',
      '**/*_test.go',
      '**/conftest.py',
    ],
  },
  {
    kind: 'vendored-config',
    patterns: [
      '**/.vscode/**',
      '**/.idea/**',
      '**/.devcontainer/**',
      '**/.husky/**',
      '**/.eslintrc*',
      '**/eslint.config.*',
      '**/.prettierrc*',
      '**/prettier.config.*',
      '**/.editorconfig',
      '**/.stylelintrc*',
      '**/.markdownlint*',
      '**/renovate.json',
      '**/.dependabot/**',
    ],
  },
  {
    kind: 'infrastructure',
    patterns: [
      '**/Dockerfile',
      '**/Dockerfile.*',
      '**/*.dockerfile',
      '**/docker-compose*.{yml,yaml}',
      '**/compose.{yml,yaml}',
      '**/*.tf',
      '**/*.tfvars',
      '**/k8s/**',
      '**/kubernetes/**',
      '**/helm/**',
      '**/charts/**',
      '**/.github/workflows/**',
      '**/.gitlab-ci.yml',
      '**/Jenkinsfile',
      '**/.circleci/**',
      '**/serverless.{yml,yaml}',
    ],
  },
  {
    kind: 'documentation',
    patterns: [
      '**/docs/**',
      '**/*.md',
      '**/*.mdx',
      '**/*.rst',
      '**/*.adoc',
      '**/LICENSE*',
    ],
  },
  {
    kind: 'config',
    patterns: [
      '**/*.{json,jsonc,yml,yaml,toml,ini,cfg,conf,properties,xml,gradle}',
      '**/.env',
      '**/.env.*',
      '**/*.config.{js,cjs,mjs,ts}',
      '**/requirements*.txt',
      '**/Pipfile',
      '**/go.mod',
      '**/Gemfile',
      '**/Makefile',
      '**/*.prisma',
    ],
  },
];

const MATCHERS = CLASSIFIERS.map(({ kind, patterns }) => ({
  kind,
  isMatch: picomatch(patterns, { dot: true }),
}));

/**
 * Classify a relative path. First matching rule wins, so a fixture
 * inside a tests/ directory is a fixture, not a test.
 */
export function classifyFile(relativePath: string): FileKind {
  for (const matcher of MATCHERS) {
    if (matcher.isMatch(relativePath)) {
      return matcher.kind;
    }
  }
  return 'source';
}

export function isNonProduction(kind: FileKind): boolean {
  return kind === 'test' || kind === 'fixture' || kind === 'vendored-config';
}

// ─────────────────────────────────────────────────────────────
// Scanner
// ─────────────────────────────────────────────────────────────

export function validateInputPath(root: string): string {
  const absoluteRoot = resolve(root);
  if (!existsSync(absoluteRoot)) {
    throw new InputError('path-missing', `Path does not exist: ${absoluteRoot}`);
  }
  if (!statSync(absoluteRoot).isDirectory()) {
    throw new InputError('not-a-directory', `Path is not a directory: ${absoluteRoot}`);
  }
  return absoluteRoot;
}

export async function scanTree(root: string, config: ArchscryConfig): Promise<FileInventory> {
  const absoluteRoot = validateInputPath(root);
  const { maxFiles, maxTotalBytes } = config.limits;

  const entries = await fg(config.include, {
    cwd: absoluteRoot,
    ignore: [...BUILT_IN_EXCLUDES, ...config.exclude.map(toIgnorePattern)],
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    stats: true,
  });

  if (entries.length > maxFiles) {
    throw new InputError(
      'ceiling-exceeded',
      `Tree has ${entries.length} files after exclusions, above the limit of ${maxFiles}`
    );
  }

  const files: InventoryFile[] = [];
  let totalBytes = 0;

  for (const entry of [...entries].sort((a, b) => a.path.localeCompare(b.path))) {
    const absolutePath = join(absoluteRoot, entry.path);
    const size = entry.stats?.size ?? statSync(absolutePath).size;
    totalBytes += size;

    if (totalBytes > maxTotalBytes) {
      throw new InputError(
        'ceiling-exceeded',
        `Tree exceeds the byte limit of ${maxTotalBytes} bytes`
      );
    }

    files.push({
      path: entry.path,
      absolutePath,
      size,
      kind: classifyFile(entry.path),
    });
  }

  return { root: absoluteRoot, files, totalBytes };
}

/**
 * Config excludes are written like .gitignore entries ("dist", "logs/")
 */
function toIgnorePattern(pattern: string): string {
  if (pattern.includes('*') || pattern.includes('/')) {
    const trimmed = pattern.replace(/\/$/, '');
    return trimmed.includes('*') ? trimmed : `**/${trimmed}/**`;
  }
  return `**/${pattern}/**`;
}
