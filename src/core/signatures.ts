/**
 * Signature Registry
 *
 * Technologies are data. The built-in registry ships as
 * signatures/technologies.yml; a project can merge its own registry
 * over it (entries with the same id replace the built-in ones).
 */

import { existsSync, readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { isAbsolute, join } from 'path';
import YAML from 'yaml';
import picomatch from 'picomatch';
import { Disambiguator, SignatureRegistry, TechnologySignature } from '../types.js';
import { InputError } from './errors.js';
import { formatZodError } from './validation.js';

export const BUILT_IN_REGISTRY_PATH = fileURLToPath(
  new URL('../../signatures/technologies.yml', import.meta.url)
);

export interface CompiledSignature {
  signature: TechnologySignature;
  matchesPath: (relativePath: string) => boolean;
  contentPatterns: RegExp[];
  disambiguators: CompiledDisambiguator[];
}

export type CompiledDisambiguator =
  | { type: 'marker'; pattern: string; matches: (relativePath: string) => boolean }
  | { type: 'token'; token: string };

export function parseRegistry(text: string, source: string): SignatureRegistry {
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InputError('invalid-config', `Failed to parse signature registry ${source}: ${message}`);
  }

  const result = SignatureRegistry.safeParse(raw);
  if (!result.success) {
    throw new InputError('invalid-config', `Invalid signature registry ${source}: ${formatZodError(result.error)}`);
  }

  const seen = new Set<string>();
  for (const signature of result.data.signatures) {
    if (seen.has(signature.id)) {
      throw new InputError('invalid-config', `Duplicate signature id "${signature.id}" in ${source}`);
    }
    seen.add(signature.id);
  }

  return result.data;
}

export function loadRegistryFile(path: string): SignatureRegistry {
  if (!existsSync(path)) {
    throw new InputError('invalid-config', `Signature registry not found: ${path}`);
  }
  return parseRegistry(readFileSync(path, 'utf-8'), path);
}

/**
 * Load the built-in registry, optionally merged with a project registry.
 * Relative extra paths resolve against the scanned root.
 */
export function loadSignatures(root: string, extraRegistry?: string): TechnologySignature[] {
  const builtIn = loadRegistryFile(BUILT_IN_REGISTRY_PATH).signatures;
  if (!extraRegistry) {
    return builtIn;
  }

  const extraPath = isAbsolute(extraRegistry) ? extraRegistry : join(root, extraRegistry);
  return mergeSignatures(builtIn, loadRegistryFile(extraPath).signatures);
}

export function mergeSignatures(
  base: TechnologySignature[],
  overrides: TechnologySignature[]
): TechnologySignature[] {
  const byId = new Map(base.map((signature) => [signature.id, signature]));
  for (const signature of overrides) {
    byId.set(signature.id, signature);
  }
  return [...byId.values()];
}

export function compileSignatures(signatures: TechnologySignature[]): CompiledSignature[] {
  return signatures.map(compileSignature);
}

export function compileSignature(signature: TechnologySignature): CompiledSignature {
  const contentPatterns = signature.contentPatterns.map((pattern) => {
    try {
      return new RegExp(pattern, 'i');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new InputError('invalid-config', `Signature "${signature.id}" has an invalid content pattern /${pattern}/: ${message}`);
    }
  });

  return {
    signature,
    matchesPath: picomatch(signature.filePatterns, { dot: true }),
    contentPatterns,
    disambiguators: signature.disambiguators.map(compileDisambiguator),
  };
}

function compileDisambiguator(disambiguator: Disambiguator): CompiledDisambiguator {
  if ('markerFile' in disambiguator) {
    // Bare names match anywhere in the tree
    const pattern = disambiguator.markerFile.includes('/')
      ? disambiguator.markerFile
      : `**/${disambiguator.markerFile}`;
    return { type: 'marker', pattern, matches: picomatch(pattern, { dot: true }) };
  }
  return { type: 'token', token: disambiguator.contentToken };
}
