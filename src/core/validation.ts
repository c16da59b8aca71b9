/**
 * Validation utilities for safe JSON parsing with Zod schemas
 */

import { z, ZodError } from 'zod';

/**
 * Safe JSON parse with Zod validation
 */
export function safeParseJson<T>(
  json: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): { success: true; data: T } | { success: false; error: string } {
  try {
    const parsed: unknown = JSON.parse(json);
    const result = schema.safeParse(parsed);
    if (result.success) {
      return { success: true, data: result.data };
    }
    return { success: false, error: formatZodError(result.error) };
  } catch (error) {
    return { success: false, error: error instanceof Error ? error.message : 'Invalid JSON' };
  }
}

/**
 * Format Zod error for logging
 */
export function formatZodError(error: ZodError): string {
  return error.errors
    .map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
    .join(', ');
}

/**
 * Narrative elaboration returned by an LLM executor.
 * The text must arrive inside <narrative></narrative> tags.
 */
export const NarrativeResponse = z.object({
  narrative: z.string().trim().min(1).max(1200),
});
export type NarrativeResponse = z.infer<typeof NarrativeResponse>;

export function parseNarrativeResponse(output: string): NarrativeResponse | null {
  const match = output.match(/<narrative>([\s\S]*?)<\/narrative>/);
  if (!match) {
    return null;
  }
  const result = NarrativeResponse.safeParse({ narrative: match[1] });
  return result.success ? result.data : null;
}

/**
 * Package.json schema (minimal)
 */
export const PackageJsonSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
  dependencies: z.record(z.string(), z.string()).optional(),
  devDependencies: z.record(z.string(), z.string()).optional(),
});
export type PackageJson = z.infer<typeof PackageJsonSchema>;

/**
 * `gh issue create` prints the new issue URL on stdout
 */
export const GitHubIssueUrl = z.string().trim().regex(/\/issues\/\d+$/);
