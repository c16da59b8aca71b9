/**
 * Narrative Synthesizer
 *
 * Elaborates a deterministic rationale skeleton through an LLM executor.
 * Executors are "dumb prompt runners"; everything else (prompting,
 * parsing, fallback decisions) lives here.
 */

import { Evidence } from '../types.js';
import { buildNarrativePrompt } from '../providers/prompts/narrative.js';
import { parseNarrativeResponse } from './validation.js';
import { SynthesisFailure, describeError } from './errors.js';

// ─────────────────────────────────────────────────────────────
// Simple Provider Interface
// ─────────────────────────────────────────────────────────────

export interface PromptOptions {
  cwd: string;
  timeout?: number;
}

export interface PromptResult {
  output: string;
  error?: string;
}

/**
 * Minimal interface that ALL providers must implement.
 */
export interface PromptExecutor {
  name: string;
  isAvailable(): Promise<boolean>;
  runPrompt(prompt: string, options: PromptOptions): Promise<PromptResult>;
}

export interface NarrativeRequest {
  technologyName: string;
  category: string;
  skeleton: string;
  evidence: Evidence[];
}

export interface NarrativeConfig {
  cwd: string;
  timeoutMs: number;
}

export const DEFAULT_NARRATIVE_TIMEOUT_MS = 120_000;

export class NarrativeSynthesizer {
  private availability: Promise<boolean> | null = null;

  constructor(
    private readonly executor: PromptExecutor,
    private readonly config: NarrativeConfig
  ) {}

  get providerName(): string {
    return this.executor.name;
  }

  isAvailable(): Promise<boolean> {
    this.availability ??= this.executor.isAvailable();
    return this.availability;
  }

  /**
   * Returns the elaboration text. Throws SynthesisFailure on any
   * problem; callers fall back to template mode.
   */
  async elaborate(request: NarrativeRequest): Promise<string> {
    if (!(await this.isAvailable())) {
      throw new SynthesisFailure(`Provider ${this.executor.name} is not available`);
    }

    let output: string;
    try {
      const result = await this.executor.runPrompt(buildNarrativePrompt(request), {
        cwd: this.config.cwd,
        timeout: this.config.timeoutMs,
      });
      output = result.output;
    } catch (error) {
      throw new SynthesisFailure(`${this.executor.name} failed: ${describeError(error)}`);
    }

    const parsed = parseNarrativeResponse(output);
    if (!parsed) {
      throw new SynthesisFailure(`${this.executor.name} returned no usable <narrative> block`);
    }

    const narrative = normalizeNarrative(parsed.narrative);
    if (narrative.includes(request.skeleton)) {
      throw new SynthesisFailure(`${this.executor.name} repeated the rationale instead of elaborating it`);
    }
    return narrative;
  }
}

/**
 * Collapse whitespace so narrative text is a single paragraph
 */
export function normalizeNarrative(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
