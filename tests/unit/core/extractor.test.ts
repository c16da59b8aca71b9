import { describe, it, expect, vi } from 'vitest';
import {
  buildRationale,
  extractDecisions,
  formatDecisionId,
  parseDecisionNumber,
} from '../../../src/core/extractor.js';
import { NarrativeSynthesizer, PromptExecutor } from '../../../src/core/narrative.js';
import type { TechnologySignature } from '../../../src/types.js';
import { makeEvidence } from '../../helpers/fixtures.js';

const SIGNATURES: TechnologySignature[] = [
  {
    id: 'postgresql',
    name: 'PostgreSQL',
    category: 'database',
    filePatterns: ['**/*.yml'],
    contentPatterns: ['postgres'],
    disambiguators: [],
    pathOnly: false,
  },
  {
    id: 'sequelize',
    name: 'Sequelize',
    category: 'orm',
    filePatterns: ['**/*.yml'],
    contentPatterns: ['sequelize'],
    disambiguators: [],
    pathOnly: false,
  },
];

function mockExecutor(output: string, available = true): PromptExecutor {
  return {
    name: 'mock',
    isAvailable: vi.fn().mockResolvedValue(available),
    runPrompt: vi.fn().mockResolvedValue({ output }),
  };
}

describe('core/extractor', () => {
  describe('ids', () => {
    it('should format and parse decision ids', () => {
      expect(formatDecisionId(7)).toBe('ADR-007');
      expect(formatDecisionId(1234)).toBe('ADR-1234');
      expect(parseDecisionNumber('ADR-042')).toBe(42);
      expect(parseDecisionNumber('TM-001')).toBeNull();
    });
  });

  describe('buildRationale', () => {
    it('should be deterministic and list files sorted', () => {
      const evidence = [
        makeEvidence({ filePath: 'b.yml' }),
        makeEvidence({ filePath: 'a.yml' }),
        makeEvidence({ filePath: 'a.yml', lineRef: 9 }),
      ];

      expect(buildRationale('PostgreSQL', 'database', evidence)).toBe(
        'PostgreSQL was detected as the database solution based on evidence in 2 file(s): a.yml, b.yml. ' +
          '3 reference(s) found, indicating it is the adopted technology for this concern.'
      );
    });

    it('should cap the listed files', () => {
      const evidence = Array.from({ length: 12 }, (_, i) => makeEvidence({ filePath: `f${String(i).padStart(2, '0')}.yml` }));

      expect(buildRationale('PostgreSQL', 'database', evidence)).toContain('f09.yml and 2 more.');
    });
  });

  describe('extractDecisions', () => {
    it('should produce one draft per technology, ordered by category, numbered from startId', async () => {
      const evidence = [
        makeEvidence({ technologyId: 'sequelize', category: 'orm', lineRef: 3 }),
        makeEvidence(),
      ];

      const drafts = await extractDecisions(evidence, SIGNATURES, { minEvidence: 1, startId: 5 });

      expect(drafts.map((d) => [d.id, d.title, d.synthesis])).toEqual([
        ['ADR-005', 'Use PostgreSQL for database', 'template'],
        ['ADR-006', 'Use Sequelize for orm', 'template'],
      ]);
      expect(drafts[0].evidenceRefs).toEqual(['config/database.yml']);
    });

    it('should skip technologies below the evidence threshold', async () => {
      const drafts = await extractDecisions([makeEvidence()], SIGNATURES, { minEvidence: 2, startId: 1 });

      expect(drafts).toEqual([]);
    });

    it('should add a narrative while keeping the template rationale', async () => {
      const executor = mockExecutor('<narrative>The team standardised on a relational store.</narrative>');
      const narrative = new NarrativeSynthesizer(executor, { cwd: '/tmp', timeoutMs: 1000 });

      const [draft] = await extractDecisions([makeEvidence()], SIGNATURES, { minEvidence: 1, startId: 1, narrative });

      expect(draft.synthesis).toBe('narrative');
      expect(draft.narrative).toBe('The team standardised on a relational store.');
      expect(draft.rationale).toBe(buildRationale('PostgreSQL', 'database', [makeEvidence()]));
    });

    it('should fall back to template mode when the narrative is unusable', async () => {
      const executor = mockExecutor('no tags here');
      const narrative = new NarrativeSynthesizer(executor, { cwd: '/tmp', timeoutMs: 1000 });
      const onWarning = vi.fn();

      const [draft] = await extractDecisions(
        [makeEvidence()],
        SIGNATURES,
        { minEvidence: 1, startId: 1, narrative },
        { onWarning }
      );

      expect(draft.synthesis).toBe('template');
      expect(draft.narrative).toBeUndefined();
      expect(onWarning).toHaveBeenCalledWith(expect.stringContaining('Narrative synthesis failed for PostgreSQL'));
    });

    it('should fall back to template mode when the availability check throws', async () => {
      const executor: PromptExecutor = {
        name: 'mock',
        isAvailable: vi.fn().mockRejectedValue(new Error('which not found')),
        runPrompt: vi.fn(),
      };
      const narrative = new NarrativeSynthesizer(executor, { cwd: '/tmp', timeoutMs: 1000 });
      const onWarning = vi.fn();

      const drafts = await extractDecisions(
        [makeEvidence()],
        SIGNATURES,
        { minEvidence: 1, startId: 1, narrative },
        { onWarning }
      );

      expect(drafts.map((d) => d.synthesis)).toEqual(['template']);
      expect(executor.runPrompt).not.toHaveBeenCalled();
      expect(onWarning).toHaveBeenCalledWith('Narrative synthesis unavailable (mock: which not found); using template mode');
    });

    it('should not call an unavailable provider', async () => {
      const executor = mockExecutor('<narrative>unused</narrative>', false);
      const narrative = new NarrativeSynthesizer(executor, { cwd: '/tmp', timeoutMs: 1000 });

      const drafts = await extractDecisions([makeEvidence()], SIGNATURES, { minEvidence: 1, startId: 1, narrative });

      expect(drafts[0].synthesis).toBe('template');
      expect(executor.runPrompt).not.toHaveBeenCalled();
    });
  });
});
