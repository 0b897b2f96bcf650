/**
 * Unit tests for the decision stage
 *
 * @module tests/unit/pipeline/decision
 */

import { describe, it, expect } from 'vitest';

import { runDecision } from '../../../src/services/pipeline/index.js';
import { reconcilePersons } from '../../../src/services/pipeline/decision.js';
import {
  createTestConfig,
  FakeOracle,
  makeDocument,
  manifestExtraction,
  manifestText,
  manifestVerification,
  TEST_MODELS,
} from '../helpers.js';

const config = createTestConfig();

function oracleReplying(text: string): FakeOracle {
  return new FakeOracle({ [TEST_MODELS.decision]: text });
}

describe('runDecision', () => {
  it('pins final confidence to verification and recomputes corroboration', async () => {
    const outcome = await runDecision(
      oracleReplying(manifestText.decision()),
      manifestVerification(),
      manifestExtraction(),
      makeDocument(),
      config
    );

    expect(outcome.parsed).toBe(true);
    const [john, robert] = outcome.result.persons_intelligence;
    expect(john).toMatchObject({
      name: 'John Smith',
      final_confidence: 'indicated',
      power_index: { public_profile: 40, institutional: 30, network_centrality: 20, corroboration: 40 },
    });
    expect(robert).toMatchObject({ name: 'Robert Hale', final_confidence: 'confirmed', power_index: null });
  });

  it('accepts category_inference as an alias for category', async () => {
    const outcome = await runDecision(
      oracleReplying(manifestText.decision()),
      manifestVerification(),
      manifestExtraction(),
      makeDocument(),
      config
    );

    expect(outcome.result.persons_intelligence.map((p) => p.category)).toEqual(['finance', 'other']);
  });

  it('prefers an explicit category over the alias', async () => {
    const reply = JSON.stringify({
      intelligence_value: 'high',
      persons_intelligence: [{ name: 'John Smith', category: 'legal', category_inference: 'finance' }],
    });
    const outcome = await runDecision(
      oracleReplying(reply),
      manifestVerification(),
      manifestExtraction(),
      makeDocument(),
      config
    );
    expect(outcome.result.persons_intelligence[0]?.category).toBe('legal');
    expect(outcome.result.intelligence_value).toBe('high');
  });

  it('sends verification output and the document header to the oracle', async () => {
    const oracle = oracleReplying(manifestText.decision());
    await runDecision(oracle, manifestVerification(), manifestExtraction(), makeDocument(), config);

    const context = oracle.requests[0]?.context ?? '';
    expect(context.startsWith('VERIFICATION OUTPUT:\n{')).toBe(true);
    expect(context).toContain('DOCUMENT: https://records.example.test/manifest-001.pdf');
    expect(context).toContain('TYPE: flight_manifest');
    expect(context).toContain('DATE: 2002-03-14');
  });

  it('falls back to low value with human review on garbage', async () => {
    const outcome = await runDecision(
      oracleReplying('no'),
      manifestVerification(),
      manifestExtraction(),
      makeDocument(),
      config
    );

    expect(outcome.parsed).toBe(false);
    expect(outcome.result).toEqual({
      intelligence_value: 'low',
      intelligence_summary: '',
      persons_intelligence: [],
      relationship_determinations: [],
      pattern_flags: [],
      flight_intelligence: null,
      decision_log: ['Unparseable oracle output'],
      evidence_chain: 'Unable to generate evidence chain. Human review required.',
      requires_human_review: true,
    });
  });
});

describe('reconcilePersons', () => {
  it('keeps the oracle level for a person verification did not see', () => {
    const [person] = reconcilePersons(
      [
        {
          name: 'Other Person',
          final_confidence: 'corroborated',
          power_index: { public_profile: 1, institutional: 2, network_centrality: 3, corroboration: 0 },
          category: 'media',
          pattern_flags: [],
          upgrade_gap: null,
        },
      ],
      manifestVerification()
    );

    expect(person?.final_confidence).toBe('corroborated');
    expect(person?.power_index?.corroboration).toBe(70);
  });

  it('matches verification entries by name key', () => {
    const [person] = reconcilePersons(
      [
        {
          name: '  robert   HALE ',
          final_confidence: 'unverified',
          power_index: { public_profile: 0, institutional: 0, network_centrality: 0, corroboration: 0 },
          category: 'other',
          pattern_flags: [],
          upgrade_gap: null,
        },
      ],
      manifestVerification()
    );

    expect(person?.final_confidence).toBe('confirmed');
    expect(person?.power_index?.corroboration).toBe(90);
  });
});
