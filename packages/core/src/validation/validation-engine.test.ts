import { describe, it, expect, vi } from 'vitest';
import type { ValidationConfig } from '@triangulate/schemas/src/research-config.schema.js';
import { createMockEmbeddingClient } from '../embedding/mock-embedding-client.js';
import {
  createFailingEmbeddingClient,
  createStubEmbeddingClient,
  makeAgentResult,
} from '../test-helpers.js';
import type { EntailmentJudge } from './entailment-judge.js';
import { createValidationEngine, DEGRADED_VALIDATION_WARNING } from './validation-engine.js';

const config: ValidationConfig = {
  sameTopicThreshold: 0.85,
  numericTolerance: 0.01,
  agentPriority: ['academic', 'web', 'multimodal'],
  useEntailmentJudge: false,
};

const T0 = new Date('2026-01-01T00:00:00.000Z');
const T1 = new Date('2026-01-02T00:00:00.000Z');

function engineWithMockEmbeddings(overrides: Partial<ValidationConfig> = {}) {
  return createValidationEngine(
    { embeddingClient: createMockEmbeddingClient() },
    { ...config, ...overrides },
  );
}

describe('createValidationEngine', () => {
  it('should resolve a numeric contradiction by confidence', async () => {
    const engine = engineWithMockEmbeddings();
    const results = [
      makeAgentResult({
        capability: 'web',
        subtaskId: 's1',
        claims: [{ statement: 'Inflation rate: 3%', confidence: 0.9 }],
      }),
      makeAgentResult({
        capability: 'academic',
        subtaskId: 's2',
        claims: [{ statement: 'Inflation rate: 7%', confidence: 0.6 }],
      }),
    ];

    const validated = await engine.reconcile(results);

    expect(validated.claims).toHaveLength(1);
    expect(validated.claims[0]).toMatchObject({
      statement: 'Inflation rate: 3%',
      confidence: 0.9,
      valueKind: 'numeric',
      contested: false,
    });
    expect(validated.resolvedContradictions).toEqual([
      {
        topic: 'inflation rate',
        valueKind: 'numeric',
        winner: {
          statement: 'Inflation rate: 3%',
          confidence: 0.9,
          agentId: 'web-agent',
          capability: 'web',
          timestamp: T0,
        },
        superseded: {
          statement: 'Inflation rate: 7%',
          confidence: 0.6,
          agentId: 'academic-agent',
          capability: 'academic',
          timestamp: T0,
        },
        rule: 'confidence',
        rationale: 'Higher confidence (0.9 vs 0.6)',
      },
    ]);
    expect(validated.metadata.superseded.map((s) => s.statement)).toEqual(['Inflation rate: 7%']);
    expect(validated.unresolvedContradictions).toEqual([]);
  });

  it('should merge identical claims from two agents keeping the highest confidence', async () => {
    const engine = engineWithMockEmbeddings();
    const results = [
      makeAgentResult({
        capability: 'web',
        subtaskId: 's1',
        claims: [
          { statement: 'Water boils at 100 °C at sea level', confidence: 0.8, citation: 'https://a.example' },
        ],
      }),
      makeAgentResult({
        capability: 'academic',
        subtaskId: 's2',
        claims: [
          { statement: 'Water boils at 100 °C at sea level', confidence: 0.95, citation: 'https://b.example' },
        ],
      }),
    ];

    const validated = await engine.reconcile(results);

    expect(validated.claims).toHaveLength(1);
    expect(validated.claims[0]?.confidence).toBe(0.95);
    expect(validated.claims[0]?.citations).toEqual(['https://a.example', 'https://b.example']);
    expect(validated.claims[0]?.sources.map((s) => [s.capability, s.subtaskId])).toEqual([
      ['web', 's1'],
      ['academic', 's2'],
    ]);
  });

  it('should merge paraphrased topics with compatible values', async () => {
    const engine = createValidationEngine(
      {
        embeddingClient: createStubEmbeddingClient({
          'inflation rate': [1, 0, 0],
          'consumer price inflation': [0.95, 0.3122, 0],
        }),
      },
      config,
    );

    const validated = await engine.reconcile([
      makeAgentResult({ claims: [{ statement: 'Inflation rate: 3%', confidence: 0.7 }] }),
      makeAgentResult({
        capability: 'academic',
        claims: [{ statement: 'Consumer price inflation: 3.01%', confidence: 0.8 }],
      }),
    ]);

    expect(validated.claims).toHaveLength(1);
    expect(validated.claims[0]).toMatchObject({ statement: 'Inflation rate: 3%', confidence: 0.8 });
    expect(validated.claims[0]?.sources).toHaveLength(2);
  });

  it('should prefer the more recent result when confidence ties', async () => {
    const engine = engineWithMockEmbeddings();

    const validated = await engine.reconcile([
      makeAgentResult({
        timestamp: T0,
        claims: [{ statement: 'Inflation rate: 3%', confidence: 0.7 }],
      }),
      makeAgentResult({
        agentId: 'web-agent-2',
        timestamp: T1,
        claims: [{ statement: 'Inflation rate: 7%', confidence: 0.7 }],
      }),
    ]);

    expect(validated.claims.map((c) => c.statement)).toEqual(['Inflation rate: 7%']);
    expect(validated.resolvedContradictions[0]).toMatchObject({
      rule: 'recency',
      rationale: `More recent result (${T1.toISOString()} vs ${T0.toISOString()})`,
    });
  });

  it('should fall back to agent priority when confidence and time tie', async () => {
    const engine = engineWithMockEmbeddings();

    const validated = await engine.reconcile([
      makeAgentResult({
        capability: 'web',
        claims: [{ statement: 'Inflation rate: 3%', confidence: 0.7 }],
      }),
      makeAgentResult({
        capability: 'academic',
        claims: [{ statement: 'Inflation rate: 7%', confidence: 0.7 }],
      }),
    ]);

    expect(validated.claims.map((c) => c.statement)).toEqual(['Inflation rate: 7%']);
    expect(validated.resolvedContradictions[0]).toMatchObject({
      rule: 'agent_priority',
      rationale: 'Agent priority (academic over web)',
    });
  });

  it('should keep both claims and warn when every tie-break is equal', async () => {
    const engine = engineWithMockEmbeddings();

    const validated = await engine.reconcile([
      makeAgentResult({
        agentId: 'web-a',
        claims: [{ statement: 'Inflation rate: 3%', confidence: 0.7 }],
      }),
      makeAgentResult({
        agentId: 'web-b',
        claims: [{ statement: 'Inflation rate: 7%', confidence: 0.7 }],
      }),
    ]);

    const warning =
      'Unresolved contradiction on "inflation rate": "Inflation rate: 3%" (web) vs "Inflation rate: 7%" (web)';
    expect(validated.claims.map((c) => [c.statement, c.contested])).toEqual([
      ['Inflation rate: 3%', true],
      ['Inflation rate: 7%', true],
    ]);
    expect(validated.unresolvedContradictions).toHaveLength(1);
    expect(validated.unresolvedContradictions[0]?.warning).toBe(warning);
    expect(validated.warnings).toEqual([warning]);
    expect(validated.resolvedContradictions).toEqual([]);
  });

  it('should let later corroboration break an earlier tie', async () => {
    const engine = engineWithMockEmbeddings();

    const validated = await engine.reconcile([
      makeAgentResult({
        agentId: 'web-a',
        claims: [{ statement: 'Inflation rate: 3%', confidence: 0.7 }],
      }),
      makeAgentResult({
        agentId: 'web-b',
        claims: [{ statement: 'Inflation rate: 7%', confidence: 0.7 }],
      }),
      makeAgentResult({
        capability: 'academic',
        subtaskId: 'subtask-verify',
        claims: [{ statement: 'Inflation rate: 3%', confidence: 0.9 }],
      }),
    ]);

    expect(validated.claims.map((c) => [c.statement, c.confidence, c.contested])).toEqual([
      ['Inflation rate: 3%', 0.9, false],
    ]);
    expect(validated.unresolvedContradictions).toEqual([]);
    expect(validated.resolvedContradictions[0]).toMatchObject({
      rule: 'confidence',
      rationale: 'Higher confidence (0.9 vs 0.7)',
    });
    expect(validated.warnings).toEqual([]);
  });

  it('should resolve opposite polarity on the same subject', async () => {
    const engine = engineWithMockEmbeddings();

    const validated = await engine.reconcile([
      makeAgentResult({ claims: [{ statement: 'The bridge is safe', confidence: 0.8 }] }),
      makeAgentResult({
        capability: 'multimodal',
        claims: [{ statement: 'The bridge is not safe', confidence: 0.6 }],
      }),
    ]);

    expect(validated.claims.map((c) => c.statement)).toEqual(['The bridge is safe']);
    expect(validated.resolvedContradictions[0]?.valueKind).toBe('boolean');
  });

  describe('short assertions about different subjects', () => {
    const sameVector = createStubEmbeddingClient({}, { fallback: () => [1, 0, 0] });
    const results = [
      makeAgentResult({ claims: [{ statement: 'Paris is the capital of France', confidence: 0.9 }] }),
      makeAgentResult({
        capability: 'academic',
        claims: [{ statement: 'Lyon is the capital of France', confidence: 0.6 }],
      }),
    ];

    it('should keep both claims when no judge can decide', async () => {
      const engine = createValidationEngine({ embeddingClient: sameVector }, config);

      const validated = await engine.reconcile(results);

      expect(validated.claims.map((c) => [c.statement, c.sources.length])).toEqual([
        ['Paris is the capital of France', 1],
        ['Lyon is the capital of France', 1],
      ]);
      expect(validated.resolvedContradictions).toEqual([]);
      expect(validated.metadata.superseded).toEqual([]);
    });

    it('should let the judge settle them and record the loser', async () => {
      const judge: EntailmentJudge = { judge: vi.fn().mockResolvedValue('contradicts') };
      const engine = createValidationEngine(
        { embeddingClient: sameVector, entailmentJudge: judge },
        { ...config, useEntailmentJudge: true },
      );

      const validated = await engine.reconcile(results);

      expect(judge.judge).toHaveBeenCalledWith(
        'Paris is the capital of France',
        'Lyon is the capital of France',
      );
      expect(validated.claims.map((c) => c.statement)).toEqual(['Paris is the capital of France']);
      expect(validated.resolvedContradictions[0]?.valueKind).toBe('boolean');
      expect(validated.metadata.superseded.map((s) => s.statement)).toEqual([
        'Lyon is the capital of France',
      ]);
    });
  });

  describe.each([0.7, 0.8, 0.85, 0.9, 0.95])('with sameTopicThreshold %s', (threshold) => {
    function neighbourAt(cosine: number): number[] {
      return [cosine, Math.sqrt(1 - cosine * cosine), 0];
    }

    function engineWithNeighbour(cosine: number) {
      return createValidationEngine(
        {
          embeddingClient: createStubEmbeddingClient({
            'inflation rate': [1, 0, 0],
            'consumer price inflation': neighbourAt(cosine),
          }),
        },
        { ...config, sameTopicThreshold: threshold },
      );
    }

    const results = [
      makeAgentResult({ claims: [{ statement: 'Inflation rate: 3%', confidence: 0.7 }] }),
      makeAgentResult({
        capability: 'academic',
        claims: [{ statement: 'Consumer price inflation: 3%', confidence: 0.8 }],
      }),
    ];

    it('should merge topics just above the threshold', async () => {
      const validated = await engineWithNeighbour(threshold + 0.01).reconcile(results);

      expect(validated.claims).toHaveLength(1);
      expect(validated.claims[0]?.sources).toHaveLength(2);
    });

    it('should keep topics just below the threshold apart', async () => {
      const validated = await engineWithNeighbour(threshold - 0.01).reconcile(results);

      expect(validated.claims.map((c) => c.statement)).toEqual([
        'Inflation rate: 3%',
        'Consumer price inflation: 3%',
      ]);
    });
  });

  it('should never treat different units as a contradiction', async () => {
    const engine = engineWithMockEmbeddings();

    const validated = await engine.reconcile([
      makeAgentResult({ claims: [{ statement: 'Battery range is 300 km', confidence: 0.8 }] }),
      makeAgentResult({
        capability: 'academic',
        claims: [{ statement: 'Battery range is 300 mph', confidence: 0.6 }],
      }),
    ]);

    expect(validated.claims).toHaveLength(2);
    expect(validated.resolvedContradictions).toEqual([]);
    expect(validated.unresolvedContradictions).toEqual([]);
  });

  it('should only merge identical statements when embeddings are unavailable', async () => {
    const engine = createValidationEngine(
      { embeddingClient: createFailingEmbeddingClient() },
      config,
    );

    const validated = await engine.reconcile([
      makeAgentResult({ claims: [{ statement: 'Inflation rate: 3%', confidence: 0.6 }] }),
      makeAgentResult({
        capability: 'academic',
        claims: [
          { statement: 'inflation rate:  3%', confidence: 0.9 },
          { statement: 'Inflation rate: 7%', confidence: 0.5 },
        ],
      }),
    ]);

    expect(validated.claims.map((c) => [c.statement, c.confidence])).toEqual([
      ['Inflation rate: 3%', 0.9],
      ['Inflation rate: 7%', 0.5],
    ]);
    expect(validated.resolvedContradictions).toEqual([]);
    expect(validated.metadata.degraded).toEqual({ validation: true });
    expect(validated.warnings).toEqual([DEGRADED_VALIDATION_WARNING]);
  });

  it('should produce identical output for identical input', async () => {
    const engine = engineWithMockEmbeddings();
    const results = [
      makeAgentResult({
        claims: [
          { statement: 'Inflation rate: 3%', confidence: 0.7 },
          { statement: 'The central bank raised rates in March 2024', confidence: 0.6 },
        ],
      }),
      makeAgentResult({
        capability: 'academic',
        claims: [
          { statement: 'Inflation rate: 7%', confidence: 0.7 },
          { statement: 'The central bank raised rates in April 2024', confidence: 0.8 },
        ],
      }),
    ];

    const first = await engine.reconcile(results);
    const second = await engine.reconcile(results);

    expect(second).toEqual(first);
  });

  it('should skip embedding when there is nothing to compare', async () => {
    const embeddingClient = createStubEmbeddingClient({});
    const engine = createValidationEngine({ embeddingClient }, config);

    const validated = await engine.reconcile([
      makeAgentResult({ claims: [{ statement: 'Inflation rate: 3%', confidence: 0.7 }] }),
    ]);

    expect(validated.claims).toHaveLength(1);
    expect(validated.metadata.degraded.validation).toBe(false);
    expect(embeddingClient.generateEmbeddings).not.toHaveBeenCalled();
  });

  it('should return an empty result for no input', async () => {
    const validated = await engineWithMockEmbeddings().reconcile([]);

    expect(validated.claims).toEqual([]);
    expect(validated.summaries).toEqual([]);
    expect(validated.warnings).toEqual([]);
  });

  it('should list one summary per result in input order', async () => {
    const validated = await engineWithMockEmbeddings().reconcile([
      makeAgentResult({ capability: 'academic', subtaskId: 'a', sourceUrls: ['https://arxiv.org/abs/1'] }),
      makeAgentResult({ capability: 'web', subtaskId: 'b' }),
    ]);

    expect(validated.summaries).toEqual([
      {
        agentId: 'academic-agent',
        capability: 'academic',
        subtaskId: 'a',
        summary: 'Summary from academic',
        sourceUrls: ['https://arxiv.org/abs/1'],
      },
      {
        agentId: 'web-agent',
        capability: 'web',
        subtaskId: 'b',
        summary: 'Summary from web',
        sourceUrls: [],
      },
    ]);
  });

  describe('entailment judge', () => {
    const first =
      'The reform reduced emissions in the first phase. Later phases showed no further change.';
    const second =
      'The reform had no measurable effect on emissions. Observers attribute changes to the economy.';
    const sameVector = createStubEmbeddingClient({}, { fallback: () => [1, 0, 0] });

    it('should ask the judge about differing text claims when enabled', async () => {
      const judge: EntailmentJudge = { judge: vi.fn().mockResolvedValue('contradicts') };
      const engine = createValidationEngine(
        { embeddingClient: sameVector, entailmentJudge: judge },
        { ...config, useEntailmentJudge: true },
      );

      const validated = await engine.reconcile([
        makeAgentResult({ claims: [{ statement: first, confidence: 0.9 }] }),
        makeAgentResult({ capability: 'academic', claims: [{ statement: second, confidence: 0.4 }] }),
      ]);

      expect(judge.judge).toHaveBeenCalledWith(first, second);
      expect(validated.claims.map((c) => c.statement)).toEqual([first]);
      expect(validated.resolvedContradictions[0]?.valueKind).toBe('text');
    });

    it('should not consult the judge when disabled in config', async () => {
      const judge: EntailmentJudge = { judge: vi.fn().mockResolvedValue('contradicts') };
      const engine = createValidationEngine(
        { embeddingClient: sameVector, entailmentJudge: judge },
        config,
      );

      const validated = await engine.reconcile([
        makeAgentResult({ claims: [{ statement: first, confidence: 0.9 }] }),
        makeAgentResult({ capability: 'academic', claims: [{ statement: second, confidence: 0.4 }] }),
      ]);

      expect(judge.judge).not.toHaveBeenCalled();
      expect(validated.claims).toHaveLength(2);
    });

    it('should treat a failing judge as neutral', async () => {
      const judge: EntailmentJudge = { judge: vi.fn().mockRejectedValue(new Error('quota')) };
      const engine = createValidationEngine(
        { embeddingClient: sameVector, entailmentJudge: judge },
        { ...config, useEntailmentJudge: true },
      );

      const validated = await engine.reconcile([
        makeAgentResult({ claims: [{ statement: first, confidence: 0.9 }] }),
        makeAgentResult({ capability: 'academic', claims: [{ statement: second, confidence: 0.4 }] }),
      ]);

      expect(validated.claims).toHaveLength(2);
      expect(validated.resolvedContradictions).toEqual([]);
    });
  });
});
