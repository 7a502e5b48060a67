import type { ValidationConfig } from '@triangulate/schemas/src/research-config.schema.js';
import type {
  AgentResult,
  Capability,
  Claim,
  ClaimProvenance,
  ContradictionSide,
  ResolutionRule,
  ResolvedContradiction,
  UnresolvedContradiction,
  ValidatedClaim,
  ValidatedResult,
} from '@triangulate/shared/src/types/research.types.js';
import { toError } from '@triangulate/shared/src/utils/errors.js';
import { cosineSimilarity } from '@triangulate/shared/src/utils/math.js';
import { createChildLogger } from '@triangulate/shared/src/logger.js';
import type { EmbeddingClient } from '../embedding/embedding-client.js';
import { buildEmbeddingText } from '../embedding/embedding-text-builder.js';
import type { ValueRelation } from './comparators.js';
import { compareValues } from './comparators.js';
import type { EntailmentJudge } from './entailment-judge.js';
import type { ClaimValue } from './value-classifier.js';
import { classifyClaim, normalizeTopic } from './value-classifier.js';

const log = createChildLogger('validation:engine');

export const DEGRADED_VALIDATION_WARNING =
  'Topic similarity unavailable: only identical statements were merged and contradictions were not checked';

export interface ValidationEngineDeps {
  readonly embeddingClient: EmbeddingClient;
  readonly entailmentJudge?: EntailmentJudge;
}

export interface ValidationEngine {
  reconcile(results: readonly AgentResult[]): Promise<ValidatedResult>;
}

interface MergedClaim {
  readonly statement: string;
  readonly normalizedStatement: string;
  readonly value: ClaimValue;
  readonly topic: string;
  readonly embeddingKey: string;
  confidence: number;
  side: ContradictionSide;
  contested: boolean;
  readonly citations: string[];
  readonly sources: ClaimProvenance[];
}

interface Resolution {
  readonly winner: 'existing' | 'incoming';
  readonly rule: ResolutionRule;
  readonly rationale: string;
}

function toMerged(result: AgentResult, claim: Claim): MergedClaim {
  const classified = classifyClaim(claim);
  return {
    statement: claim.statement,
    normalizedStatement: normalizeTopic(claim.statement),
    value: classified.value,
    topic: classified.topic,
    embeddingKey: buildEmbeddingText(classified.topic),
    confidence: claim.confidence,
    side: {
      statement: claim.statement,
      confidence: claim.confidence,
      agentId: result.agentId,
      capability: result.capability,
      timestamp: result.timestamp,
    },
    contested: false,
    citations: claim.citation ? [claim.citation] : [],
    sources: [
      {
        agentId: result.agentId,
        capability: result.capability,
        subtaskId: result.subtaskId,
        confidence: claim.confidence,
        timestamp: result.timestamp,
        citation: claim.citation,
      },
    ],
  };
}

function mergeInto(target: MergedClaim, other: MergedClaim): void {
  if (other.confidence > target.confidence) {
    target.confidence = other.confidence;
    target.side = { ...other.side, statement: target.statement };
  }
  for (const citation of other.citations) {
    if (!target.citations.includes(citation)) {
      target.citations.push(citation);
    }
  }
  target.sources.push(...other.sources);
}

function priorityRank(priority: readonly Capability[], capability: Capability): number {
  const index = priority.indexOf(capability);
  return index === -1 ? priority.length : index;
}

/** Total order over contradiction sides; null when every level ties. */
export function resolveConflict(
  existing: ContradictionSide,
  incoming: ContradictionSide,
  priority: readonly Capability[],
): Resolution | null {
  if (existing.confidence !== incoming.confidence) {
    const winner = existing.confidence > incoming.confidence ? 'existing' : 'incoming';
    const [high, low] =
      winner === 'existing' ? [existing, incoming] : [incoming, existing];
    return {
      winner,
      rule: 'confidence',
      rationale: `Higher confidence (${String(high.confidence)} vs ${String(low.confidence)})`,
    };
  }

  const existingTime = existing.timestamp.getTime();
  const incomingTime = incoming.timestamp.getTime();
  if (existingTime !== incomingTime) {
    const winner = existingTime > incomingTime ? 'existing' : 'incoming';
    const [recent, older] =
      winner === 'existing' ? [existing, incoming] : [incoming, existing];
    return {
      winner,
      rule: 'recency',
      rationale: `More recent result (${recent.timestamp.toISOString()} vs ${older.timestamp.toISOString()})`,
    };
  }

  const existingRank = priorityRank(priority, existing.capability);
  const incomingRank = priorityRank(priority, incoming.capability);
  if (existingRank !== incomingRank) {
    const winner = existingRank < incomingRank ? 'existing' : 'incoming';
    const [preferred, other] =
      winner === 'existing' ? [existing, incoming] : [incoming, existing];
    return {
      winner,
      rule: 'agent_priority',
      rationale: `Agent priority (${preferred.capability} over ${other.capability})`,
    };
  }

  return null;
}

function unresolvedWarning(topic: string, a: ContradictionSide, b: ContradictionSide): string {
  return `Unresolved contradiction on "${topic}": "${a.statement}" (${a.capability}) vs "${b.statement}" (${b.capability})`;
}

function toValidatedClaim(merged: MergedClaim): ValidatedClaim {
  return {
    statement: merged.statement,
    confidence: merged.confidence,
    valueKind: merged.value.kind,
    citations: [...merged.citations],
    sources: [...merged.sources],
    contested: merged.contested,
  };
}

export function createValidationEngine(
  deps: ValidationEngineDeps,
  config: ValidationConfig,
): ValidationEngine {
  const { embeddingClient } = deps;
  const judge = config.useEntailmentJudge ? deps.entailmentJudge : undefined;

  if (config.useEntailmentJudge && !deps.entailmentJudge) {
    log.warn('Entailment judge enabled in config but none was provided; text pairs stay neutral');
  }

  async function embedTopics(claims: readonly MergedClaim[]): Promise<Map<string, number[]> | null> {
    const texts = [...new Set(claims.map((c) => c.embeddingKey))];
    try {
      const vectors = await embeddingClient.generateEmbeddings(texts);
      if (
        vectors.length !== texts.length ||
        vectors.some((v) => v.length !== embeddingClient.dimension)
      ) {
        log.warn({ topics: texts.length, vectors: vectors.length }, 'Unusable topic embeddings');
        return null;
      }
      return new Map(texts.map((text, i) => [text, vectors[i]]));
    } catch (error) {
      log.warn({ error: toError(error).message }, 'Topic embedding failed, validating in degraded mode');
      return null;
    }
  }

  return {
    async reconcile(results: readonly AgentResult[]): Promise<ValidatedResult> {
      const claims = results.flatMap((result) => result.claims.map((claim) => toMerged(result, claim)));

      const embeddings = claims.length > 1 ? await embedTopics(claims) : new Map<string, number[]>();
      const degraded = embeddings === null;
      const verdicts = new Map<string, ValueRelation>();

      function sameTopic(a: MergedClaim, b: MergedClaim): boolean {
        if (a.topic === b.topic) {
          return true;
        }
        const left = embeddings?.get(a.embeddingKey);
        const right = embeddings?.get(b.embeddingKey);
        if (!left || !right) {
          return false;
        }
        return cosineSimilarity(left, right) >= config.sameTopicThreshold;
      }

      async function judgeText(a: string, b: string): Promise<ValueRelation> {
        const key = `${a}\u0000${b}`;
        const known = verdicts.get(key);
        if (known) {
          return known;
        }

        let relation: ValueRelation = 'unrelated';
        if (judge) {
          try {
            const verdict = await judge.judge(a, b);
            relation = verdict === 'entails' ? 'same' : verdict === 'contradicts' ? 'conflict' : 'unrelated';
          } catch (error) {
            log.warn({ error: toError(error).message }, 'Entailment judge failed, treating pair as neutral');
          }
        }
        verdicts.set(key, relation);
        return relation;
      }

      async function relate(existing: MergedClaim, incoming: MergedClaim): Promise<ValueRelation> {
        if (existing.normalizedStatement === incoming.normalizedStatement) {
          return 'same';
        }
        if (degraded || !sameTopic(existing, incoming)) {
          return 'unrelated';
        }

        const relation = compareValues(existing.value, incoming.value, {
          numericTolerance: config.numericTolerance,
        });
        return relation === 'undecided' ? judgeText(existing.statement, incoming.statement) : relation;
      }

      // Pass 1: fold duplicates so every claim carries its full support
      const merged: MergedClaim[] = [];
      for (const incoming of claims) {
        let target: MergedClaim | undefined;
        for (const existing of merged) {
          if ((await relate(existing, incoming)) === 'same') {
            target = existing;
            break;
          }
        }
        if (target) {
          mergeInto(target, incoming);
        } else {
          merged.push(incoming);
        }
      }

      // Pass 2: settle contradictions between merged claims
      const kept: MergedClaim[] = [];
      const resolved: ResolvedContradiction[] = [];
      const unresolved: UnresolvedContradiction[] = [];
      const superseded: ContradictionSide[] = [];
      const warnings: string[] = [];

      for (const candidate of merged) {
        let placed = false;

        for (let i = 0; i < kept.length; i++) {
          const existing = kept[i];
          if ((await relate(existing, candidate)) !== 'conflict') {
            continue;
          }

          const resolution = resolveConflict(existing.side, candidate.side, config.agentPriority);
          if (!resolution) {
            const warning = unresolvedWarning(existing.topic, existing.side, candidate.side);
            existing.contested = true;
            candidate.contested = true;
            unresolved.push({
              topic: existing.topic,
              valueKind: existing.value.kind,
              claims: [existing.side, candidate.side],
              warning,
            });
            warnings.push(warning);
            break;
          }

          const [winner, loser] =
            resolution.winner === 'existing'
              ? [existing.side, candidate.side]
              : [candidate.side, existing.side];
          if (resolution.winner === 'incoming') {
            kept[i] = candidate;
          }
          superseded.push(loser);
          resolved.push({
            topic: existing.topic,
            valueKind: existing.value.kind,
            winner,
            superseded: loser,
            rule: resolution.rule,
            rationale: resolution.rationale,
          });
          placed = true;
          break;
        }

        if (!placed) {
          kept.push(candidate);
        }
      }

      if (degraded) {
        warnings.push(DEGRADED_VALIDATION_WARNING);
      }

      log.info(
        {
          results: results.length,
          claims: claims.length,
          kept: kept.length,
          resolved: resolved.length,
          unresolved: unresolved.length,
          degraded,
        },
        'Reconciliation complete',
      );

      return {
        claims: kept.map(toValidatedClaim),
        resolvedContradictions: resolved,
        unresolvedContradictions: unresolved,
        summaries: results.map((result) => ({
          agentId: result.agentId,
          capability: result.capability,
          subtaskId: result.subtaskId,
          summary: result.summary,
          sourceUrls: [...result.sourceUrls],
        })),
        warnings,
        metadata: {
          subtasks: [],
          failedSubtasks: [],
          cachedSubtasks: [],
          superseded,
          degraded: { validation: degraded },
          fromCache: false,
        },
      };
    },
  };
}
