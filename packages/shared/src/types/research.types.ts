import type { SubtaskFailure } from '../utils/errors.js';

export const CAPABILITIES = ['web', 'academic', 'multimodal'] as const;

export type Capability = (typeof CAPABILITIES)[number];

export function isCapability(value: string): value is Capability {
  return (CAPABILITIES as readonly string[]).includes(value);
}

export interface QueryHints {
  readonly domain?: string;
  readonly capabilities?: readonly Capability[];
  readonly mediaUris?: readonly string[];
}

export interface ResearchQuery {
  readonly id: string;
  readonly text: string;
  readonly hints: QueryHints;
  readonly submittedAt: Date;
}

export type SubtaskPurpose = 'research' | 'verification';

export interface Subtask {
  readonly id: string;
  readonly queryId: string;
  readonly capability: Capability;
  readonly text: string;
  readonly purpose: SubtaskPurpose;
  readonly mediaUris?: readonly string[];
}

export interface Claim {
  readonly statement: string;
  readonly confidence: number;
  readonly citation?: string;
  /** Subject of the claim without its asserted value, when the agent can name it. */
  readonly topic?: string;
}

export interface AgentResult {
  readonly agentId: string;
  readonly capability: Capability;
  readonly subtaskId: string;
  readonly claims: readonly Claim[];
  readonly summary: string;
  readonly sourceUrls: readonly string[];
  readonly timestamp: Date;
}

export interface ClaimProvenance {
  readonly agentId: string;
  readonly capability: Capability;
  readonly subtaskId: string;
  readonly confidence: number;
  readonly timestamp: Date;
  readonly citation?: string;
}

export type ClaimValueKind = 'numeric' | 'date' | 'boolean' | 'text';

export interface ValidatedClaim {
  readonly statement: string;
  readonly confidence: number;
  readonly valueKind: ClaimValueKind;
  readonly citations: readonly string[];
  readonly sources: readonly ClaimProvenance[];
  readonly contested: boolean;
}

export interface ContradictionSide {
  readonly statement: string;
  readonly confidence: number;
  readonly agentId: string;
  readonly capability: Capability;
  readonly timestamp: Date;
}

export type ResolutionRule = 'confidence' | 'recency' | 'agent_priority';

export interface ResolvedContradiction {
  readonly topic: string;
  readonly valueKind: ClaimValueKind;
  readonly winner: ContradictionSide;
  readonly superseded: ContradictionSide;
  readonly rule: ResolutionRule;
  readonly rationale: string;
}

export interface UnresolvedContradiction {
  readonly topic: string;
  readonly valueKind: ClaimValueKind;
  readonly claims: readonly [ContradictionSide, ContradictionSide];
  readonly warning: string;
}

export interface AgentSummary {
  readonly agentId: string;
  readonly capability: Capability;
  readonly subtaskId: string;
  readonly summary: string;
  readonly sourceUrls: readonly string[];
}

export interface CachedSubtask {
  readonly subtaskId: string;
  readonly capability: Capability;
  readonly similarity: number;
}

export type DecompositionStrategy = 'hints' | 'llm' | 'keywords';

export interface ValidatedResultMetadata {
  readonly runId?: string;
  readonly query?: string;
  readonly decomposition?: DecompositionStrategy;
  readonly subtasks: readonly Subtask[];
  readonly failedSubtasks: readonly SubtaskFailure[];
  readonly cachedSubtasks: readonly CachedSubtask[];
  readonly superseded: readonly ContradictionSide[];
  readonly degraded: {
    readonly validation: boolean;
  };
  readonly fromCache: boolean;
  readonly startedAt?: Date;
  readonly completedAt?: Date;
}

/** Narrative answer synthesised from the validated evidence. */
export interface ResearchReport {
  readonly answer: string;
  /** How contradictions between agents were settled, or left open. */
  readonly contradictions: string;
  readonly limitations: string;
  readonly citations: readonly string[];
}

export interface ValidatedResult {
  readonly claims: readonly ValidatedClaim[];
  readonly resolvedContradictions: readonly ResolvedContradiction[];
  readonly unresolvedContradictions: readonly UnresolvedContradiction[];
  readonly summaries: readonly AgentSummary[];
  readonly warnings: readonly string[];
  readonly report?: ResearchReport;
  readonly metadata: ValidatedResultMetadata;
}
