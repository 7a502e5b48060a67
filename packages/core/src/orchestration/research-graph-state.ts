import { Annotation } from '@langchain/langgraph';
import type {
  DecompositionStrategy,
  ResearchQuery,
  Subtask,
  ValidatedResult,
} from '@triangulate/shared/src/types/research.types.js';
import type { SubtaskOutcome } from './subtask-dispatcher.js';

export const ResearchGraphAnnotation = Annotation.Root({
  runId: Annotation<string>,
  query: Annotation<ResearchQuery>,
  signal: Annotation<AbortSignal>,
  startedAt: Annotation<Date>,
  cachedResult: Annotation<ValidatedResult | undefined>,
  decomposition: Annotation<DecompositionStrategy | undefined>,
  subtasks: Annotation<readonly Subtask[]>,
  outcomes: Annotation<readonly SubtaskOutcome[]>,
  validated: Annotation<ValidatedResult | undefined>,
});

export type ResearchGraphState = typeof ResearchGraphAnnotation.State;
