import { createChildLogger } from '@triangulate/shared/src/logger.js';
import type { LlmClient } from '../llm/llm-client.js';
import { invokeAndValidate } from '../llm/invoke-and-validate.js';
import {
  EntailmentResultJsonSchema,
  EntailmentResultSchema,
} from '../agents/agent-output.schemas.js';

const log = createChildLogger('validation:entailment-judge');

export type EntailmentVerdict = 'entails' | 'contradicts' | 'neutral';

export interface EntailmentJudge {
  judge(first: string, second: string): Promise<EntailmentVerdict>;
}

const SYSTEM_PROMPT = `You are an entailment judge for research findings. Compare two statements about the same subject.

Answer with:
- "entails" when both statements assert the same fact, possibly in different words
- "contradicts" when both cannot be true at the same time
- "neutral" when they describe different aspects and can both hold

Respond with a JSON object containing:
- verdict: "entails" | "contradicts" | "neutral"
- reasoning: one sentence`;

export function createLlmEntailmentJudge(llmClient: LlmClient): EntailmentJudge {
  return {
    async judge(first: string, second: string): Promise<EntailmentVerdict> {
      const result = await invokeAndValidate({
        llmClient,
        request: {
          systemPrompt: SYSTEM_PROMPT,
          userMessage: `Statement A: ${first}\nStatement B: ${second}`,
          jsonSchema: EntailmentResultJsonSchema as Record<string, unknown>,
        },
        schema: EntailmentResultSchema,
        agentName: 'Entailment judge',
      });

      log.debug({ verdict: result.verdict }, 'Entailment judged');
      return result.verdict;
    },
  };
}
