import type { Claim, Subtask } from '@triangulate/shared/src/types/research.types.js';
import { createChildLogger } from '@triangulate/shared/src/logger.js';
import type { LlmClient } from '../llm/llm-client.js';
import { invokeAndValidate } from '../llm/invoke-and-validate.js';
import {
  ClaimExtractionResultJsonSchema,
  ClaimExtractionResultSchema,
} from './agent-output.schemas.js';
import type { SourceMaterial } from './research-sources.js';

const log = createChildLogger('agent:claim-extractor');

const MAX_MATERIAL_CHARS = 12_000;

export interface ExtractedFindings {
  readonly summary: string;
  readonly claims: readonly Claim[];
}

const SYSTEM_PROMPT = `You perform claim extraction for a research team. Read the source material gathered for a research task and extract the factual claims it supports.

Rules:
- One claim per statement, phrased as a short declarative sentence ("Inflation rate: 3%", "The bridge opened in March 1932")
- Keep numbers, units and dates exactly as the material states them
- Confidence in [0, 1]: how strongly the material supports the claim
- citation: the URL backing the claim, if one of the listed sources does
- topic: the subject of the claim without its value, if obvious
- Skip opinions and speculation
- Maximum 10 claims; return an empty array if the material supports none

Respond with a JSON object containing:
- summary: two or three sentences answering the research task
- claims: array of { statement, confidence, citation, topic }`;

function buildUserMessage(subtask: Subtask, material: SourceMaterial): string {
  const sources =
    material.sourceUrls.length > 0
      ? material.sourceUrls.map((url) => `- ${url}`).join('\n')
      : '(none listed)';

  return `Research task: ${subtask.text}

Source material:
${material.content.slice(0, MAX_MATERIAL_CHARS)}

Sources:
${sources}`;
}

export async function extractFindings(
  subtask: Subtask,
  material: SourceMaterial,
  llmClient: LlmClient,
): Promise<ExtractedFindings> {
  log.info(
    { subtaskId: subtask.id, materialLength: material.content.length },
    'Extracting claims from source material',
  );

  const result = await invokeAndValidate({
    llmClient,
    request: {
      systemPrompt: SYSTEM_PROMPT,
      userMessage: buildUserMessage(subtask, material),
      jsonSchema: ClaimExtractionResultJsonSchema as Record<string, unknown>,
    },
    schema: ClaimExtractionResultSchema,
    agentName: 'Claim extractor',
  });

  const claims: Claim[] = result.claims.map((claim) => ({
    statement: claim.statement,
    confidence: claim.confidence,
    citation: claim.citation ?? undefined,
    topic: claim.topic ?? undefined,
  }));

  log.info({ subtaskId: subtask.id, claims: claims.length }, 'Claim extraction complete');

  return { summary: result.summary, claims };
}
