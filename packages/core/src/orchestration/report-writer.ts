import type {
  ResearchReport,
  ValidatedResult,
} from '@triangulate/shared/src/types/research.types.js';
import { createChildLogger } from '@triangulate/shared/src/logger.js';
import type { LlmClient } from '../llm/llm-client.js';
import { invokeAndValidate } from '../llm/invoke-and-validate.js';
import {
  ResearchReportResultJsonSchema,
  ResearchReportResultSchema,
} from '../agents/agent-output.schemas.js';

const log = createChildLogger('orchestration:report-writer');

export interface ReportWriter {
  write(query: string, validated: ValidatedResult): Promise<ResearchReport>;
}

const SYSTEM_PROMPT = `You are a research report writer. You receive a research query and the evidence several research agents gathered for it, already checked against each other.

Write a report that:
1. Answers the query directly, using only the validated claims
2. Explains each contradiction between agents and how it was resolved; name the ones left open
3. Cites the source URLs that back the answer, taken only from the evidence
4. States the limitations of the evidence and where further research is needed

Respond with a JSON object containing:
- answer: the answer to the query, a few paragraphs at most
- contradictions: how conflicting findings were settled, or an empty string when there were none
- limitations: gaps and caveats in the evidence
- citations: array of source URLs from the evidence`;

/** Every URL the evidence mentions; a report may only cite these. */
export function evidenceSources(validated: ValidatedResult): Set<string> {
  const sources = new Set<string>();
  for (const claim of validated.claims) {
    claim.citations.forEach((url) => sources.add(url));
  }
  for (const summary of validated.summaries) {
    summary.sourceUrls.forEach((url) => sources.add(url));
  }
  return sources;
}

function buildEvidence(validated: ValidatedResult): string {
  const evidence = {
    claims: validated.claims.map((c) => ({
      statement: c.statement,
      confidence: c.confidence,
      contested: c.contested,
      agents: [...new Set(c.sources.map((s) => s.capability))],
      citations: c.citations,
    })),
    resolvedContradictions: validated.resolvedContradictions.map((c) => ({
      topic: c.topic,
      kept: c.winner.statement,
      superseded: c.superseded.statement,
      rationale: c.rationale,
    })),
    unresolvedContradictions: validated.unresolvedContradictions.map((c) => ({
      topic: c.topic,
      statements: c.claims.map((side) => side.statement),
    })),
    summaries: validated.summaries.map((s) => ({
      capability: s.capability,
      summary: s.summary,
      sourceUrls: s.sourceUrls,
    })),
  };
  return JSON.stringify(evidence, null, 2);
}

export function createReportWriter(llmClient: LlmClient): ReportWriter {
  return {
    async write(query: string, validated: ValidatedResult): Promise<ResearchReport> {
      const result = await invokeAndValidate({
        llmClient,
        request: {
          systemPrompt: SYSTEM_PROMPT,
          userMessage: `Query: ${query}\n\nEvidence:\n${buildEvidence(validated)}`,
          jsonSchema: ResearchReportResultJsonSchema as Record<string, unknown>,
        },
        schema: ResearchReportResultSchema,
        agentName: 'Report writer',
      });

      const known = evidenceSources(validated);
      const proposed = [...new Set(result.citations)];
      const citations = proposed.filter((url) => known.has(url));
      if (citations.length < proposed.length) {
        log.warn(
          { proposed: proposed.length, kept: citations.length },
          'Dropped report citations missing from the evidence',
        );
      }

      log.info({ claims: validated.claims.length, citations: citations.length }, 'Report written');
      return {
        answer: result.answer,
        contradictions: result.contradictions,
        limitations: result.limitations,
        citations,
      };
    },
  };
}
