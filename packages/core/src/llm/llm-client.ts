import { createChildLogger } from '@triangulate/shared/src/logger.js';
import { ConfigurationError } from '@triangulate/shared/src/utils/errors.js';
import { extractJson } from './json-extraction.js';
import { withTransientRetry } from './transient-retry.js';

const log = createChildLogger('llm:client');

const DEFAULT_MODEL = 'gemini-2.0-flash';

export interface LlmRequest {
  readonly systemPrompt: string;
  readonly userMessage: string;
  readonly jsonSchema?: Record<string, unknown>;
}

export interface LlmResponse {
  readonly content: string;
  readonly tokenUsage?: {
    readonly input: number;
    readonly output: number;
  };
}

export interface LlmClient {
  invoke(request: LlmRequest): Promise<LlmResponse>;
}

function firstLine(text: string): string {
  const line = text.split('\n').find((l) => l.trim().length > 0) ?? '';
  return line.replace(/^[A-Za-z ]+:\s*/, '').trim();
}

function createMockResponse(request: LlmRequest): string {
  const prompt = request.systemPrompt.toLowerCase();
  const subject = firstLine(request.userMessage);

  if (prompt.includes('research coordinator')) {
    return JSON.stringify({
      subtasks: [
        { capability: 'web', text: `Recent reporting and data on: ${subject}` },
        { capability: 'academic', text: `Peer-reviewed findings on: ${subject}` },
      ],
      reasoning: 'Combines current sources with published research.',
    });
  }

  if (prompt.includes('claim extraction')) {
    return JSON.stringify({
      summary: `Mock findings for ${subject}.`,
      claims: [
        {
          statement: `${subject} is an active area of investigation`,
          confidence: 0.7,
          citation: 'https://example.com/mock-source',
        },
      ],
    });
  }

  if (prompt.includes('entailment')) {
    return JSON.stringify({
      verdict: 'neutral',
      reasoning: 'The statements address different aspects of the topic.',
    });
  }

  if (prompt.includes('report writer')) {
    return JSON.stringify({
      answer: `Mock report for ${subject}.`,
      contradictions: 'No contradictions between agents were reported.',
      limitations: 'Written by the mock LLM client from mock evidence.',
      citations: ['https://example.com/mock-source'],
    });
  }

  return JSON.stringify({ result: 'Mock LLM response' });
}

function createMockClient(): LlmClient {
  log.info('Using mock LLM client');

  return {
    invoke(request: LlmRequest): Promise<LlmResponse> {
      log.debug({ systemPromptLength: request.systemPrompt.length }, 'Mock LLM invocation');

      return Promise.resolve({
        content: createMockResponse(request),
        tokenUsage: { input: 100, output: 50 },
      });
    },
  };
}

async function createVertexClient(): Promise<LlmClient> {
  const projectId = process.env['TRIANGULATE_GCP_PROJECT_ID'] ?? process.env['GCP_PROJECT_ID'];
  const location = process.env['VERTEX_AI_LOCATION'] ?? 'europe-west1';

  if (!projectId) {
    throw new ConfigurationError(
      'TRIANGULATE_GCP_PROJECT_ID or GCP_PROJECT_ID is required for the Vertex AI LLM client',
    );
  }

  const { ChatVertexAI } = await import('@langchain/google-vertexai');

  const model = new ChatVertexAI({
    model: DEFAULT_MODEL,
    location,
    temperature: 0.2,
    authOptions: { projectId },
    responseMimeType: 'application/json',
  });

  log.info({ projectId, location }, 'Using Vertex AI LLM client');

  return {
    invoke(request: LlmRequest): Promise<LlmResponse> {
      log.debug({ systemPromptLength: request.systemPrompt.length }, 'Vertex AI LLM invocation');

      return withTransientRetry('Vertex AI invocation', async () => {
        const response = await model.invoke([
          ['system', request.systemPrompt],
          ['human', request.userMessage],
        ]);

        const rawContent =
          typeof response.content === 'string'
            ? response.content
            : JSON.stringify(response.content);

        // Normalise fenced or chatty output to plain JSON
        const content = JSON.stringify(extractJson(rawContent));

        return {
          content,
          tokenUsage: response.usage_metadata
            ? {
                input: response.usage_metadata.input_tokens,
                output: response.usage_metadata.output_tokens,
              }
            : undefined,
        };
      });
    },
  };
}

export async function createLlmClient(): Promise<LlmClient> {
  if (process.env['TRIANGULATE_MOCK_LLM'] === 'true') {
    return createMockClient();
  }

  return createVertexClient();
}
