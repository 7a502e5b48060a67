import { resolve } from 'node:path';
import { loadConfig } from '@triangulate/schemas/src/config-loader.js';
import { createResearchRuntime, runtimeOptionsFromEnv } from '@triangulate/core/src/research-runtime.js';
import type { QueryHints } from '@triangulate/shared/src/types/research.types.js';
import { isCapability } from '@triangulate/shared/src/types/research.types.js';

function parseHints(): QueryHints {
  const domain = process.env['RESEARCH_DOMAIN'];
  const capabilities = (process.env['RESEARCH_CAPABILITIES'] ?? '')
    .split(',')
    .map((c) => c.trim())
    .filter(isCapability);
  const mediaUris = (process.env['RESEARCH_MEDIA'] ?? '')
    .split(',')
    .map((u) => u.trim())
    .filter((u) => u.length > 0);

  return {
    ...(domain ? { domain } : {}),
    ...(capabilities.length > 0 ? { capabilities } : {}),
    ...(mediaUris.length > 0 ? { mediaUris } : {}),
  };
}

async function main(): Promise<void> {
  const configDir = process.argv[2] ?? resolve(process.cwd(), 'config');
  const queryText = process.argv[3] ?? 'What is the current inflation rate in the euro area?';
  const hints = parseHints();
  const options = runtimeOptionsFromEnv();

  console.log('=== Triangulate Research Runner ===\n');
  console.log(`Config directory: ${configDir}`);
  console.log(`Query: ${queryText}`);
  console.log(`Hints: ${JSON.stringify(hints)}`);
  console.log(`Mock LLM: ${options.mock ? 'yes' : 'no'}, cache: ${options.cacheBackend}\n`);

  const startTime = Date.now();

  const config = await loadConfig(configDir);
  const { orchestrator } = await createResearchRuntime(config, options);

  console.log('Researching...\n');
  const result = await orchestrator.handle(queryText, hints);
  const elapsed = Date.now() - startTime;
  const { metadata } = result;

  console.log('--- Subtasks ---');
  console.log(`  Decomposition: ${metadata.decomposition ?? 'n/a'}${metadata.fromCache ? ' (cached answer)' : ''}`);
  for (const subtask of metadata.subtasks) {
    console.log(`  - [${subtask.capability}/${subtask.purpose}] ${subtask.text}`);
  }
  for (const cached of metadata.cachedSubtasks) {
    console.log(`  cached: ${cached.subtaskId} (similarity ${cached.similarity.toFixed(3)})`);
  }
  for (const failure of metadata.failedSubtasks) {
    console.log(`  failed: ${failure.subtaskId} ${failure.code}: ${failure.message}`);
  }

  console.log('\n--- Claims ---');
  for (const claim of result.claims) {
    const agents = claim.sources.map((s) => s.capability).join(', ');
    const flag = claim.contested ? ' [contested]' : '';
    console.log(`  ${claim.statement} (${claim.confidence.toFixed(2)}, ${claim.valueKind}; ${agents})${flag}`);
    for (const citation of claim.citations) {
      console.log(`      ${citation}`);
    }
  }

  if (result.resolvedContradictions.length > 0) {
    console.log('\n--- Resolved Contradictions ---');
    for (const c of result.resolvedContradictions) {
      console.log(`  ${c.topic}: kept "${c.winner.statement}" over "${c.superseded.statement}"`);
      console.log(`      ${c.rationale}`);
    }
  }

  if (result.warnings.length > 0) {
    console.log('\n--- Warnings ---');
    for (const warning of result.warnings) {
      console.log(`  ${warning}`);
    }
  }

  console.log('\n--- Agent Summaries ---');
  for (const summary of result.summaries) {
    console.log(`  [${summary.capability}] ${summary.summary}`);
  }

  if (result.report) {
    console.log('\n--- Report ---');
    console.log(result.report.answer);
    if (result.report.contradictions) {
      console.log(`\nContradictions: ${result.report.contradictions}`);
    }
    console.log(`\nLimitations: ${result.report.limitations}`);
    for (const citation of result.report.citations) {
      console.log(`  ${citation}`);
    }
  }

  console.log(`\n=== Research completed in ${String(elapsed)}ms ===`);
}

main().catch((error: unknown) => {
  console.error('Research failed:', error);
  process.exit(1);
});
