import 'dotenv/config';
import { pathToFileURL } from 'url';
import { createRuntime } from '@docsum/core';
import { createOpenAIChatModel } from '@docsum/llm';
import { Document, createInlineSummarizer } from '@docsum/summarize';

export function createOpenAISummarizer(options?: { apiKey?: string; model?: string; prompt?: string }) {
  const apiKey = options?.apiKey ?? process.env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new Error('Set OPENAI_API_KEY to run the example');
  }
  const model = createOpenAIChatModel({ apiKey, model: options?.model ?? 'gpt-4o-mini', temperature: 0 });
  return createInlineSummarizer(model, options?.prompt);
}

const sampleDocuments: Document[] = [
  {
    content:
      'Open-source communities thrive when contributors have clear tooling, reliable tests, and transparent governance.',
    metadata: { source: 'community.md' },
  },
  {
    content: 'Small improvements in documentation and onboarding can multiply participation and project velocity.',
    metadata: { source: 'onboarding.md' },
  },
];

async function main() {
  const runtime = createRuntime();
  const { output, record } = await runtime.run(createOpenAISummarizer(), { documents: sampleDocuments });

  console.log('Summary:');
  console.log(output.summary);
  console.log('\nRun record:');
  console.log(JSON.stringify(record, null, 2));
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  main().catch(err => {
    console.error(err);
    process.exitCode = 1;
  });
}
