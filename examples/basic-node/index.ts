import {
  BruteForceVectorIndex,
  HashingEmbedder,
  HeuristicReasoner,
  InMemoryMetadataStore,
  MemoryService
} from '@stratum/core';

async function main() {
  const embedder = new HashingEmbedder(128);
  const memory = await MemoryService.create({
    store: new InMemoryMetadataStore(),
    reasoner: new HeuristicReasoner(),
    embedder,
    vector: new BruteForceVectorIndex(embedder.dimensions)
  });

  await memory.provisionScopeSchema('user:string,agent:string');
  const scope = { user: 'demo-user', agent: 'assistant' };

  const stored = await memory.memorize(
    scope,
    { content: 'user: My favorite color is blue.\nuser: I am planning a trip to Lisbon next spring.' },
    'conversation'
  );
  console.log('memorize:', JSON.stringify(stored, null, 2));

  const context = await memory.retrieve(scope, 'what color do they like');
  console.log('retrieve:', JSON.stringify(context, null, 2));

  const crossScope = await memory.retrieve({ user: 'demo-user', agent: { any: true } }, 'trip plans');
  console.log('cross-scope:', JSON.stringify(crossScope, null, 2));

  await memory.close();
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
