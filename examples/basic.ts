#!/usr/bin/env tsx
/**
 * Basic usage example for the Xioca TypeScript client
 */

import { Xioca, Models, createSystemMessage, createUserMessage, formatTokenUsage } from '../src';

async function main() {
  console.log('=== Xioca TypeScript client - Basic Example ===\n');

  // Reads XIOCA_API_KEY from the environment
  await Xioca.scoped({ debug: true }, async (client) => {
    console.log('1. Chat Completion');
    console.log('-'.repeat(40));
    const response = await client.chat.create({
      model: Models.DEEPSEEK_V3,
      messages: [
        createSystemMessage('You are a helpful assistant.'),
        createUserMessage('What is the capital of France?')
      ],
      temperature: 0.7
    });

    console.log(`Response: ${response.choices[0]?.message.content}`);
    if (response.usage) {
      console.log(`Tokens used: ${formatTokenUsage(response.usage)}`);
    }
    console.log(`Model: ${response.model}\n`);

    console.log('2. Online Chat Completion');
    console.log('-'.repeat(40));
    const online = await client.chat.create({
      model: Models.QWEN3,
      messages: [createUserMessage('What happened in tech news today?')],
      online: true
    });
    console.log(`Response: ${online.choices[0]?.message.content}\n`);
  });
}

if (require.main === module) {
  main().catch(console.error);
}
