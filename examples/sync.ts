#!/usr/bin/env tsx
/**
 * Blocking client example for the Xioca TypeScript client
 */

import { XiocaSync, Models, createUserMessage } from '../src';

function main() {
  console.log('=== Xioca TypeScript client - Sync Example ===\n');

  const content = XiocaSync.scoped({}, (client) => {
    const response = client.chat.create({
      model: Models.LLAMA_3_3,
      messages: [createUserMessage('Write a haiku about type systems.')],
      temperature: 1.2
    });
    return response.choices[0]?.message.content;
  });

  console.log(content);
}

if (require.main === module) {
  main();
}
