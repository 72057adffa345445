#!/usr/bin/env tsx
/**
 * Image generation example for the Xioca TypeScript client
 */

import { Xioca, Models, APIError, ValidationError } from '../src';

async function main() {
  console.log('=== Xioca TypeScript client - Image Example ===\n');

  const client = new Xioca();

  try {
    const image = await client.images.generate({
      model: Models.FLUX,
      prompt: 'A lighthouse on a cliff at dusk, oil painting'
    });
    console.log(`Image URL: ${image.url}`);
  } catch (error) {
    if (error instanceof ValidationError) {
      console.error('Invalid request:', error.fieldErrors);
    } else if (error instanceof APIError) {
      console.error(`API error ${error.status}: ${error.message}`);
    } else {
      throw error;
    }
  } finally {
    await client.close();
  }
}

if (require.main === module) {
  main().catch(console.error);
}
