#!/usr/bin/env node

/**
 * alphaminer CLI Entry Point
 */

import { createProgram } from '../program';
import { handleError } from '../core/error-handler';

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    const message = handleError(error);
    console.error(`Error: ${message}`);
    process.exit(1);
  }
}

void main();
