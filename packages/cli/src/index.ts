#!/usr/bin/env node
import { ConfigError, UsageError } from '@snakify/shared';
import { OutputRenderer } from './output/renderer';
import { createProgram } from './program';

async function main() {
  const program = createProgram();
  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    const opts = program.opts<{ json?: boolean; verbose?: boolean }>();
    new OutputRenderer(!!opts.json).error(e, !!opts.verbose);

    if (e instanceof ConfigError || e instanceof UsageError) {
      process.exit(2);
    } else {
      process.exit(1);
    }
  }
}

void main();
