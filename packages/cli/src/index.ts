#!/usr/bin/env -S node --import tsx
import { describeFailure } from '@pointforge/points';
import { expandOptionFiles } from './optionsFile';
import { runInterface } from './program';

async function main(): Promise<void> {
  const args = await expandOptionFiles(process.argv.slice(2));
  await runInterface(args);
}

main().catch((err) => {
  console.error(describeFailure(err));
  process.exitCode = 1;
});
