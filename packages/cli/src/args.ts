import { existsSync } from 'node:fs';
import { ConfigurationError } from '@pointforge/points';
import type { AppendCommand, ManualLiteral } from '@pointforge/points';

export const COMMAND_KEYWORDS: readonly AppendCommand[] = ['auto', 'append', 'overwrite', 'reflected'];

const NUMBER_PATTERN = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:e[-+]?\d+)?$/i;

export interface PositionalArguments {
  command?: AppendCommand;
  literals: ManualLiteral[];
  csvFiles: string[];
  timeSeries?: string;
}

function asCommand(arg: string): AppendCommand | undefined {
  const normalized = arg.toLowerCase();
  return COMMAND_KEYWORDS.find((keyword) => keyword === normalized);
}

/**
 * Sorts bare arguments into a command keyword, manual values and gaps, input files, and the
 * target series. Negative values must follow `--`.
 */
export function classifyArguments(
  args: readonly string[],
  fileExists: (path: string) => boolean = existsSync
): PositionalArguments {
  const result: PositionalArguments = { literals: [], csvFiles: [] };

  for (const arg of args) {
    const command = asCommand(arg);
    if (command) {
      result.command = command;
      continue;
    }
    if (arg.toLowerCase() === 'gap') {
      result.literals.push('gap');
      continue;
    }
    if (NUMBER_PATTERN.test(arg)) {
      result.literals.push(Number(arg));
      continue;
    }
    if (fileExists(arg)) {
      result.csvFiles.push(arg);
      continue;
    }
    if (result.timeSeries === undefined) {
      result.timeSeries = arg;
      continue;
    }
    throw new ConfigurationError(`Unknown argument: ${arg}`);
  }

  return result;
}
