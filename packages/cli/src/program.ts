import { Command } from 'commander';
import { createStderrLogger, loadPointforgeEnv } from '@pointforge/shared';
import type { EnvSource, Logger } from '@pointforge/shared';
import { AppendTimeoutError, createStoreFactory, runPipeline } from '@pointforge/points';
import type { RunConfig, RunResult, StoreFactory } from '@pointforge/points';
import { classifyArguments } from './args';
import { buildRunConfig, parseCliOptions } from './config';

const USER_AGENT = 'pointforge-cli/0.1.0';

type CliDependencies = {
  storeFactory?: StoreFactory;
  env?: EnvSource;
  logger?: Logger;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  fileExists?: (path: string) => boolean;
};

const FLAG_WORDS = /^(true|false|yes|no|on|off)$/i;

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export type RunSummary = {
  points: number;
  savedCsvPath: string | null;
  series: string | null;
  created: boolean;
  mode: string | null;
  accepted: number;
  batches: number;
  appendRequestIds: string[];
  pointsAppended: number | null;
  pointsDeleted: number | null;
  timedOut: boolean;
};

export function summarizeRun(result: RunResult): RunSummary {
  const delivery = result.delivery;
  return {
    points: result.pointCount,
    savedCsvPath: result.savedCsvPath ?? null,
    series: result.target?.identifier ?? null,
    created: result.target?.created ?? false,
    mode: delivery?.mode ?? null,
    accepted: delivery?.pointsAccepted ?? 0,
    batches: delivery?.batches ?? 0,
    appendRequestIds: delivery?.appendRequestIds ?? [],
    pointsAppended: delivery?.completion?.pointsAppended ?? null,
    pointsDeleted: delivery?.completion?.pointsDeleted ?? null,
    timedOut: delivery?.completion?.timedOut ?? false
  };
}

function formatOutput(summary: RunSummary, asJson: boolean | undefined): void {
  if (asJson) {
    console.log(JSON.stringify(summary, null, 2));
    return;
  }
  if (summary.savedCsvPath) {
    console.log(`Saved ${summary.points} points to ${summary.savedCsvPath}`);
  }
  if (summary.series && summary.mode) {
    const batches = summary.batches === 1 ? '1 batch' : `${summary.batches} batches`;
    console.log(`Appended ${summary.accepted} points to ${summary.series} (${summary.mode}, ${batches})`);
  } else if (summary.points === 0) {
    console.log('No points to append');
  }
}

export function createInterface(deps: CliDependencies = {}): Command {
  const program = new Command();
  program
    .name('pointforge')
    .description('Generate, import, transform and append points to a time-series server')
    .argument(
      '[args...]',
      'Target series, input files, numeric values, "gap", or a command (auto, append, overwrite, reflected)'
    )
    .option('--server <url>', 'Time-series server URL [env: POINTFORGE_SERVER]')
    .option('--token <token>', 'Access token [env: POINTFORGE_TOKEN]')
    .option('--time-series <identifier>', 'Target time-series identifier or unique id')
    .option('--command <command>', 'auto, append, overwrite or reflected [default: auto]')
    .option('--time-range <start/end>', 'Explicit overwrite range as two ISO 8601 instants')
    .option('--batch-size <count>', 'Maximum points per append request [default: 500000]')
    .option('--wait [boolean]', 'Wait for appends to complete [default: true]')
    .option('--append-timeout <duration>', 'Maximum wait for appends to complete [default: PT5M]')
    .option('--create-mode <mode>', 'never, basic or reflected [default: never]')
    .option('--unit <unit>', 'Unit of a created series')
    .option('--interpolation-type <type>', 'Interpolation type of a created series')
    .option('--utc-offset <offset>', 'UTC offset of a created series and of imported timestamps without one')
    .option('--gap-tolerance <duration>', 'Gap tolerance of a created series')
    .option('--publish [boolean]', 'Publish a created series')
    .option('--description <text>', 'Description of a created series')
    .option('--comment <text>', 'Comment of a created series')
    .option('--method <method>', 'Monitoring method of a created series')
    .option('--computation-identifier <id>', 'Computation identifier of a created series')
    .option('--computation-period-identifier <id>', 'Computation period identifier of a created series')
    .option('--sub-location-identifier <id>', 'Sub-location identifier of a created series')
    .option(
      '--extended-attribute <column=value>',
      'Extended attribute of a created series as COLUMN@TABLE=value; repeatable',
      collect,
      []
    )
    .option('--grade-code <code>', 'Grade code of manual and generated points')
    .option('--qualifiers <list>', 'Comma-separated qualifiers of manual and generated points')
    .option('--ignore-grades [boolean]', 'Drop grades from every point')
    .option('--ignore-qualifiers [boolean]', 'Drop qualifiers from every point')
    .option('--mapped-grades <rule>', 'Grade mapping rule: low,high:mapped, grade:mapped or :default', collect, [])
    .option('--mapped-qualifiers <rule>', 'Qualifier mapping rule: source:mapped or :default', collect, [])
    .option('--start-time <instant>', 'Start time of generated points [default: now]')
    .option('--point-interval <duration>', 'Interval between generated points [default: 00:01:00]')
    .option('--number-of-points <count>', 'Points to generate; 0 derives the count from the periods')
    .option('--number-of-periods <count>', 'Waveform periods to generate [default: 1]')
    .option('--waveform-type <shape>', 'sine, square, sawtooth or linear [default: sine]')
    .option('--waveform-offset <value>', 'Offset added to every generated value [default: 0]')
    .option('--waveform-phase <fraction>', 'Phase as a fraction of one period [default: 0]')
    .option('--waveform-scalar <value>', 'Scale applied to every generated value [default: 1]')
    .option('--waveform-period <samples>', 'Samples per waveform period [default: 1440]')
    .option('--waveform-text-x <text>', 'Generate the X channel of vectorized text')
    .option('--waveform-text-y <text>', 'Generate the Y channel of vectorized text')
    .option('--source-time-series <identifier>', 'Copy points from [server]identifier or [server|token]identifier')
    .option('--source-query-from <instant>', 'Start of the copied range')
    .option('--source-query-to <instant>', 'End of the copied range')
    .option('--csv <path>', 'Import points from a CSV or .xlsx file', collect, [])
    .option('--csv-format <name>', 'Column preset: ng, 3x or native [default: ng]')
    .option('--csv-date-time-field <column>', '1-based column of combined timestamps')
    .option('--csv-date-time-format <format>', 'Timestamp format [default: ISO 8601]')
    .option('--csv-date-only-field <column>', '1-based column of dates')
    .option('--csv-date-only-format <format>', 'Date format [default: ISO 8601]')
    .option('--csv-time-only-field <column>', '1-based column of times of day')
    .option('--csv-time-only-format <format>', 'Time-of-day format [default: ISO 8601]')
    .option('--csv-default-time-of-day <time>', 'Time of day when none is given [default: 00:00]')
    .option('--csv-value-field <column>', '1-based column of values')
    .option('--csv-grade-field <column>', '1-based column of grade codes')
    .option('--csv-qualifiers-field <column>', '1-based column of qualifiers')
    .option('--csv-qualifier-separator <separator>', 'Separator within the qualifiers column [default: ,]')
    .option('--csv-comment <prefix>', 'Prefix of comment lines')
    .option('--csv-skip-rows <count>', 'Leading rows to skip')
    .option('--csv-delimiter <delimiter>', 'Field delimiter of read and written CSV files [default: ,]')
    .option('--csv-nan-value <text>', 'Value text that marks a gap')
    .option('--csv-ignore-invalid-rows [boolean]', 'Skip rows that cannot be parsed')
    .option('--csv-realign [boolean]', 'Shift imported points so the first one lands on --start-time')
    .option('--csv-remove-duplicate-points [boolean]', 'Drop points repeating the previous timestamp')
    .option('--excel-sheet-number <number>', '1-based worksheet number [default: 1]')
    .option('--excel-sheet-name <name>', 'Worksheet name')
    .option('--save-csv-path <path>', 'Save the final points to this file or directory')
    .option('--stop-after-saving-csv [boolean]', 'Do not append after saving')
    .option('--log-level <level>', 'Log level [env: POINTFORGE_LOG_LEVEL]')
    .option('--json', 'Print the run summary as JSON')
    .action(async (args: string[]) => {
      const env = loadPointforgeEnv(deps.env);
      const options = parseCliOptions(program.opts());
      const positionals = classifyArguments(args, deps.fileExists);
      const now = deps.now ?? Date.now;
      const config: RunConfig = buildRunConfig({ options, positionals, env, now: now() });

      const logger = deps.logger ?? createStderrLogger(options.logLevel ?? env.logLevel);
      const storeFactory =
        deps.storeFactory ?? createStoreFactory({ fetchTimeoutMs: env.httpTimeoutMs, userAgent: USER_AGENT });

      const result = await runPipeline({ config, storeFactory, logger, now, sleep: deps.sleep });
      formatOutput(summarizeRun(result), options.json);

      if (result.delivery?.completion?.timedOut) {
        throw new AppendTimeoutError(result.delivery.pointsAccepted, config.batch.timeoutMs);
      }
    });

  return program;
}

/**
 * Options declared with an optional value take the next argument only when it is a boolean word, so
 * `--csv-realign Stage@Gauge01` keeps the series as a positional argument. Each such option is
 * rewritten to the inline `--flag=value` form before commander sees it.
 */
export function bindOptionalValues(program: Command, args: readonly string[]): string[] {
  const optional = new Set(program.options.filter((option) => option.optional).map((option) => option.long));
  const required = new Set(program.options.filter((option) => option.required).map((option) => option.long));

  const bound: string[] = [];
  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];
    if (arg === '--') {
      bound.push(...args.slice(index));
      break;
    }
    if (required.has(arg)) {
      bound.push(...args.slice(index, index + 2));
      index += 1;
      continue;
    }
    if (!optional.has(arg)) {
      bound.push(arg);
      continue;
    }
    const next = args[index + 1];
    if (next !== undefined && FLAG_WORDS.test(next)) {
      bound.push(`${arg}=${next}`);
      index += 1;
    } else {
      bound.push(`${arg}=true`);
    }
  }
  return bound;
}

export async function runInterface(args: readonly string[], deps: CliDependencies = {}): Promise<void> {
  const program = createInterface(deps);
  await program.parseAsync(bindOptionalValues(program, args), { from: 'user' });
}
