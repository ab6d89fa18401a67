import { parseArgs } from 'util';
import { Logging } from 'homebridge';
import { ApiClient } from './api/ApiClient';
import { TelemetrySession } from './api/TelemetrySession';
import { DEFAULT_DECIMALS, renderAll, renderSelected, renderSummary } from './format';
import { createConsoleLogger, LogSink } from './logger';
import { CLI_NAME, LOG_PREFIX, RUN_DEADLINE_MS, loadSettings } from './settings';
import { summarize } from './telemetry';

export interface CliArgs {
  apiKey?: string;
  debug: boolean;
  test: boolean;
  all: boolean;
  help: boolean;
  decimals: number;
  variables: string[];
}

export interface CliIo {
  out: (line: string) => void;
  log: Logging;
  env: NodeJS.ProcessEnv;
  now?: () => number;
}

const KNOWN_OPTIONS = new Set(['debug', 'test', 'all', 'help', 'decimals']);

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Known flags are options; any other `--name` is a metric key to print.
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals, tokens } = parseArgs({
    args: argv,
    options: {
      debug: { type: 'boolean' },
      test: { type: 'boolean' },
      all: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
      decimals: { type: 'string' },
    },
    strict: false,
    allowPositionals: true,
    tokens: true,
  });

  let decimals = DEFAULT_DECIMALS;
  if (typeof values.decimals === 'string') {
    decimals = Number(values.decimals);
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > 20) {
      throw new UsageError(`--decimals must be an integer between 0 and 20, got "${values.decimals}"`);
    }
  }

  return {
    apiKey: positionals[0],
    debug: values.debug === true,
    test: values.test === true,
    all: values.all === true,
    help: values.help === true,
    decimals,
    // Long flags only, in order and with repeats; unknown short flags are ignored.
    variables: (tokens ?? []).flatMap(token =>
      token.kind === 'option' && token.rawName.startsWith('--') && !KNOWN_OPTIONS.has(token.name) ? [token.name] : []),
  };
}

export function usage(): string[] {
  return [
    `${CLI_NAME} - Command line tool to query FoxESS energy data`,
    '',
    `Usage: ${CLI_NAME} <API_KEY> [options] [variables]`,
    '',
    'Options:',
    '  --help, -h            Display this help message',
    '  --debug               Enable debug output',
    '  --test                Test the API key only',
    '  --all                 Show all available variables',
    '  --decimals <n>        Decimal places for numeric output (default: 2)',
    '',
    'Variables (use with --<variable>):',
    '  generationPower       Solar generation power',
    '  pvPower               PV power',
    '  feedinPower           Power feeding into the grid',
    '  gridConsumptionPower  Power drawn from the grid',
    '  loadsPower            Home consumption power',
    '  batChargePower        Battery charging power',
    '  batDischargePower     Battery discharging power',
    '  SoC                   Battery state of charge',
    '  batTemperature        Battery temperature',
    '  ambientTemperation    Ambient temperature',
    '  invTemperation        Inverter temperature',
    '  meterPower2           CT2 power reading',
    '',
    'The API key may also be set through FOXESS_API_KEY.',
    '',
    'Examples:',
    `  ${CLI_NAME} YOUR_API_KEY --generationPower --SoC`,
    `  ${CLI_NAME} YOUR_API_KEY --all`,
  ];
}

/** Runs one invocation and resolves to the process exit code. */
export async function run(args: CliArgs, io: CliIo): Promise<number> {
  const { out, log } = io;

  if (args.help) {
    usage().forEach(l => out(l));
    return 0;
  }

  const settings = loadSettings(io.env);
  const apiKey = args.apiKey ?? settings.apiKey;
  if (!apiKey) {
    out('Error: No API key provided');
    out('Use --help for usage information');
    return 1;
  }

  const client = new ApiClient(log, { baseURL: settings.baseURL, now: io.now });
  const session = new TelemetrySession(apiKey, client, log);

  if (args.test) {
    if (await session.testAuthentication()) {
      out('API Key is valid');
      return 0;
    }
    out('API Key is invalid or there was a connection problem');
    return 1;
  }

  try {
    session.authenticate();

    const devices = await session.listDevices();
    const device = devices[0];
    if (!device) {
      out('No devices found for this account');
      return 0;
    }
    log.debug(`Found device: ${device.stationName} (${device.deviceSN})`);

    const points = await session.fetchRealtime(device.deviceSN);

    if (args.all) {
      renderAll(device, points, args.decimals).forEach(l => out(l));
    } else if (args.variables.length > 0) {
      renderSelected(device, points, args.variables, args.decimals).forEach(l => out(l));
    } else {
      const summary = summarize(points, device);
      log.debug(`Raw summary: ${JSON.stringify(summary)}`);
      renderSummary(device, summary, args.decimals).forEach(l => out(l));
    }
    return 0;
  } catch (error) {
    out(`Error: ${error instanceof Error ? error.message : String(error)}`);
    if (args.debug && error instanceof Error && error.stack) {
      log.debug(error.stack);
    }
    return 1;
  }
}

export interface CliOptions {
  out: (line: string) => void;
  env: NodeJS.ProcessEnv;
  sink?: LogSink;
  deadlineMs?: number;
}

/**
 * Entry point behind the `foxess` binary: parses `argv`, builds the logger and
 * bounds the whole run by `deadlineMs`.
 */
export async function runCli(argv: string[], options: CliOptions): Promise<number> {
  const { out, env } = options;
  const deadlineMs = options.deadlineMs ?? RUN_DEADLINE_MS;

  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      out(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  const log = createConsoleLogger(LOG_PREFIX, args.debug, options.sink);
  log.debug('Starting with arguments:', argv.filter(a => a !== args.apiKey));

  let deadline: NodeJS.Timeout | undefined;
  const timedOut = new Promise<number>(resolve => {
    deadline = setTimeout(() => {
      out(`Error: Timed out after ${deadlineMs / 1000} seconds`);
      resolve(1);
    }, deadlineMs);
  });

  try {
    return await Promise.race([run(args, { out, log, env }), timedOut]);
  } finally {
    clearTimeout(deadline);
  }
}
