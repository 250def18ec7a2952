import { readFile } from 'node:fs/promises';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import dotenv from 'dotenv';
import { describeError, SetupError, ValidationError } from '../simulation/engine/errors.js';
import { formatLogRecord } from '../simulation/engine/Logger.js';
import { createObservability } from '../simulation/engine/Observability.js';
import { SimulationEngine } from '../simulation/engine/SimulationEngine.js';
import type { LogLevel } from '../simulation/types/simulation.js';
import { parseLogLevel } from './config.js';

export const USAGE =
  'usage: ran-sim <scenario.json> [--until T] [--seed S] [--configs nodes.json] [--log-level debug|info|warn|error|silent]';

export const EXIT_OK = 0;
export const EXIT_SETUP = 1;
export const EXIT_USAGE = 2;

export interface CliIo {
  out(text: string): void;
  err(text: string): void;
}

const consoleIo: CliIo = {
  out: (text) => console.log(text),
  err: (text) => console.error(text)
};

interface CliArgs {
  scenarioPath: string;
  until?: number;
  seed?: string | number;
  configsPath?: string;
  logLevel: LogLevel;
}

function parseCliArgs(argv: readonly string[], env: Record<string, string | undefined>): CliArgs | 'help' {
  const { values, positionals } = parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      until: { type: 'string' },
      seed: { type: 'string' },
      configs: { type: 'string' },
      'log-level': { type: 'string' },
      help: { type: 'boolean', short: 'h' }
    }
  });

  if (values.help) return 'help';

  const [scenarioPath, ...extra] = positionals;
  if (!scenarioPath || extra.length > 0) throw new Error('expected exactly one scenario file');

  let until: number | undefined;
  if (values.until !== undefined) {
    until = Number(values.until);
    if (!Number.isFinite(until) || until <= 0) throw new Error(`--until must be a positive number, got ${values.until}`);
  }

  const seed = values.seed ?? env.SIM_SEED?.trim();
  return {
    scenarioPath,
    ...(until !== undefined ? { until } : {}),
    ...(seed ? { seed: /^\d+$/.test(seed) ? Number(seed) : seed } : {}),
    ...(values.configs ? { configsPath: values.configs } : {}),
    logLevel: parseLogLevel(values['log-level'] ?? env.LOG_LEVEL ?? 'warn')
  };
}

/** Runs one scenario file and prints the final snapshot as JSON. Resolves to the process exit code. */
export async function runCli(
  argv: readonly string[],
  io: CliIo = consoleIo,
  env: Record<string, string | undefined> = process.env
): Promise<number> {
  let args: CliArgs | 'help';
  try {
    args = parseCliArgs(argv, env);
  } catch (err) {
    io.err(describeError(err));
    io.err(USAGE);
    return EXIT_USAGE;
  }
  if (args === 'help') {
    io.out(USAGE);
    return EXIT_OK;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(args.scenarioPath, 'utf8'));
  } catch (err) {
    io.err(`cannot read scenario ${args.scenarioPath}: ${describeError(err)}`);
    return EXIT_SETUP;
  }

  const observability = createObservability({
    level: args.logLevel,
    writer: { write: (record) => io.err(formatLogRecord(record)) }
  });

  let engine: SimulationEngine;
  try {
    engine = SimulationEngine.fromScenario(raw, {
      observability,
      ...(args.seed !== undefined ? { seed: args.seed } : {})
    });
    if (args.configsPath) {
      await engine.configs.loadFile(args.configsPath);
      engine.applyNodeConfigs();
    }
  } catch (err) {
    if (err instanceof SetupError || err instanceof ValidationError) {
      io.err(`setup failed: ${err.message}`);
      observability.close();
      return EXIT_SETUP;
    }
    throw err;
  }

  try {
    const snapshot = engine.run(args.until);
    io.out(JSON.stringify(snapshot, null, 2));
    return EXIT_OK;
  } finally {
    engine.close();
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  dotenv.config();
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error('Simulation failed', err);
      process.exitCode = EXIT_SETUP;
    });
}
