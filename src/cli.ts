/**
 * Command line interface for manual-metric.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from './common/errors.js';
import { enableLogging, serverLog } from './common/logger.js';
import { loadConfig, parseBucketList, parseNumber } from './config/loader.js';
import type { ManualMetricConfig, PartialManualMetricConfig } from './config/types.js';
import { InputLoop } from './console/input-loop.js';
import { measurementFromConfig } from './metrics/factory.js';
import { fullName, type Measurement } from './metrics/measurement.js';
import { createMetricServer, type MetricServer } from './server/server.js';

/**
 * Options as commander hands them to the action.
 */
export interface CliOptions {
  config?: string;
  bind?: string;
  type?: string;
  histogramType?: string;
  buckets?: string;
  nativeBucketFactor?: string;
  nativeMaxBuckets?: string;
  nativeMinReset?: string;
  metricsPath?: string;
  namespace?: string;
  name?: string;
  description?: string;
  username?: string;
  password?: string;
  debug?: string;
  color: boolean;
}

/**
 * Process-level effects, replaceable in tests.
 */
export interface CliRuntime {
  /** Serve `measurement` and run the input loop */
  run(config: ManualMetricConfig, measurement: Measurement, options: { color: boolean }): Promise<void>;
  /** Terminate the process */
  exit(code: number): void;
  /** Report a fatal error */
  error(message: string): void;
  env?: NodeJS.ProcessEnv;
}

/**
 * Translate CLI options into configuration overrides.
 */
export function cliOverrides(options: CliOptions): PartialManualMetricConfig {
  const overrides: PartialManualMetricConfig = {
    bind: options.bind,
    metricsPath: options.metricsPath,
    metric: {
      type: options.type,
      namespace: options.namespace,
      name: options.name,
      help: options.description,
    },
    histogram: {
      types: options.histogramType,
      buckets: options.buckets === undefined ? undefined : parseBucketList(options.buckets),
      native: {
        bucketFactor: options.nativeBucketFactor === undefined
          ? undefined
          : parseNumber('native bucket factor', options.nativeBucketFactor),
        maxBucketNumber: options.nativeMaxBuckets === undefined
          ? undefined
          : parseNumber('native max buckets', options.nativeMaxBuckets),
        minResetDuration: options.nativeMinReset === undefined
          ? undefined
          : parseNumber('native min reset', options.nativeMinReset) * 1000,
      },
    },
    auth: {
      username: options.username,
      password: options.password,
    },
  };

  if (options.debug) {
    overrides.logging = { namespaces: options.debug };
  }

  return overrides;
}

export interface InteractiveOptions {
  color: boolean;
  /** Operator input; stdin by default */
  input?: NodeJS.ReadableStream;
  /** Prompts and status lines; stdout by default */
  output?: NodeJS.WritableStream;
  /** Called after shutdown or a fatal listener error */
  exit?: (code: number) => void;
  /** Shut down on SIGINT and SIGTERM; on by default */
  handleSignals?: boolean;
}

/**
 * A server left running after the input loop ended.
 */
export interface InteractiveSession {
  server: MetricServer;
  /** Base URL the server listens on */
  address: string;
  /** Close the server, drop signal handlers and exit with status 0 */
  shutdown(): Promise<void>;
}

/**
 * Serve the measurement over HTTP and read operator input until it closes.
 * The server keeps serving the last value after that.
 */
export async function runInteractive(
  config: ManualMetricConfig,
  measurement: Measurement,
  options: InteractiveOptions
): Promise<InteractiveSession> {
  const output = options.output ?? process.stdout;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const handleSignals = options.handleSignals ?? true;
  const say = (text: string) => {
    output.write(`${text}\n`);
  };

  const fatal = (err: Error) => {
    console.error(chalk.red('Fatal:'), err.message);
    exit(1);
  };

  const server = createMetricServer({ config, measurement, onFatal: fatal });
  const address = await server.start();
  say(`HTTP server on ${address}${config.server.metricsPath}`);
  say(`Exposing ${fullName(measurement.descriptor)} (${measurement.kind})`);

  let loop: InputLoop | undefined;
  const onSignal = () => {
    shutdown().catch(fatal);
  };
  const shutdown = async () => {
    if (handleSignals) {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    }
    loop?.close();
    say('\nShutting down...');
    await server.stop();
    exit(0);
  };

  if (handleSignals) {
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  }

  loop = new InputLoop({
    measurement,
    input: options.input,
    output,
    color: options.color,
    onInterrupt: onSignal,
  });
  await loop.run();

  serverLog('Input closed, still serving');
  say('\nInput closed; still serving the last value. Press Ctrl+C to stop.');

  return { server, address, shutdown };
}

const defaultRuntime: CliRuntime = {
  run: async (config, measurement, options) => {
    await runInteractive(config, measurement, options);
  },
  exit: code => process.exit(code),
  error: message => console.error(chalk.red('Error:'), message),
};

/**
 * Build the commander program.
 */
export function createProgram(runtime: CliRuntime = defaultRuntime): Command {
  const program = new Command();

  program
    .name('manual-metric')
    .description('Expose one hand-driven gauge, counter or histogram for Prometheus to scrape')
    .version('0.1.0')
    .option('-c, --config <path>', 'Path to config file (JSON)')
    .option('--bind <address>', 'Bind address as host:port (default ":5001")')
    .option('--type <kind>', 'The type of metric to generate: counter, gauge, histogram (default "gauge")')
    .option('--histogram-type <types>', 'Type of histogram, comma separated: classic, native (default "classic")')
    .option('--buckets <bounds>', 'Classic histogram bucket bounds, comma separated')
    .option('--native-bucket-factor <factor>', 'Native histogram bucket growth factor (default 1.1)')
    .option('--native-max-buckets <count>', 'Native histogram bucket limit, 0 for none (default 100)')
    .option('--native-min-reset <seconds>', 'Minimum seconds between native histogram resets (default 3600)')
    .option('--metrics-path <path>', 'Path of the scrape endpoint (default "/metrics")')
    .option('--namespace <namespace>', 'Metric namespace')
    .option('--name <name>', 'Metric name')
    .option('--description <text>', 'Metric help text')
    .option('--username <username>', 'Basic auth username')
    .option('--password <password>', 'Basic auth password')
    .option('--debug <namespaces>', 'Debug namespaces (e.g., "manual-metric:*")')
    .option('--no-color', 'Disable colored output')
    .action(async (options: CliOptions) => {
      let config: ManualMetricConfig;
      let measurement: Measurement;
      try {
        config = loadConfig({
          configPath: options.config,
          overrides: cliOverrides(options),
          env: runtime.env,
        });
        if (config.logging.namespaces) {
          enableLogging(config.logging.namespaces);
        }
        measurement = measurementFromConfig(config);
      } catch (err) {
        runtime.error(errorMessage(err));
        runtime.exit(1);
        return;
      }

      try {
        await runtime.run(config, measurement, { color: options.color });
      } catch (err) {
        runtime.error(`Failed to start server: ${errorMessage(err)}`);
        runtime.exit(1);
      }
    });

  return program;
}
