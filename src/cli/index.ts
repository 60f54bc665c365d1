#!/usr/bin/env node
/**
 * plugin-bridge: registers a plugin with the gateway and relays its
 * messages until the gateway unloads it or the process is signalled.
 * A second signal stops the bridge without waiting for the unload.
 *
 * Exit code 0 after a graceful shutdown, 1 when startup fails.
 */

import { Command, Option } from 'commander';
import { GatewayBridge } from '../bridge/gateway-bridge.js';
import { getEnvSummary } from '../config/env-schema.js';
import { loadBridgeConfig, toBridgeOptions, type ConfigOverrides } from '../config/bridge-config.js';
import { getErrorMessage } from '../utils/errors.js';
import { isLogLevel, logger } from '../utils/logger.js';

export interface CliOptions {
  pluginId?: string;
  baseUrl?: string;
  rendezvousUrl?: string;
  logLevel?: string;
  printEnv?: boolean;
}

export type BridgeRunner = (options: CliOptions) => Promise<number>;

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

function toOverrides(options: CliOptions): ConfigOverrides {
  return {
    pluginId: options.pluginId,
    baseUrl: options.baseUrl,
    rendezvousUrl: options.rendezvousUrl,
    logLevel: isLogLevel(options.logLevel) ? options.logLevel : undefined,
  };
}

/**
 * Run a bridge for an empty plugin and resolve the process exit code
 */
export async function runBridge(options: CliOptions): Promise<number> {
  if (options.printEnv) {
    console.log(getEnvSummary());
    return 0;
  }

  let bridge: GatewayBridge;
  try {
    const { config, warnings } = loadBridgeConfig({ overrides: toOverrides(options) });
    logger.setLevel(config.logLevel);
    logger.setFormat(config.logFormat);
    for (const warning of warnings) {
      logger.warn(warning);
    }
    bridge = new GatewayBridge(toBridgeOptions(config));
  } catch (error) {
    logger.error(`Invalid configuration: ${getErrorMessage(error)}`);
    return 1;
  }

  const onSignal = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}`);
    // A second signal does not wait for the gateway
    if (!bridge.requestShutdown()) {
      bridge.stop();
    }
  };
  for (const signal of SHUTDOWN_SIGNALS) {
    process.on(signal, onSignal);
  }

  try {
    const result = await bridge.run();
    logger.info(`Bridge terminated (relay: ${result.relay}, dispatcher: ${result.dispatcher})`);
    return 0;
  } catch (error) {
    logger.error(`Bridge failed to start: ${getErrorMessage(error)}`);
    return 1;
  } finally {
    for (const signal of SHUTDOWN_SIGNALS) {
      process.off(signal, onSignal);
    }
  }
}

export function createProgram(runner: BridgeRunner = runBridge): Command {
  const program = new Command('plugin-bridge')
    .description('Register a plugin with the gateway and relay its messages')
    .option('-p, --plugin-id <id>', 'Plugin id (default: BRIDGE_PLUGIN_ID)')
    .option('--base-url <url>', 'Base of the persistent channel address (default: BRIDGE_BASE_URL)')
    .option('--rendezvous-url <url>', 'Gateway add-on manager address (default: BRIDGE_RENDEZVOUS_URL)')
    .addOption(
      new Option('--log-level <level>', 'Log level (default: LOG_LEVEL)').choices([
        'debug',
        'info',
        'warn',
        'error',
        'silent',
      ])
    )
    .option('--print-env', 'Print the environment configuration and exit')
    .action(async (options: CliOptions) => {
      process.exitCode = await runner(options);
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      logger.error(getErrorMessage(error));
      process.exitCode = 1;
    });
}
