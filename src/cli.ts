#!/usr/bin/env node
import fs from 'node:fs';
import process from 'node:process';
import { fileURLToPath } from 'node:url';
import logger from './logger.js';
import { ConfigError } from './errors.js';
import { bootstrap, runShutdownHooks, type BridgeDependencies, type BridgeRuntime } from './app.js';

const USAGE = 'Usage: motion-preview-bridge <config.json>';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

export type ParsedArgs = { ok: true; configPath: string } | { ok: false; message: string };

export function parseArgs(args: readonly string[]): ParsedArgs {
  if (args.length !== 1) {
    return {
      ok: false,
      message: args.length === 0 ? 'Missing configuration path' : 'Expected exactly one argument'
    };
  }
  const [configPath] = args;
  if (configPath.startsWith('-')) {
    return { ok: false, message: `Unknown option ${configPath}` };
  }
  return { ok: true, configPath };
}

/**
 * Starts the bridge. Resolves with the runtime once it is running, or with null
 * after reporting a usage or configuration problem (exit code 1).
 */
export async function runCli(
  args: readonly string[],
  io: CliIo = { stdout: process.stdout, stderr: process.stderr },
  dependencies: BridgeDependencies = {}
): Promise<BridgeRuntime | null> {
  const parsed = parseArgs(args);
  if (!parsed.ok) {
    io.stderr.write(`${parsed.message}\n${USAGE}\n`);
    process.exitCode = 1;
    return null;
  }

  try {
    return await bootstrap(parsed.configPath, dependencies);
  } catch (error) {
    if (error instanceof ConfigError) {
      io.stderr.write(`Invalid configuration:\n${error.problems.map(problem => `  - ${problem}`).join('\n')}\n`);
      process.exitCode = 1;
      return null;
    }
    throw error;
  }
}

function installSignalHandlers() {
  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Shutdown requested');
    runShutdownHooks({ reason: 'signal', signal })
      .then(results => {
        for (const result of results) {
          if (result.status === 'error') {
            logger.error({ err: result.error, hook: result.name }, 'Shutdown hook failed');
          }
        }
        process.exit(process.exitCode ?? 0);
      })
      .catch(error => {
        logger.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

function isEntryPoint(): boolean {
  const invoked = process.argv[1];
  if (!invoked) {
    return false;
  }
  try {
    return fs.realpathSync(invoked) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  runCli(process.argv.slice(2))
    .then(runtime => {
      if (runtime) {
        installSignalHandlers();
      }
    })
    .catch(error => {
      logger.error({ err: error }, 'Bridge failed to start');
      process.exitCode = 1;
    });
}
