/**
 * Startup wiring: configuration, sandbox, logger, server and transport.
 *
 * `main()` takes every process-level collaborator explicitly and returns the
 * exit code, so it runs unchanged under test.
 */

import type { Writable } from 'stream';

import { errorMessage } from '../../_shared/ts/errors';
import { Logger } from '../../_shared/ts/logger';
import type { MCPServer } from '../../_shared/ts/mcp-base';
import { PathSandbox } from '../../_shared/ts/sandbox';
import type { SseServerHandle, SseServerOptions } from '../../_shared/ts/sse-server';
import type { ClosableTransport } from '../../_shared/ts/transport';
import { parseCommandLine, usage, type CommandLine, type ServerConfig } from './config';
import { createFilesystemServer, SERVER_VERSION } from './server';

export interface MainDeps {
  /** Usage and startup errors go here. */
  writeStderr: (text: string) => void;
  /** Invoked by `Logger.fatal`. */
  exit: (code: number) => void;
  startDir: string;
  homeDir: () => string | undefined;
  createStdioTransport: () => ClosableTransport;
  startSseServer: (options: SseServerOptions) => Promise<SseServerHandle>;
  /** Aborted on SIGINT/SIGTERM. */
  signal: AbortSignal;
  /** Log destination; stderr when omitted. */
  logStream?: Writable;
}

function whenAborted(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

async function runStdio(server: MCPServer, logger: Logger, deps: MainDeps): Promise<number> {
  const transport = deps.createStdioTransport();
  const onAbort = (): void => {
    logger.info('shutting down');
    transport.close();
  };
  deps.signal.addEventListener('abort', onAbort, { once: true });

  try {
    await server.serve(transport);
    logger.info('stdin closed, exiting');
    return 0;
  } catch (err) {
    logger.error(`stdio transport failed: ${errorMessage(err)}`);
    return 1;
  } finally {
    deps.signal.removeEventListener('abort', onAbort);
  }
}

async function runSse(server: MCPServer, logger: Logger, config: ServerConfig, deps: MainDeps): Promise<number> {
  let handle: SseServerHandle;
  try {
    handle = await deps.startSseServer({ server, logger, host: config.listen.host, port: config.listen.port });
  } catch (err) {
    logger.error(`cannot listen on ${config.listen.host}:${config.listen.port}: ${errorMessage(err)}`);
    return 1;
  }

  await whenAborted(deps.signal);
  logger.info('shutting down');
  try {
    await handle.close();
  } catch (err) {
    logger.warn(`error while closing SSE server: ${errorMessage(err)}`);
  }
  return 0;
}

export async function main(argv: readonly string[], env: NodeJS.ProcessEnv, deps: MainDeps): Promise<number> {
  let commandLine: CommandLine;
  try {
    commandLine = parseCommandLine(argv, env);
  } catch (err) {
    deps.writeStderr(`Error: ${errorMessage(err)}\n\n${usage(SERVER_VERSION)}`);
    return 1;
  }

  if (commandLine.kind === 'help') {
    deps.writeStderr(usage(SERVER_VERSION));
    return 0;
  }

  const { config } = commandLine;
  let sandbox: PathSandbox;
  try {
    sandbox = await PathSandbox.create(config.allowedDirectories, {
      startDir: deps.startDir,
      homeDir: deps.homeDir,
    });
  } catch (err) {
    deps.writeStderr(`Error: ${errorMessage(err)}\n`);
    return 1;
  }

  const logger = new Logger({
    level: config.logLevel,
    prefix: 'fs-sandbox',
    exit: deps.exit,
    stream: deps.logStream,
  });
  logger.info(`allowed directories: ${sandbox.roots.join(', ')}`);
  logger.info(`starting in ${config.mode} mode`);

  const server = createFilesystemServer({ sandbox, logger });
  return config.mode === 'sse' ? runSse(server, logger, config, deps) : runStdio(server, logger, deps);
}
