/**
 * Serve Command
 * Start the proxy server in the foreground
 */

import { createConfigurationError, getErrorMessage } from '@/lib/errors';
import { getProxyEnv, isBindAddress, parsePort, parseTimeout } from '@/lib/env';
import type { ProxyEnv } from '@/lib/env';
import { createProxyHandler, FetchProxyClient } from '@/lib/proxy';
import type { ProxyHandler } from '@/lib/proxy';
import { closeServer, createProxyServer, listen } from '@/lib/proxy-server';
import { ExitCode } from '../types';
import type { ServeOptions, ServeSettings } from '../types';
import { CLILogger } from '../utils/logger';

const logger = new CLILogger();

/**
 * Merge command-line flags over the environment configuration
 *
 * @throws {AppError} INVALID_CONFIGURATION
 */
export function resolveServeSettings(options: ServeOptions, env: ProxyEnv): ServeSettings {
  const upstream = options.upstream ?? env.SPA_PROXY_UPSTREAM;
  if (!upstream) {
    throw createConfigurationError('No upstream configured. Pass --upstream or set SPA_PROXY_UPSTREAM.');
  }

  const bind = options.bind ?? env.SPA_PROXY_BIND;
  if (!isBindAddress(bind)) {
    throw createConfigurationError(
      `Invalid --bind: ${bind}. Must be '127.0.0.1', '0.0.0.0', or 'localhost'.`,
      { received: bind }
    );
  }

  return {
    upstream,
    port: options.port !== undefined ? parsePort(options.port, '--port') : env.SPA_PROXY_PORT,
    bind,
    proxyName: options.proxyName ?? env.SPA_PROXY_NAME,
    timeoutMs: options.timeout !== undefined ? parseTimeout(options.timeout, '--timeout') : env.SPA_PROXY_TIMEOUT_MS,
  };
}

/**
 * Build the handler for the given settings.
 * A timeout needs a dedicated client; otherwise the handler creates and owns the default one.
 */
export function createHandlerFromSettings(settings: ServeSettings): ProxyHandler {
  return createProxyHandler(settings.upstream, {
    proxyName: settings.proxyName,
    ...(settings.timeoutMs !== undefined
      ? { client: new FetchProxyClient({ timeoutMs: settings.timeoutMs }) }
      : {}),
  });
}

/**
 * Execute serve command
 */
export async function serveCommand(options: ServeOptions): Promise<void> {
  logger.setVerbose(options.verbose ?? false);

  let settings: ServeSettings;
  let handler: ProxyHandler;
  try {
    settings = resolveServeSettings(options, getProxyEnv());
    handler = createHandlerFromSettings(settings);
  } catch (error) {
    logger.error(`Invalid configuration: ${getErrorMessage(error)}`);
    process.exit(ExitCode.CONFIG_ERROR);
    return;
  }

  const server = createProxyServer(handler);
  try {
    const address = await listen(server, settings.port, settings.bind);
    logger.success(`Proxy ready on http://${settings.bind}:${address.port}`);
    logger.field('Upstream', handler.config.upstream.href);
    logger.field('Proxy name', handler.config.proxyName);
    logger.debug(
      handler.config.ownsClient
        ? 'Using the default fetch client'
        : `Using a fetch client with a ${settings.timeoutMs}ms timeout`
    );
  } catch (error) {
    logger.error(`Failed to start server: ${getErrorMessage(error)}`);
    process.exit(ExitCode.START_FAILED);
    return;
  }

  // Graceful shutdown
  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info(`${signal} signal received: closing proxy server`);
    closeServer(server).then(
      () => {
        logger.info('Proxy server closed');
        process.exit(ExitCode.SUCCESS);
      },
      (error: unknown) => {
        logger.error(`Failed to close server: ${getErrorMessage(error)}`);
        process.exit(ExitCode.UNEXPECTED_ERROR);
      }
    );
  };
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);
}
