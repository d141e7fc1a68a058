/**
 * Resolve Command
 * Show where the proxy would send a request path
 */

import { createConfigurationError, getErrorMessage } from '@/lib/errors';
import { getProxyEnv } from '@/lib/env';
import { needsRedirection, normalizeRequestTarget, parseUpstream, resolveOutboundUrl } from '@/lib/proxy';
import { toRequestTarget } from '@/lib/proxy-server';
import { ExitCode } from '../types';
import type { ResolveOptions } from '../types';
import { CLILogger } from '../utils/logger';

const logger = new CLILogger();

/**
 * Execute resolve command
 *
 * @param path - Request path and query (e.g. `/dashboard?tab=2`)
 */
export function resolveCommand(path: string, options: ResolveOptions): void {
  try {
    const upstream = options.upstream ?? getProxyEnv().SPA_PROXY_UPSTREAM;
    if (!upstream) {
      throw createConfigurationError('No upstream configured. Pass --upstream or set SPA_PROXY_UPSTREAM.');
    }

    const target = toRequestTarget(path);
    const url = resolveOutboundUrl(parseUpstream(upstream), target);

    logger.field('Request', target);
    logger.field('Upstream', url.href);
    logger.field('Index', needsRedirection(normalizeRequestTarget(target).pathname) ? 'fallback' : 'no');
  } catch (error) {
    logger.error(getErrorMessage(error));
    process.exit(ExitCode.CONFIG_ERROR);
  }
}
