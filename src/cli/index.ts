/**
 * spa-proxy CLI Entry Point
 */

import { readFileSync } from 'fs';
import { Command } from 'commander';
import { config as dotenvConfig } from 'dotenv';
import { serveCommand } from './commands/serve';
import { resolveCommand } from './commands/resolve';
import { ExitCode } from './types';

dotenvConfig();

// Read version from package.json
const pkg: { version: string } = JSON.parse(
  readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')
);

const program = new Command();

program
  .name('spa-proxy')
  .description('Reverse proxy with index.html fallback for single-page apps')
  .version(pkg.version);

program
  .command('serve')
  .description('Start the proxy server')
  .option('-u, --upstream <url>', 'Upstream base URL')
  .option('-p, --port <number>', 'Listen port')
  .option('-b, --bind <address>', 'Bind address (127.0.0.1, 0.0.0.0, localhost)')
  .option('-n, --proxy-name <name>', 'Token used in Via and Warning headers')
  .option('-t, --timeout <ms>', 'Upstream request timeout in milliseconds')
  .option('-v, --verbose', 'Enable debug output')
  .action(async (options) => {
    await serveCommand({
      upstream: options.upstream,
      port: options.port,
      bind: options.bind,
      proxyName: options.proxyName,
      timeout: options.timeout,
      verbose: options.verbose,
    });
  });

program
  .command('resolve')
  .description('Print the upstream URL a request path is proxied to')
  .argument('<path>', 'Request path and query')
  .option('-u, --upstream <url>', 'Upstream base URL')
  .action((path: string, options) => {
    resolveCommand(path, { upstream: options.upstream });
  });

program.addHelpText('after', `
Environment:
  SPA_PROXY_UPSTREAM, SPA_PROXY_PORT, SPA_PROXY_BIND, SPA_PROXY_NAME,
  SPA_PROXY_TIMEOUT_MS, SPA_PROXY_LOG_LEVEL, SPA_PROXY_LOG_FORMAT
  (read from the environment or a .env file in the working directory)
`);

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(ExitCode.UNEXPECTED_ERROR);
});
