/**
 * Resolve Command Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { resolveCommand } from '@/cli/commands/resolve';
import { ExitCode } from '@/cli/types';

describe('resolveCommand', () => {
  const originalEnv = process.env;
  let mockExit: ReturnType<typeof vi.fn>;

  const printed = (): string[] => vi.mocked(console.log).mock.calls.map(([line]) => String(line));

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.SPA_PROXY_UPSTREAM;
    delete process.env.SPA_PROXY_PORT;
    delete process.env.SPA_PROXY_BIND;
    delete process.env.SPA_PROXY_TIMEOUT_MS;

    mockExit = vi.fn();
    vi.spyOn(process, 'exit').mockImplementation(mockExit as unknown as typeof process.exit);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    process.env = originalEnv;
    vi.restoreAllMocks();
  });

  it('should show the index fallback for a client-side route', () => {
    resolveCommand('/dashboard?tab=1', { upstream: 'http://localhost:5173/app' });

    expect(printed()).toEqual([
      '  \x1b[1mRequest     \x1b[0m /dashboard?tab=1',
      '  \x1b[1mUpstream    \x1b[0m http://localhost:5173/app/index.html',
      '  \x1b[1mIndex       \x1b[0m fallback',
    ]);
    expect(mockExit).not.toHaveBeenCalled();
  });

  it('should show the composed URL for an asset path', () => {
    resolveCommand('/assets/app.js?v=3', { upstream: 'http://localhost:5173/app' });

    expect(printed()).toEqual([
      '  \x1b[1mRequest     \x1b[0m /assets/app.js?v=3',
      '  \x1b[1mUpstream    \x1b[0m http://localhost:5173/app/assets/app.js?v=3',
      '  \x1b[1mIndex       \x1b[0m no',
    ]);
  });

  it('should report the fallback for a route reached through dot segments', () => {
    resolveCommand('/../dashboard', { upstream: 'http://localhost:5173/app' });

    expect(printed()).toEqual([
      '  \x1b[1mRequest     \x1b[0m /../dashboard',
      '  \x1b[1mUpstream    \x1b[0m http://localhost:5173/app/index.html',
      '  \x1b[1mIndex       \x1b[0m fallback',
    ]);
  });

  it('should reduce an absolute URL to its path and query', () => {
    resolveCommand('http://proxy.local/docs/intro', { upstream: 'http://localhost:5173' });

    expect(printed()[0]).toBe('  \x1b[1mRequest     \x1b[0m /docs/intro');
    expect(printed()[1]).toBe('  \x1b[1mUpstream    \x1b[0m http://localhost:5173/docs/intro');
  });

  it('should treat a path without a leading slash as rooted', () => {
    resolveCommand('settings', { upstream: 'http://localhost:5173' });

    expect(printed()).toEqual([
      '  \x1b[1mRequest     \x1b[0m /settings',
      '  \x1b[1mUpstream    \x1b[0m http://localhost:5173/index.html',
      '  \x1b[1mIndex       \x1b[0m fallback',
    ]);
  });

  it('should read the upstream from the environment', () => {
    process.env.SPA_PROXY_UPSTREAM = 'http://127.0.0.1:4000/base';

    resolveCommand('/a/b', {});

    expect(printed()[1]).toBe('  \x1b[1mUpstream    \x1b[0m http://127.0.0.1:4000/base/a/b');
  });

  it('should exit with CONFIG_ERROR when no upstream is configured', () => {
    resolveCommand('/a/b', {});

    expect(console.error).toHaveBeenCalledWith(
      '\x1b[31m[ERROR]\x1b[0m No upstream configured. Pass --upstream or set SPA_PROXY_UPSTREAM.'
    );
    expect(mockExit).toHaveBeenCalledWith(ExitCode.CONFIG_ERROR);
  });

  it('should exit with CONFIG_ERROR for an invalid upstream', () => {
    resolveCommand('/a/b', { upstream: 'nope' });

    expect(console.error).toHaveBeenCalledWith('\x1b[31m[ERROR]\x1b[0m Upstream is not a valid URL: nope');
    expect(mockExit).toHaveBeenCalledWith(ExitCode.CONFIG_ERROR);
    expect(console.log).not.toHaveBeenCalled();
  });
});
