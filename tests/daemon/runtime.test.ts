import { describe, it, expect, vi, beforeEach, afterAll } from 'vitest';
import { createRuntime, isStartupError } from '../../src/daemon/runtime.js';
import { mergeWithDefaults } from '../../src/engine/config/defaults.js';
import { createSilentLogger } from '../../src/engine/logger.js';
import { MemoryMetricsStore } from '../../src/engine/metrics/memory.js';
import {
  SourceUnavailableError,
  StoreUnavailableError,
  ConfigurationError,
} from '../../src/engine/types.js';

// Mock the global fetch function
const mockFetch = vi.fn();
const originalFetch = globalThis.fetch;
globalThis.fetch = mockFetch as typeof fetch;

const CONFIG = mergeWithDefaults({
  client: { host: 'qbittorrent', username: 'admin', password: 'test-secret' },
  cachePath: '/cache',
  masterPath: '/data',
});

describe('createRuntime', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  afterAll(() => {
    globalThis.fetch = originalFetch;
  });

  it('should log in and wire the memory store without a database', async () => {
    mockFetch.mockResolvedValueOnce(
      new Response('Ok.', { status: 200, headers: { 'set-cookie': 'SID=abc; path=/' } })
    );

    const runtime = await createRuntime(CONFIG, { logger: createSilentLogger() });

    expect(runtime.store).toBeInstanceOf(MemoryMetricsStore);
    expect(runtime.deps.source).toBe(runtime.source);
    expect(mockFetch).toHaveBeenCalledTimes(1);
    await runtime.close();
  });

  it('should fail when qBittorrent rejects the login', async () => {
    mockFetch.mockResolvedValueOnce(new Response('Fails.', { status: 200 }));

    const error = await createRuntime(CONFIG, { logger: createSilentLogger() }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(SourceUnavailableError);
    expect(isStartupError(error)).toBe(true);
  });
});

describe('isStartupError', () => {
  it('should accept connectivity failures only', () => {
    expect(isStartupError(new StoreUnavailableError('down'))).toBe(true);
    expect(isStartupError(new ConfigurationError(['bad']))).toBe(false);
    expect(isStartupError(new Error('boom'))).toBe(false);
  });
});
