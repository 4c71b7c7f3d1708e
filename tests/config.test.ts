import path from 'path';
import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadConfig({})).toEqual({
      host: '0.0.0.0',
      port: 3000,
      rpcPath: '/a2a',
      publicUrl: 'http://localhost:3000/a2a',
      storage: 'sqlite',
      dbPath: path.join(process.cwd(), 'agent-hub.db'),
      pushTimeoutMs: 5_000,
      sseHeartbeatMs: 15_000,
    });
  });

  it('should read and clamp numeric settings', () => {
    const config = loadConfig({
      AGENT_HUB_PORT: '70000',
      AGENT_HUB_PUSH_TIMEOUT_MS: '10',
      AGENT_HUB_SSE_HEARTBEAT_MS: '2500.9',
    });
    expect(config.port).toBe(65_535);
    expect(config.pushTimeoutMs).toBe(100);
    expect(config.sseHeartbeatMs).toBe(2_500);
  });

  it('should ignore values that are not numbers', () => {
    expect(loadConfig({ AGENT_HUB_PORT: 'eighty' }).port).toBe(3000);
    expect(loadConfig({ AGENT_HUB_PORT: '  ' }).port).toBe(3000);
  });

  it('should derive the public url from host, port and path', () => {
    const config = loadConfig({ AGENT_HUB_HOST: 'agents.internal', AGENT_HUB_PORT: '8080', AGENT_HUB_RPC_PATH: 'rpc' });
    expect(config.rpcPath).toBe('/rpc');
    expect(config.publicUrl).toBe('http://agents.internal:8080/rpc');
    expect(loadConfig({ AGENT_HUB_PUBLIC_URL: 'https://agent.test/a2a' }).publicUrl).toBe('https://agent.test/a2a');
  });

  it('should accept known storage modes case-insensitively', () => {
    expect(loadConfig({ AGENT_HUB_STORAGE: 'MEMORY' }).storage).toBe('memory');
    expect(loadConfig({ AGENT_HUB_STORAGE: 'redis' }).storage).toBe('sqlite');
  });
});
