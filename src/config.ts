import path from 'path';
import { envChoice, envInt, envString, type Env } from './utils.js';

export type StorageMode = 'sqlite' | 'memory';

export interface HubConfig {
  host: string;
  port: number;
  rpcPath: string;
  publicUrl: string;
  storage: StorageMode;
  dbPath: string;
  pushTimeoutMs: number;
  sseHeartbeatMs: number;
}

export function loadConfig(env: Env = process.env): HubConfig {
  const host = envString(env, 'AGENT_HUB_HOST', '0.0.0.0');
  const port = envInt(env, 'AGENT_HUB_PORT', 3000, 0, 65_535);
  const rawPath = envString(env, 'AGENT_HUB_RPC_PATH', '/a2a');
  const rpcPath = rawPath.startsWith('/') ? rawPath : `/${rawPath}`;
  const publicHost = host === '0.0.0.0' ? 'localhost' : host;

  return {
    host,
    port,
    rpcPath,
    publicUrl: envString(env, 'AGENT_HUB_PUBLIC_URL', `http://${publicHost}:${port}${rpcPath}`),
    storage: envChoice(env, 'AGENT_HUB_STORAGE', ['sqlite', 'memory'] as const, 'sqlite'),
    dbPath: envString(env, 'AGENT_HUB_DB', path.join(process.cwd(), 'agent-hub.db')),
    pushTimeoutMs: envInt(env, 'AGENT_HUB_PUSH_TIMEOUT_MS', 5_000, 100, 60_000),
    sseHeartbeatMs: envInt(env, 'AGENT_HUB_SSE_HEARTBEAT_MS', 15_000, 2_000, 60_000),
  };
}
