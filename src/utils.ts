import { randomUUID } from 'crypto';

export type Env = Record<string, string | undefined>;

export function envInt(env: Env, name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  return Number.isFinite(Number(raw))
    ? Math.max(min, Math.min(max, Math.floor(Number(raw))))
    : fallback;
}

export function envString(env: Env, name: string, fallback: string): string {
  return (env[name] || '').trim() || fallback;
}

export function envChoice<T extends string>(env: Env, name: string, choices: readonly T[], fallback: T): T {
  const configured = String(env[name] || '').toLowerCase().trim();
  return choices.find((choice) => choice === configured) ?? fallback;
}

export function newId(): string {
  return randomUUID();
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
