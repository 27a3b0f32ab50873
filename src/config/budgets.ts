export type Budgets = {
  CONNECT_TIMEOUT_MS: number;
  QUERY_TIMEOUT_MS: number;
  BREAKER_THRESHOLD: number;
  BREAKER_COOLDOWN_MS: number;
  BREAKER_CLOSE_AFTER: number;
  QUERY_BATCH_SIZE: number;
};

export function envNum(k: string, d: number): number {
  const n = Number(process.env[k] ?? d);
  return Number.isFinite(n) ? n : d;
}

export function readBudgets(): Budgets {
  return {
    CONNECT_TIMEOUT_MS: envNum('CONNECT_TIMEOUT_MS', 10_000),
    QUERY_TIMEOUT_MS: envNum('QUERY_TIMEOUT_MS', 300_000),
    BREAKER_THRESHOLD: Math.max(1, envNum('BREAKER_THRESHOLD', 3)),
    BREAKER_COOLDOWN_MS: Math.max(0, envNum('BREAKER_COOLDOWN_MS', 60_000)),
    BREAKER_CLOSE_AFTER: Math.max(1, envNum('BREAKER_CLOSE_AFTER', 3)),
    // Oracle rejects IN lists longer than 1000 entries
    QUERY_BATCH_SIZE: Math.min(1000, Math.max(1, envNum('QUERY_BATCH_SIZE', 1000))),
  };
}
