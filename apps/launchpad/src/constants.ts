// ── Launchpad configuration ──────────────────────────────────────────────
export const LAUNCHPAD_CONFIG_ENV = 'LAUNCHPAD_CONFIG';
export const CONFIG_FILE_FLAG = '--config-file';
export const LAUNCHPAD_OPTIONS = Symbol('LAUNCHPAD_OPTIONS');

// ── Heartbeat ─────────────────────────────────────────────────────────────
// HEARTBEAT_LOOP_STALE_MS must stay >= 2 × the configured iterMinPeriodMs,
// otherwise the liveness probe fires between two healthy iterations.
export const HEARTBEAT_PATH = '/tmp/launchpad.heartbeat';
export const HEARTBEAT_INTERVAL_MS = 15_000;
export const HEARTBEAT_LOOP_STALE_MS = 5 * 60_000; // 5 minutes
