// Risk and duration vocabulary shared by tool metadata, the safety gate and every
// component that runs a command.

export const RISK_LEVELS = ["read-only", "low", "moderate", "high", "critical"] as const;

/** Lowest to highest. Only kmod_install is above read-only. */
export type RiskLevel = (typeof RISK_LEVELS)[number];

export function riskAtLeast(level: RiskLevel, threshold: RiskLevel): boolean {
  return RISK_LEVELS.indexOf(level) >= RISK_LEVELS.indexOf(threshold);
}

/**
 * instant: uname. quick: one sync-database query. normal: release metadata request.
 * slow: binary database download, index resync. long_running: a pacman transaction.
 */
export type DurationCategory = "instant" | "quick" | "normal" | "slow" | "long_running";

export const DURATION_TIMEOUTS: Record<DurationCategory, number> = {
  instant: 5_000,
  quick: 15_000,
  normal: 30_000,
  slow: 60_000,
  long_running: 300_000,
};

/** Timeout in ms for a category, capped by errors.command_timeout_ceiling (ms here; 0 = no cap). */
export function timeoutFor(category: DurationCategory, ceilingMs = 0): number {
  const base = DURATION_TIMEOUTS[category];
  return ceilingMs > 0 ? Math.min(base, ceilingMs) : base;
}
