// Stands between kmod_install and pacman. At or above the configured threshold the
// caller receives the installation plan as a confirmation_required preview and must
// call again with confirmed: true.
import type { RiskLevel } from "../types/risk.js";
import { riskAtLeast } from "../types/risk.js";
import type { ConfirmationResponse } from "../types/response.js";
import { logger } from "../logger.js";

export interface GateCheck {
  toolName: string;
  toolRiskLevel: RiskLevel;
  targetHost: string;
  /** Human-readable plan shown in the preview. */
  plan: string;
  description: string;
  warnings?: string[];
  confirmed?: boolean;
  dryRun?: boolean;
}

export class SafetyGate {
  private readonly threshold: RiskLevel;
  private readonly dryRunBypass: boolean;

  constructor(config: { confirmation_threshold: RiskLevel; dry_run_bypass_confirmation: boolean }) {
    this.threshold = config.confirmation_threshold;
    this.dryRunBypass = config.dry_run_bypass_confirmation;
  }

  /** null if the operation may proceed, otherwise the confirmation request to return. */
  check(params: GateCheck): ConfirmationResponse | null {
    if (params.dryRun && this.dryRunBypass) return null;

    // read-only and low never prompt, whatever the threshold
    if (!riskAtLeast(params.toolRiskLevel, "moderate")) return null;
    if (!riskAtLeast(params.toolRiskLevel, this.threshold)) return null;
    if (params.confirmed) return null;

    logger.info({ tool: params.toolName, risk: params.toolRiskLevel, threshold: this.threshold }, "Confirmation required");

    return {
      status: "confirmation_required",
      tool: params.toolName,
      target_host: params.targetHost,
      duration_ms: null,
      command_executed: null,
      risk_level: params.toolRiskLevel,
      dry_run_available: true,
      preview: {
        plan: params.plan,
        description: params.description,
        warnings: params.warnings ?? [],
      },
    };
  }
}
