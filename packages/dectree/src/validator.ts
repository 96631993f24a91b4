import { defaultStableParticles } from "./particles.js";
import type { DecayRegistry } from "./registry.js";
import type { SymbolTable } from "./symbols.js";
import type { Finding, FindingSeverity, ParticleName } from "./types.js";

export type ValidateOptions = {
  /** Tolerance on the branching-fraction sum. Default 1e-6 */
  epsilon?: number;
  /** Severity of OVER_UNITY findings. Default "warning" */
  overUnitySeverity?: FindingSeverity;
  /** Particles that are legitimate leaves. Default: bundled stable list */
  stableParticles?: Iterable<ParticleName>;
};

export const DEFAULT_EPSILON = 1e-6;

/**
 * Check a finished registry. Never throws; every problem becomes a finding.
 *
 * - OVER_UNITY: a block's fractions sum to more than 1 + epsilon
 * - UNRESOLVED_PARTICLE: a daughter with no block that is not stable
 *   (reported once per name, at its first use)
 */
export function validate(registry: DecayRegistry, symbols: SymbolTable, options: ValidateOptions = {}): Finding[] {
  const epsilon = options.epsilon ?? DEFAULT_EPSILON;
  const severity = options.overUnitySeverity ?? "warning";
  const stable = new Set(options.stableParticles ?? defaultStableParticles());
  const findings: Finding[] = [];
  const reported = new Set<ParticleName>();

  for (const block of registry.values()) {
    const sum = block.channels.reduce((acc, ch) => acc + ch.fraction, 0);
    if (sum > 1 + epsilon) {
      findings.push({
        code: "OVER_UNITY",
        severity,
        particle: block.particle,
        line: block.line,
        sum,
        message: `Branching fractions of "${block.particle}" sum to ${sum}, more than 1`,
      });
    }

    for (const ch of block.channels) {
      for (const d of ch.daughters) {
        if (reported.has(d) || registry.has(d)) continue;
        if (stable.has(d) || stable.has(symbols.resolve(d))) continue;
        reported.add(d);
        findings.push({
          code: "UNRESOLVED_PARTICLE",
          severity: "info",
          particle: d,
          line: ch.line,
          message: `"${d}" has no decays defined and is not a known stable particle`,
        });
      }
    }
  }

  return findings;
}
