import type { DQProfile, PipelinePhase } from './types.js';

export const DEFAULT_THRESHOLDS: Record<PipelinePhase, number> = {
  pre_clean: 0.98,
  post_clean: 0.995,
};

type GateFacts = {
  phase: PipelinePhase;
  observedRate: number;
  threshold: number;
};

export type GateDecision = (GateFacts & { kind: 'pass' }) | (GateFacts & { kind: 'reject'; reason: string });

function formatRate(rate: number): string {
  return `${(rate * 100).toFixed(2)}%`;
}

export function evaluateGate(profile: DQProfile, threshold: number): GateDecision {
  const facts: GateFacts = {
    phase: profile.phase,
    observedRate: profile.conformity_rate,
    threshold,
  };
  if (profile.conformity_rate < threshold) {
    return {
      ...facts,
      kind: 'reject',
      reason: `conformity ${formatRate(profile.conformity_rate)} below ${formatRate(threshold)} (${profile.phase})`,
    };
  }
  return { ...facts, kind: 'pass' };
}
