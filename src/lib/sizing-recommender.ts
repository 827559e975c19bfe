import type { InstanceNames, SizingRecommendation } from '@/types/profiling';

/** Size each vCPU for 80% utilization at peak */
const CPU_TARGET_UTILIZATION_PERCENT = 80;

/** 50% headroom over observed peak memory */
const MEMORY_HEADROOM = 1.5;

interface InstanceTier {
  label: string;
  matches: (vcpu: number, ramGB: number) => boolean;
  instances: InstanceNames;
}

/**
 * Evaluated top-down; first match wins. Order is significant:
 * 1 vCPU with 5 GB falls through to the catch-all, not a 1-vCPU tier.
 */
export const INSTANCE_TIERS: readonly InstanceTier[] = [
  {
    label: '1 vCPU / ≤1 GB',
    matches: (vcpu, ramGB) => vcpu === 1 && ramGB <= 1,
    instances: { aws: 't3.micro', gcp: 'e2-micro', azure: 'B1s' },
  },
  {
    label: '1 vCPU / ≤2 GB',
    matches: (vcpu, ramGB) => vcpu === 1 && ramGB <= 2,
    instances: { aws: 't3.small', gcp: 'e2-small', azure: 'B1ms' },
  },
  {
    label: '2 vCPU',
    matches: vcpu => vcpu === 2,
    instances: { aws: 't3.medium', gcp: 'e2-medium', azure: 'B2s' },
  },
  {
    label: 'larger',
    matches: () => true,
    instances: { aws: 't3.large+', gcp: 'e2-standard+', azure: 'B2ms+' },
  },
];

/** Round half up (2.5 → 3), independent of the platform's tie-breaking */
export function roundHalfUp(value: number): number {
  return Math.floor(value + 0.5);
}

/** Round to two decimals, half up, with an epsilon for binary representation error */
export function roundTo2(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

export function selectInstances(vcpu: number, ramGB: number): InstanceNames {
  for (const tier of INSTANCE_TIERS) {
    if (tier.matches(vcpu, ramGB)) {
      return { ...tier.instances };
    }
  }
  // Unreachable: the last tier matches everything
  throw new Error(`No instance tier for ${vcpu} vCPU / ${ramGB} GB`);
}

/**
 * Map observed peaks to a (vCPU, RAM) tier and per-provider instance names.
 *
 * @param peakCpuPercent - peak CPU, where 100 is one fully busy core
 * @param peakMemMB - peak resident memory in MB
 */
export function recommend(peakCpuPercent: number, peakMemMB: number): SizingRecommendation {
  const vcpu = Math.max(1, roundHalfUp(peakCpuPercent / CPU_TARGET_UTILIZATION_PERCENT));
  const ramGB = roundTo2((peakMemMB * MEMORY_HEADROOM) / 1024);

  return {
    vcpu,
    ramGB,
    instanceNames: selectInstances(vcpu, ramGB),
  };
}
