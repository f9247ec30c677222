/**
 * Tunables consumed by the multiplier engine
 */
export interface MultiplierSettings {
  maxUploadMultiplier: number;
  seedingMultiplier: number;
  rampUpSeconds: number;
  randomizationFactor: number;
  maxSimulatedSpeedMbps: number;
  globalRatioLimit: number;
  cooldownDurationMinutes: number;
}

/**
 * Outcome of one engine run for one announce
 */
export interface MultiplierDecision {
  multiplier: number;
  fakeUploadedBytes: number;
  seeding: boolean;
  inCooldown: boolean;
  enteringCooldown: boolean;
  /** Cooldown deadline the global state should hold after this decision */
  cooldownUntil: number;
  speedCapped: boolean;
  /** Aggregate ratio including this announce's contribution */
  prospectiveRatio: number;
}
