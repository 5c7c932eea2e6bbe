export type DepositRecipientPolicy = 'caller' | 'resolver';
export type ResolverPolicy = 'designated' | 'open';

export interface EscrowConfig {
  /** Smallest native safety deposit an escrow may be created with. */
  minSafetyDeposit: bigint;
  /** Smallest native deposit a fusion order may be created with. */
  minOrderDeposit: bigint;
  /** Observation window after creation during which claims are refused. */
  finalityPeriodMs: number;
  /** Timelock duration used when a creation request does not name one. */
  defaultTimelockMs: number;
  /** Asset identifier of the native coin used for deposits. */
  nativeAsset: string;
  /** Who receives the source-side safety deposit on a timeout refund. */
  sourceRefundDepositRecipient: DepositRecipientPolicy;
  /** Whether only the named resolver, or anyone, may fill a fusion order. */
  fusionResolverPolicy: ResolverPolicy;
}

export const DEFAULT_ESCROW_CONFIG: Readonly<EscrowConfig> = Object.freeze({
  minSafetyDeposit: 1_000_000n,
  minOrderDeposit: 1_000_000n,
  finalityPeriodMs: 60 * 60 * 1000, // 1 hour
  defaultTimelockMs: 24 * 60 * 60 * 1000, // 24 hours
  nativeAsset: 'NATIVE',
  sourceRefundDepositRecipient: 'caller',
  fusionResolverPolicy: 'designated'
});

/**
 * Merge overrides onto the defaults and freeze the result.
 * Configuration is fixed for the lifetime of a ledger.
 */
export function resolveEscrowConfig(overrides: Partial<EscrowConfig> = {}): Readonly<EscrowConfig> {
  const config: EscrowConfig = { ...DEFAULT_ESCROW_CONFIG, ...overrides };

  validateEscrowConfig(config);
  return Object.freeze(config);
}

function validateEscrowConfig(config: EscrowConfig): void {
  if (config.minSafetyDeposit < 0n) {
    throw new Error('minSafetyDeposit must not be negative');
  }

  if (config.minOrderDeposit < 0n) {
    throw new Error('minOrderDeposit must not be negative');
  }

  if (!Number.isInteger(config.finalityPeriodMs) || config.finalityPeriodMs < 0) {
    throw new Error('finalityPeriodMs must be a non-negative integer');
  }

  if (!Number.isInteger(config.defaultTimelockMs) || config.defaultTimelockMs <= config.finalityPeriodMs) {
    throw new Error('defaultTimelockMs must be an integer greater than finalityPeriodMs');
  }

  if (!config.nativeAsset) {
    throw new Error('nativeAsset must be set');
  }

  if (!['caller', 'resolver'].includes(config.sourceRefundDepositRecipient)) {
    throw new Error(`Unknown sourceRefundDepositRecipient: ${config.sourceRefundDepositRecipient}`);
  }

  if (!['designated', 'open'].includes(config.fusionResolverPolicy)) {
    throw new Error(`Unknown fusionResolverPolicy: ${config.fusionResolverPolicy}`);
  }
}
