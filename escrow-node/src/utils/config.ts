import dotenv from 'dotenv';
import { validate } from 'node-cron';
import { DepositRecipientPolicy, EscrowConfig, ResolverPolicy } from '@hashlock-swap/escrow-core';
import { NodeConfig } from '../types';

dotenv.config();

export function loadConfig(env: NodeJS.ProcessEnv = process.env): NodeConfig {
  const config: NodeConfig = {
    port: parseInt(env.PORT || '3000'),
    apiSecret: env.API_SECRET || '',
    dbPath: env.DB_PATH || './hashlock-swap.db',
    allowMint: env.ALLOW_MINT === 'true',
    monitorSchedule: env.MONITOR_SCHEDULE || '*/30 * * * * *',
    alertWindowMs: parseInt(env.ALERT_WINDOW_MS || '300000'),
    escrow: loadEscrowOverrides(env)
  };

  validateConfig(config);
  return config;
}

function loadEscrowOverrides(env: NodeJS.ProcessEnv): Partial<EscrowConfig> {
  const escrow: Partial<EscrowConfig> = {};

  if (env.MIN_SAFETY_DEPOSIT) {
    escrow.minSafetyDeposit = parseUnsigned('MIN_SAFETY_DEPOSIT', env.MIN_SAFETY_DEPOSIT);
  }

  if (env.MIN_ORDER_DEPOSIT) {
    escrow.minOrderDeposit = parseUnsigned('MIN_ORDER_DEPOSIT', env.MIN_ORDER_DEPOSIT);
  }

  if (env.FINALITY_PERIOD_MS) {
    escrow.finalityPeriodMs = Number(parseUnsigned('FINALITY_PERIOD_MS', env.FINALITY_PERIOD_MS));
  }

  if (env.DEFAULT_TIMELOCK_MS) {
    escrow.defaultTimelockMs = Number(parseUnsigned('DEFAULT_TIMELOCK_MS', env.DEFAULT_TIMELOCK_MS));
  }

  if (env.NATIVE_ASSET) {
    escrow.nativeAsset = env.NATIVE_ASSET;
  }

  const recipient = env.SOURCE_REFUND_DEPOSIT_RECIPIENT;
  if (recipient) {
    if (!isDepositRecipientPolicy(recipient)) {
      throw new Error('SOURCE_REFUND_DEPOSIT_RECIPIENT must be "caller" or "resolver"');
    }
    escrow.sourceRefundDepositRecipient = recipient;
  }

  const policy = env.FUSION_RESOLVER_POLICY;
  if (policy) {
    if (!isResolverPolicy(policy)) {
      throw new Error('FUSION_RESOLVER_POLICY must be "designated" or "open"');
    }
    escrow.fusionResolverPolicy = policy;
  }

  return escrow;
}

function parseUnsigned(name: string, value: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new Error(`${name} must be a non-negative integer`);
  }
  return BigInt(value);
}

function isDepositRecipientPolicy(value: string): value is DepositRecipientPolicy {
  return value === 'caller' || value === 'resolver';
}

function isResolverPolicy(value: string): value is ResolverPolicy {
  return value === 'designated' || value === 'open';
}

function validateConfig(config: NodeConfig): void {
  if (!config.apiSecret) {
    throw new Error('Missing required configuration: API_SECRET');
  }

  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    throw new Error('PORT must be between 1 and 65535');
  }

  if (!validate(config.monitorSchedule)) {
    throw new Error(`MONITOR_SCHEDULE is not a valid cron expression: ${config.monitorSchedule}`);
  }

  if (!Number.isInteger(config.alertWindowMs) || config.alertWindowMs < 1000) {
    throw new Error('ALERT_WINDOW_MS must be at least 1000ms');
  }
}
