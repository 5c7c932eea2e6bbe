import { EscrowConfig, EscrowEventName, EscrowSide } from '@hashlock-swap/escrow-core';

export interface NodeConfig {
  port: number;
  apiSecret: string;
  dbPath: string;
  /** Enables POST /accounts/:address/mint. */
  allowMint: boolean;
  monitorSchedule: string;
  alertWindowMs: number;
  escrow: Partial<EscrowConfig>;
}

export interface ValidationFailure {
  valid: false;
  errors: string[];
}

export interface ValidationSuccess<T> {
  valid: true;
  value: T;
  errors: [];
}

export type ValidationResult<T> = ValidationSuccess<T> | ValidationFailure;

export interface ActivityRecord {
  sequence: number;
  event: EscrowEventName;
  subjectId: string;
  subjectAddress: string;
  maker: string;
  resolver: string;
  amount: string;
  payload: Record<string, unknown>;
  timestamp: number;
  recordedAt: number;
}

export interface ActivityFilter {
  subjectId?: string;
  event?: EscrowEventName;
  limit?: number;
}

export type DeadlineAlertType =
  | 'deadlineApproaching'
  | 'claimWindowOpened'
  | 'refundAvailable'
  | 'orderExpired';

export interface DeadlineAlert {
  subjectId: string;
  subjectAddress: string;
  kind: 'escrow' | 'order';
  side?: EscrowSide;
  alertType: DeadlineAlertType;
  deadline: number;
  currentTime: number;
  timeRemaining: number;
}

export interface NodeStatus {
  node: 'running' | 'stopped';
  liveEscrows: number;
  openOrders: number;
  journalEntries: number;
  upcomingDeadlines: number;
  config: {
    allowMint: boolean;
    alertWindowMs: number;
    nativeAsset: string;
    finalityPeriodMs: number;
    defaultTimelockMs: number;
    fusionResolverPolicy: string;
  };
}
