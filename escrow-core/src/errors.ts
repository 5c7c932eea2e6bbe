/**
 * Every way an escrow or order transition can be refused.
 *
 * A transition checks all of its conditions before it touches any balance or
 * store, so a thrown EscrowError always means nothing changed.
 */
export type EscrowErrorCode =
  | 'INSUFFICIENT_DEPOSIT'
  | 'ORDER_EXPIRED'
  | 'ORDER_NOT_EXPIRED'
  | 'NOT_RESOLVER'
  | 'NOT_MAKER'
  | 'INVALID_RESOLVER'
  | 'ALREADY_RESOLVED'
  | 'ALREADY_CLAIMED'
  | 'INVALID_SECRET'
  | 'INVALID_HASHLOCK'
  | 'TIMELOCKED'
  | 'TIMELOCK_NOT_EXPIRED'
  | 'FINALITY_LOCK_ACTIVE'
  | 'INVALID_TIMELOCK'
  | 'INSUFFICIENT_OUTPUT'
  | 'INSUFFICIENT_BALANCE'
  | 'ASSET_MISMATCH'
  | 'DUPLICATE_ESCROW'
  | 'WRONG_ESCROW_SIDE'
  | 'NOT_FOUND'
  | 'UNAUTHORIZED_CREATOR'
  | 'NOT_FACTORY_OWNER'
  | 'INVALID_ADDRESS'
  | 'INVALID_AMOUNT'
  | 'INVALID_ROUTE_DATA';

export class EscrowError extends Error {
  constructor(public readonly code: EscrowErrorCode, message: string) {
    super(message);
    this.name = 'EscrowError';
  }
}

export function isEscrowError(error: unknown, code?: EscrowErrorCode): error is EscrowError {
  return error instanceof EscrowError && (code === undefined || error.code === code);
}
