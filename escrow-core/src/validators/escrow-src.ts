import { Escrow, EscrowSettlement } from '../types/escrow';
import { Address, CallContext } from '../types/order';
import { EscrowStateMachine, PayoutRecipients } from './escrow-base';

/**
 * Source leg: the chain where the maker's funds are locked and the resolver
 * collects them by revealing the secret.
 *
 * | path    | token    | safety deposit                       |
 * |---------|----------|--------------------------------------|
 * | claim   | resolver | resolver                             |
 * | refund  | maker    | caller (or resolver, per config)     |
 */
export class SourceEscrow extends EscrowStateMachine {
  protected readonly side = 'source' as const;
  protected readonly timeoutOutcome = 'refunded' as const;
  protected readonly notClaimantCode = 'NOT_RESOLVER' as const;

  protected claimant(escrow: Escrow): Address {
    return escrow.resolver;
  }

  protected claimRecipients(escrow: Escrow): PayoutRecipients {
    return { token: escrow.resolver, deposit: escrow.resolver };
  }

  protected timeoutRecipients(escrow: Escrow, caller: Address): PayoutRecipients {
    const deposit = this.runtime.config.sourceRefundDepositRecipient === 'caller'
      ? caller
      : escrow.resolver;
    return { token: escrow.maker, deposit };
  }

  refund(ctx: CallContext, escrowId: string, now: number): EscrowSettlement {
    return this.expire(ctx, escrowId, now);
  }
}
