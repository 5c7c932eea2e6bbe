import { Escrow, EscrowSettlement } from '../types/escrow';
import { Address, CallContext } from '../types/order';
import { EscrowStateMachine, PayoutRecipients } from './escrow-base';

/**
 * Destination leg: the resolver locks what the maker is owed. The maker
 * claims with the secret; if nobody does before the timelock, the resolver
 * takes everything back.
 *
 * | path   | token    | safety deposit |
 * |--------|----------|----------------|
 * | claim  | maker    | resolver       |
 * | slash  | resolver | resolver       |
 */
export class DestinationEscrow extends EscrowStateMachine {
  protected readonly side = 'destination' as const;
  protected readonly timeoutOutcome = 'slashed' as const;
  protected readonly notClaimantCode = 'NOT_MAKER' as const;

  protected claimant(escrow: Escrow): Address {
    return escrow.maker;
  }

  protected claimRecipients(escrow: Escrow): PayoutRecipients {
    return { token: escrow.maker, deposit: escrow.resolver };
  }

  protected timeoutRecipients(escrow: Escrow): PayoutRecipients {
    return { token: escrow.resolver, deposit: escrow.resolver };
  }

  slash(ctx: CallContext, escrowId: string, now: number): EscrowSettlement {
    return this.expire(ctx, escrowId, now);
  }
}
