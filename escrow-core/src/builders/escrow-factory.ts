import { EscrowError } from '../errors';
import { CreateEscrowRequest, EscrowLedger } from '../ledger';
import { logger } from '../logger';
import { Escrow } from '../types/escrow';
import { Address, CallContext, OrderCreationData } from '../types/order';
import { toAddress } from '../utils/address';
import { deriveEscrowAddress } from '../utils/escrow-id';

export interface PredictedAddresses {
  source: Address;
  destination: Address;
}

/**
 * Gate in front of escrow creation. It decides who may create escrows and
 * leaves every protocol rule to the escrow modules.
 */
export class EscrowFactory {
  private creators = new Set<Address>();
  readonly owner: Address;

  constructor(
    private readonly ledger: EscrowLedger,
    owner: string,
    creators: readonly string[] = []
  ) {
    this.owner = toAddress(owner);
    for (const creator of creators) {
      this.creators.add(toAddress(creator));
    }
  }

  isAuthorized(address: string): boolean {
    return this.creators.has(toAddress(address));
  }

  listCreators(): Address[] {
    return [...this.creators];
  }

  authorize(ctx: CallContext, creator: string): void {
    this.assertOwner(ctx);
    this.creators.add(toAddress(creator));
    logger.info(`🔑 Escrow creator authorized: ${toAddress(creator)}`);
  }

  revoke(ctx: CallContext, creator: string): void {
    this.assertOwner(ctx);
    this.creators.delete(toAddress(creator));
    logger.info(`🔒 Escrow creator revoked: ${toAddress(creator)}`);
  }

  createSourceEscrow(ctx: CallContext, request: CreateEscrowRequest): Escrow {
    this.assertCreator(ctx);
    return this.ledger.createSourceEscrow(ctx, request);
  }

  createDestinationEscrow(ctx: CallContext, request: CreateEscrowRequest): Escrow {
    this.assertCreator(ctx);
    return this.ledger.createDestinationEscrow(ctx, request);
  }

  /** Addresses both legs will have once created from this order data. */
  predictAddresses(order: OrderCreationData): PredictedAddresses {
    return {
      source: deriveEscrowAddress(order, 'source'),
      destination: deriveEscrowAddress(order, 'destination')
    };
  }

  private assertOwner(ctx: CallContext): void {
    if (toAddress(ctx.sender) !== this.owner) {
      throw new EscrowError('NOT_FACTORY_OWNER', `${ctx.sender} does not own this factory`);
    }
  }

  private assertCreator(ctx: CallContext): void {
    if (!this.isAuthorized(ctx.sender)) {
      throw new EscrowError('UNAUTHORIZED_CREATOR', `${ctx.sender} may not create escrows`);
    }
  }
}
