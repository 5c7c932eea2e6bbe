import { getAddress, isAddress, isHexString } from 'ethers';
import {
  CreateEscrowRequest,
  CreateOrderRequest,
  EscrowRole,
  isHashlock,
  OrderCreationData
} from '@hashlock-swap/escrow-core';
import { ValidationResult } from '../types';

export interface MintRequest {
  asset: string;
  amount: bigint;
}

export interface DeriveRequest {
  order: OrderCreationData;
  role: EscrowRole;
}

const ROLES: readonly EscrowRole[] = ['source', 'destination', 'fusion'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRole(value: unknown): value is EscrowRole {
  return ROLES.some((role) => role === value);
}

/**
 * Reads typed fields out of an untrusted JSON body. Failures are collected
 * rather than thrown so a caller sees every problem at once.
 */
class FieldReader {
  constructor(
    private readonly body: Record<string, unknown>,
    readonly errors: string[] = [],
    private readonly prefix = ''
  ) {}

  nested(field: string): FieldReader {
    const value = this.body[field];
    if (!isRecord(value)) {
      this.fail(field, 'must be an object');
      return new FieldReader({}, [], this.path(field));
    }
    return new FieldReader(value, this.errors, `${this.path(field)}.`);
  }

  address(field: string): string {
    const value = this.body[field];
    if (typeof value === 'string' && isAddress(value)) {
      return getAddress(value);
    }
    this.fail(field, 'must be a 20-byte hex address');
    return '';
  }

  amount(field: string): bigint {
    const value = this.body[field];
    if (typeof value === 'string' && /^\d+$/.test(value)) {
      return BigInt(value);
    }
    if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
      return BigInt(value);
    }
    this.fail(field, 'must be a non-negative integer amount');
    return 0n;
  }

  optionalAmount(field: string): bigint | undefined {
    return this.body[field] === undefined ? undefined : this.amount(field);
  }

  timestamp(field: string): number {
    const value = this.body[field];
    const parsed = typeof value === 'string' && /^\d+$/.test(value) ? Number(value) : value;
    if (typeof parsed === 'number' && Number.isSafeInteger(parsed) && parsed >= 0) {
      return parsed;
    }
    this.fail(field, 'must be a non-negative integer in milliseconds');
    return 0;
  }

  optionalTimestamp(field: string): number | undefined {
    return this.body[field] === undefined ? undefined : this.timestamp(field);
  }

  hashlock(field: string): string {
    const value = this.body[field];
    if (typeof value === 'string' && isHashlock(value)) {
      return value;
    }
    this.fail(field, 'must be a 32-byte hex hashlock');
    return '';
  }

  hexBytes(field: string, fallback?: string): string {
    const value = this.body[field] ?? fallback;
    if (typeof value === 'string' && isHexString(value, true)) {
      return value;
    }
    this.fail(field, 'must be 0x-prefixed hex bytes');
    return '0x';
  }

  /** Non-empty string taken exactly as sent. */
  raw(field: string): string {
    const value = this.body[field];
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
    this.fail(field, 'is required');
    return '';
  }

  text(field: string): string {
    const value = this.body[field];
    if (typeof value === 'string' && value.trim().length > 0) {
      return value.trim();
    }
    this.fail(field, 'is required');
    return '';
  }

  role(field: string): EscrowRole {
    const value = this.body[field] ?? 'source';
    if (isRole(value)) {
      return value;
    }
    this.fail(field, `must be one of ${ROLES.join(', ')}`);
    return 'source';
  }

  result<T>(value: T): ValidationResult<T> {
    if (this.errors.length > 0) {
      return { valid: false, errors: this.errors };
    }
    return { valid: true, value, errors: [] };
  }

  private path(field: string): string {
    return `${this.prefix}${field}`;
  }

  private fail(field: string, message: string): void {
    this.errors.push(`${this.path(field)} ${message}`);
  }
}

/** Shape checks for request bodies. Protocol rules stay in the ledger. */
export class RequestValidator {
  validateEscrowRequest(body: unknown): ValidationResult<CreateEscrowRequest> {
    const reader = this.reader(body);
    const order = this.readOrder(reader.nested('order'));

    return reader.result({
      order,
      tokenAsset: reader.text('tokenAsset'),
      tokenAmount: reader.optionalAmount('tokenAmount'),
      safetyDeposit: reader.amount('safetyDeposit'),
      timelockDuration: reader.optionalTimestamp('timelockDuration')
    });
  }

  validateClaim(body: unknown): ValidationResult<{ secret: string }> {
    const reader = this.reader(body);
    return reader.result({ secret: reader.raw('secret') });
  }

  validateOrderRequest(body: unknown): ValidationResult<CreateOrderRequest> {
    const reader = this.reader(body);

    return reader.result({
      resolver: reader.address('resolver'),
      targetAsset: reader.text('targetAsset'),
      minOutput: reader.amount('minOutput'),
      routeData: reader.hexBytes('routeData', '0x'),
      expiry: reader.timestamp('expiry'),
      deposit: reader.amount('deposit')
    });
  }

  validateResolve(body: unknown): ValidationResult<{ proceeds: bigint }> {
    const reader = this.reader(body);
    return reader.result({ proceeds: reader.amount('proceeds') });
  }

  validateMint(body: unknown): ValidationResult<MintRequest> {
    const reader = this.reader(body);
    return reader.result({ asset: reader.text('asset'), amount: reader.amount('amount') });
  }

  validateDerive(body: unknown): ValidationResult<DeriveRequest> {
    const reader = this.reader(body);
    const order = this.readOrder(reader.nested('order'));

    return reader.result({ order, role: reader.role('role') });
  }

  isValidAddress(value: string): boolean {
    return isAddress(value);
  }

  private reader(body: unknown): FieldReader {
    if (isRecord(body)) {
      return new FieldReader(body);
    }
    const reader = new FieldReader({});
    reader.errors.push('Request body must be a JSON object');
    return reader;
  }

  private readOrder(reader: FieldReader): OrderCreationData {
    return {
      maker: reader.address('maker'),
      resolver: reader.address('resolver'),
      value: reader.amount('value'),
      expiry: reader.timestamp('expiry'),
      hashlock: reader.hashlock('hashlock'),
      nonce: reader.amount('nonce')
    };
  }
}
