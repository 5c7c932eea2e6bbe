import { hexlify, randomBytes } from 'ethers';
import { EscrowError } from '../errors';

export function newObjectId(): string {
  return hexlify(randomBytes(32));
}

/**
 * Keyed storage for owned ledger objects. Terminal transitions `take` the
 * object, removing it, so a second transition on the same id finds nothing.
 */
export class ObjectStore<T extends { readonly id: string }> {
  private objects = new Map<string, T>();

  constructor(private readonly kind: string) {}

  insert(object: T): void {
    if (this.objects.has(object.id)) {
      throw new Error(`${this.kind} ${object.id} already exists`);
    }
    this.objects.set(object.id, object);
  }

  has(id: string): boolean {
    return this.objects.has(id);
  }

  find(id: string): T | undefined {
    return this.objects.get(id);
  }

  borrow(id: string): T {
    const object = this.objects.get(id);
    if (!object) {
      throw new EscrowError('NOT_FOUND', `${this.kind} not found: ${id}`);
    }
    return object;
  }

  take(id: string): T {
    const object = this.borrow(id);
    this.objects.delete(id);
    return object;
  }

  values(): T[] {
    return [...this.objects.values()];
  }
}
