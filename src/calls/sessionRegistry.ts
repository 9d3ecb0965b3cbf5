import { SessionConflictError } from '../errors';
import type { CallId } from './types';

/** Process-wide call id -> owner map; insert-if-absent and compare-and-delete only. */
export class SessionRegistry<T> {
  private readonly entries = new Map<CallId, T>();

  public claim(callId: CallId, owner: T): void {
    if (this.entries.has(callId)) {
      throw new SessionConflictError(callId);
    }
    this.entries.set(callId, owner);
  }

  public release(callId: CallId, owner: T): boolean {
    if (this.entries.get(callId) !== owner) {
      return false;
    }
    this.entries.delete(callId);
    return true;
  }

  public get(callId: CallId): T | undefined {
    return this.entries.get(callId);
  }

  public has(callId: CallId): boolean {
    return this.entries.has(callId);
  }

  public get size(): number {
    return this.entries.size;
  }
}
