/**
 * Storage adapters for the cached access token
 */

import type {Storage} from '../types';

/**
 * In-memory storage (token lost when the process exits)
 */
export class MemoryStorage implements Storage {
  private store = new Map<string, string>();

  getItem(key: string): string | null {
    return this.store.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.store.set(key, value);
  }

  removeItem(key: string): void {
    this.store.delete(key);
  }
}
