/**
 * In-memory remote store for testing
 * Records every call and can be told to fail selected operations
 */

import { RemoteStoreError } from '../profile-store/errors';
import { sortKeys } from './keys';
import type { RemoteStore, RemoteStoreCall, RemoteStoreOperation } from './types';

/**
 * Failure injection rule
 */
export interface FailureRule {
  operation: RemoteStoreOperation;
  /** Only fail calls whose store name matches */
  name?: string | RegExp;
  /** Number of calls to fail, Infinity for all */
  times?: number;
  message?: string;
}

interface ActiveRule extends FailureRule {
  remaining: number;
}

export class InMemoryRemoteStore implements RemoteStore {
  private stores = new Map<string, Map<string, string>>();
  private rules: ActiveRule[] = [];
  private callLog: RemoteStoreCall[] = [];

  async get(name: string, key: string): Promise<string | undefined> {
    this.record('get', name, key);
    return this.stores.get(name)?.get(key);
  }

  async put(name: string, key: string, value: string): Promise<void> {
    this.record('put', name, key);

    let store = this.stores.get(name);
    if (!store) {
      store = new Map();
      this.stores.set(name, store);
    }
    store.set(key, value);
  }

  async listSorted(name: string, descending: boolean, pageSize: number): Promise<string[]> {
    this.record('listSorted', name);
    const store = this.stores.get(name);
    if (!store) {
      return [];
    }
    return sortKeys(store.keys(), descending, pageSize);
  }

  /**
   * Make matching calls reject with a RemoteStoreError
   */
  failOn(rule: FailureRule): void {
    this.rules.push({ ...rule, remaining: rule.times ?? 1 });
  }

  /**
   * Remove all failure rules
   */
  clearFailures(): void {
    this.rules = [];
  }

  /**
   * Recorded calls, optionally filtered by operation
   */
  getCalls(operation?: RemoteStoreOperation): RemoteStoreCall[] {
    if (!operation) {
      return [...this.callLog];
    }
    return this.callLog.filter(call => call.operation === operation);
  }

  clearCalls(): void {
    this.callLog = [];
  }

  /**
   * Read a value without recording the call (for assertions)
   */
  peek(name: string, key: string): string | undefined {
    return this.stores.get(name)?.get(key);
  }

  /**
   * All keys under a store name, in insertion order (for assertions)
   */
  keys(name: string): string[] {
    return Array.from(this.stores.get(name)?.keys() ?? []);
  }

  /**
   * Clear all data, rules and recorded calls
   */
  clear(): void {
    this.stores.clear();
    this.rules = [];
    this.callLog = [];
  }

  private record(operation: RemoteStoreOperation, name: string, key?: string): void {
    this.callLog.push({ operation, name, key, timestamp: Date.now() });

    const rule = this.rules.find(r => r.remaining > 0 && r.operation === operation && this.matchesName(r, name));
    if (!rule) {
      return;
    }

    rule.remaining--;
    throw new RemoteStoreError(rule.message ?? `Injected ${operation} failure for ${name}`, {
      operation,
      name,
      key,
    });
  }

  private matchesName(rule: FailureRule, name: string): boolean {
    if (rule.name === undefined) return true;
    if (typeof rule.name === 'string') return rule.name === name;
    return rule.name.test(name);
  }
}
