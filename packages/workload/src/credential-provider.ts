/**
 * CredentialProvider - short-lived credential access for workloads.
 *
 * Wraps a CredentialStore and caches each value for a TTL, so a workload that
 * asks repeatedly during one operation hits the backend once.
 */

import { StaticTypeCompanion } from "@drover/core";
import type { CredentialStore } from "./credential-store.js";

export interface CredentialHandle {
  readonly name: string;
  /** Current value; refetched from the store once the cached copy expires */
  get(): Promise<string>;
}

export interface CredentialProvider {
  get(name: string): CredentialHandle;

  /** Value if the store has it, undefined otherwise */
  lookup(name: string): Promise<string | undefined>;

  /** Drop cached values (one name, or all) */
  invalidate(name?: string): void;
}

export interface CredentialProviderOptions {
  /** Cache lifetime in milliseconds. Default 5 minutes */
  ttlMs?: number;
  now?: () => number;
}

const DEFAULT_TTL_MS = 5 * 60 * 1000;

interface CachedValue {
  value: string;
  expiresAt: number;
}

class CredentialProviderImpl implements CredentialProvider {
  private cache = new Map<string, CachedValue>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(private store: CredentialStore, opts: CredentialProviderOptions) {
    this.ttlMs = opts.ttlMs ?? DEFAULT_TTL_MS;
    this.now = opts.now ?? Date.now;
  }

  get(name: string): CredentialHandle {
    return { name, get: () => this.resolve(name) };
  }

  async lookup(name: string): Promise<string | undefined> {
    const cached = this.fresh(name);
    if (cached !== undefined) return cached;
    if (!(await this.store.has(name))) return undefined;
    return this.resolve(name);
  }

  invalidate(name?: string): void {
    if (name === undefined) this.cache.clear();
    else this.cache.delete(name);
  }

  private fresh(name: string): string | undefined {
    const cached = this.cache.get(name);
    return cached && this.now() < cached.expiresAt ? cached.value : undefined;
  }

  private async resolve(name: string): Promise<string> {
    const cached = this.fresh(name);
    if (cached !== undefined) return cached;
    const value = await this.store.get(name);
    this.cache.set(name, { value, expiresAt: this.now() + this.ttlMs });
    return value;
  }
}

export const CredentialProvider = StaticTypeCompanion({
  create(store: CredentialStore, opts?: CredentialProviderOptions): CredentialProvider {
    return new CredentialProviderImpl(store, opts ?? {});
  },
});
