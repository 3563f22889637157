/**
 * CredentialStore - platform-provided key-value storage for secrets.
 *
 * Workloads read credentials through CredentialProvider, not the store directly.
 * Nothing here is ever written to the deployment record store.
 */

import { ErrCredentialNotFound } from "./errors.js";

export interface CredentialStore {
  /** Retrieve a secret by name */
  get(name: string): Promise<string>;

  set(name: string, value: string): Promise<void>;

  has(name: string): Promise<boolean>;

  delete(name: string): Promise<void>;

  /** Credential names, never values */
  keys(): Promise<string[]>;
}

export class InMemoryCredentialStore implements CredentialStore {
  private store: Map<string, string>;

  constructor(initial?: Record<string, string>) {
    this.store = new Map(initial ? Object.entries(initial) : []);
  }

  async get(name: string): Promise<string> {
    const value = this.store.get(name);
    if (value === undefined) {
      throw ErrCredentialNotFound.create({ credential: name });
    }
    return value;
  }

  async set(name: string, value: string): Promise<void> {
    this.store.set(name, value);
  }

  async has(name: string): Promise<boolean> {
    return this.store.has(name);
  }

  async delete(name: string): Promise<void> {
    this.store.delete(name);
  }

  async keys(): Promise<string[]> {
    return [...this.store.keys()];
  }
}
