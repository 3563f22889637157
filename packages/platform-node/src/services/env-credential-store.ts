import type { CredentialStore } from "@drover/workload";
import { ErrCredentialNotFound } from "@drover/workload";
import { ErrCredentialStoreReadOnly } from "../errors/errors.js";

type Env = Readonly<Record<string, string | undefined>>;

/** `azure-tenant-id` → `AZURE_TENANT_ID` */
export function credentialEnvName(name: string): string {
  return name.toUpperCase().replace(/-/g, "_");
}

/** Reads credentials from environment variables. Read-only */
export class EnvCredentialStore implements CredentialStore {
  constructor(private readonly env: Env = process.env) {}

  async get(name: string): Promise<string> {
    const value = this.env[credentialEnvName(name)];
    if (value === undefined) {
      throw ErrCredentialNotFound.create({ credential: name }, `env: ${credentialEnvName(name)}`);
    }
    return value;
  }

  async set(name: string): Promise<void> {
    throw ErrCredentialStoreReadOnly.create({ credential: name });
  }

  async has(name: string): Promise<boolean> {
    return this.env[credentialEnvName(name)] !== undefined;
  }

  async delete(name: string): Promise<void> {
    throw ErrCredentialStoreReadOnly.create({ credential: name });
  }

  /** Names of the variables that are set, in credential form */
  async keys(): Promise<string[]> {
    return Object.keys(this.env)
      .filter((key) => this.env[key] !== undefined)
      .map((key) => key.toLowerCase().replace(/_/g, "-"));
  }
}
