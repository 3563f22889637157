/**
 * PackageTools - the external programs an install needs: git to fetch a
 * repository and npm to install a package's runtime dependencies.
 */

import { execFile as execFile0 } from "node:child_process";
import { promisify } from "node:util";
import { getLogger } from "@drover/core";
import { ErrCommandFailed } from "../errors/errors.js";

const execFile = promisify(execFile0);

const log = getLogger("platform:package-tools");

export interface PackageTools {
  /** Shallow clone of `url` into `destination`, which must not exist yet */
  clone(url: string, destination: string): Promise<void>;
  /** Install the runtime dependencies of the package in `directory` */
  installDependencies(directory: string): Promise<void>;
}

export interface NodePackageToolsOptions {
  gitTimeoutMs?: number;
  npmTimeoutMs?: number;
}

export class NodePackageTools implements PackageTools {
  private readonly gitTimeoutMs: number;
  private readonly npmTimeoutMs: number;

  constructor(opts: NodePackageToolsOptions = {}) {
    this.gitTimeoutMs = opts.gitTimeoutMs ?? 120_000;
    this.npmTimeoutMs = opts.npmTimeoutMs ?? 300_000;
  }

  async clone(url: string, destination: string): Promise<void> {
    await run("git", ["clone", "--depth", "1", url, destination], { timeout: this.gitTimeoutMs });
  }

  async installDependencies(directory: string): Promise<void> {
    await run("npm", ["install", "--omit=dev", "--no-audit", "--no-fund"], {
      cwd: directory,
      timeout: this.npmTimeoutMs,
    });
  }
}

async function run(file: string, args: string[], opts: { cwd?: string; timeout: number }): Promise<void> {
  const command = `${file} ${args[0] ?? ""}`.trim();
  log.debug("running %s %o", file, args);
  try {
    await execFile(file, args, { cwd: opts.cwd, timeout: opts.timeout });
  } catch (err) {
    const stderr = Reflect.get(Object(err), "stderr");
    if (typeof stderr === "string" && stderr) log.debug("%s stderr: %s", command, stderr);
    const code = Reflect.get(Object(err), "code");
    throw ErrCommandFailed.create({ command, exitCode: typeof code === "number" ? code : null });
  }
}
