import * as path from "node:path";
import * as os from "node:os";
import { useColor } from "./util/use-color.js";

type Env = Readonly<Record<string, string | undefined>>;

export interface GlobalConfigOptions {
  homeDirectory?: string;
  databasePath?: string;
  registryPath?: string;
  workloadsDirectory?: string;
  stateDirectory?: string;
  /** Turns on every `drover:*` logger unless `debug` names its own namespaces */
  devMode?: boolean;
  useColor?: boolean;
  /** `debug` namespaces to enable, e.g. `drover:*` */
  debug?: string;
  cwd?: string;
  env?: Env;
}

export class GlobalConfig {
  readonly homeDirectory: string; // DROVER_HOME, else ~/.drover
  readonly databasePath: string;
  readonly registryPath: string; // installed workloads
  readonly workloadsDirectory: string; // git clones land here
  readonly stateDirectory: string; // workload-owned DeploymentState files
  readonly devMode: boolean;
  readonly useColor: boolean;
  readonly debug: string | undefined;
  readonly cwd: string;

  constructor(opts: GlobalConfigOptions = {}) {
    const env = opts.env ?? process.env;

    this.homeDirectory = opts.homeDirectory ?? env.DROVER_HOME ?? path.join(os.homedir(), ".drover");

    this.databasePath = opts.databasePath ?? path.join(this.homeDirectory, "deployments.db");
    this.registryPath = opts.registryPath ?? path.join(this.homeDirectory, "workloads.json");
    this.workloadsDirectory = opts.workloadsDirectory ?? path.join(this.homeDirectory, "workloads");
    this.stateDirectory = opts.stateDirectory ?? path.join(this.homeDirectory, "state");

    this.devMode = opts.devMode ?? (env.DROVER_DEV === "1" || env.DROVER_DEV === "true");

    this.useColor = opts.useColor ?? useColor(env);

    this.debug = opts.debug ?? env.DROVER_DEBUG;

    this.cwd = opts.cwd ?? process.cwd();
  }

  /** Namespaces handed to `debug` at startup; undefined leaves logging off */
  get logNamespaces(): string | undefined {
    return this.debug ?? (this.devMode ? "drover:*" : undefined);
  }
}
