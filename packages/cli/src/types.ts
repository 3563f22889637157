export type CliResponse = {
  stdout?: string;
  stderr?: string;
  exitCode: number;
};

export type CliRequest = {
  argv: readonly string[];
  color?: boolean;
};
