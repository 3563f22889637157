/**
 * Decide whether terminal output should carry ANSI colour.
 *
 * NO_COLOR wins over everything, FORCE_COLOR over the terminal check, and CI
 * runners without a TTY get plain text.
 */

type Env = Readonly<Record<string, string | undefined>>;

export function useColor(
  env: Env = process.env,
  stream: { isTTY?: boolean } = process.stdout,
): boolean {
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== "") return false;
  if (env.FORCE_COLOR !== undefined) return env.FORCE_COLOR !== "0" && env.FORCE_COLOR !== "false";
  if (env.TERM === "dumb") return false;
  return stream.isTTY === true;
}
