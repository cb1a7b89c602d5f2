/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // "~user" references are left untouched
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the database directory
 * Priority: CLI option > ORDTAB_PATH env var > default "./data"
 */
export function resolvePath(cliPath?: string): string {
  const dir = cliPath ?? process.env.ORDTAB_PATH ?? "./data";
  return path.resolve(expandTilde(dir));
}

/**
 * Check if timing metrics should be printed
 */
export function isVerbose(flag?: boolean): boolean {
  return flag === true || process.env.ORDTAB_CLI_DEBUG === "1";
}
