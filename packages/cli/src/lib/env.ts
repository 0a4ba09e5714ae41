/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { CliError } from "./errors.js";

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
    // Leave "~user" style references untouched
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the file store root directory
 * Priority: CLI option > MODELKV_ROOT env var > default "./data"
 */
export function resolveRoot(cliRoot?: string): string {
  const root = cliRoot ?? process.env.MODELKV_ROOT ?? "./data";
  return path.resolve(expandTilde(root));
}

/**
 * Resolve the model declarations file, if any
 * Priority: CLI option > MODELKV_SCHEMA env var
 */
export function resolveSchemaPath(cliSchema?: string): string | undefined {
  const schema = cliSchema ?? process.env.MODELKV_SCHEMA;
  return schema ? path.resolve(expandTilde(schema)) : undefined;
}

/**
 * Where the CLI keeps its data
 */
export type Backend = { kind: "file"; root: string } | { kind: "redis"; url: string };

/**
 * Pick the store backend
 * Priority: --root > --redis > MODELKV_REDIS_URL > MODELKV_ROOT > "./data"
 */
export function resolveBackend(options: { root?: string; redis?: string }): Backend {
  if (options.root !== undefined && options.redis !== undefined) {
    throw new CliError("Use either --root or --redis, not both");
  }
  if (options.root !== undefined) {
    return { kind: "file", root: resolveRoot(options.root) };
  }

  const url = options.redis ?? process.env.MODELKV_REDIS_URL;
  if (url) {
    return { kind: "redis", url };
  }
  return { kind: "file", root: resolveRoot() };
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.MODELKV_CLI_DEBUG === "1";
}
