/**
 * Environment flags
 */

import type { EnvSource } from "#/core";
import { OCI_REMOTE_ENABLED } from "#/constants";
import { ConfigError } from "#/errors";

const TRUE_VALUES = new Set(["1", "t", "T", "TRUE", "true", "True"]);
const FALSE_VALUES = new Set(["0", "f", "F", "FALSE", "false", "False"]);

/**
 * Parse a boolean the way command line tools usually accept it.
 * Returns undefined for anything that is not a boolean.
 *
 * @example
 * parseBoolean("TRUE") → true
 * parseBoolean("0") → false
 * parseBoolean("yes") → undefined
 */
export function parseBoolean(value: string): boolean | undefined {
  if (TRUE_VALUES.has(value)) return true;
  if (FALSE_VALUES.has(value)) return false;
  return undefined;
}

/**
 * Whether the OCI remote loader is enabled. Unset or empty means enabled.
 *
 * @throws ConfigError when the variable holds something other than a boolean
 */
export function ociRemoteLoaderEnabled(env: EnvSource): boolean {
  const value = env[OCI_REMOTE_ENABLED];
  if (!value) {
    return true;
  }

  const enabled = parseBoolean(value);
  if (enabled === undefined) {
    throw new ConfigError(
      `${OCI_REMOTE_ENABLED} environment variable expects boolean value: invalid syntax ${JSON.stringify(value)}`
    );
  }

  return enabled;
}
