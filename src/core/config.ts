/**
 * Engine configuration
 *
 * `.reel-search/config.json` is optional; whatever it sets is merged over
 * the schema defaults, nested objects included.
 *
 * @module
 */

import type { EngineConfig, EngineConfigInput } from "../types/index.js";
import { getConfigPath, readJsonFile } from "../utils/index.js";
import { EngineConfigSchema, validate } from "../utils/validation.js";
import { ValidationError, wrapError } from "./errors.js";

/**
 * Fills in defaults for a partial configuration
 *
 * @throws {ValidationError} When a value is out of range or of the wrong type
 */
export function resolveConfig(input: EngineConfigInput = {}): EngineConfig {
  return validate(EngineConfigSchema, input, "INVALID_CONFIG", "configuration");
}

/**
 * Reads the project's configuration file, or the defaults when there is none
 *
 * @throws {ValidationError} When the file is not valid JSON or fails validation
 */
export async function loadConfig(projectRoot?: string): Promise<EngineConfig> {
  const configPath = getConfigPath(projectRoot);

  let data: unknown;
  try {
    data = await readJsonFile(configPath);
  } catch (error) {
    throw new ValidationError("INVALID_CONFIG", `Could not read ${configPath}: ${wrapError(error).message}`);
  }

  return validate(EngineConfigSchema, data ?? {}, "INVALID_CONFIG", `configuration (${configPath})`);
}
