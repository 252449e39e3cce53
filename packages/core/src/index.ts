/**
 * @graphfold/core
 *
 * Ambient services shared by every graphfold package:
 * - Configuration (env, config files, programmatic overrides)
 * - Scoped logging
 * - Runtime safety primitives (invariant, unreachable)
 */

export {
  config,
  defineConfig,
  envKeyToPath,
  loadConfigFromEnv,
  isDistancePolicy,
  DISTANCE_POLICIES,
  type DistancePolicy,
  type GraphConfig,
  type GraphfoldConfig,
} from "./config.js";

export {
  createLogger,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  type LogWriter,
} from "./logger.js";

export { invariant, unreachable } from "./safety.js";
