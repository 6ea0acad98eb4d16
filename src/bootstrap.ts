import type { AppError } from "./core/errors/app-error.js";
import type { Logger } from "./core/ports/logger.js";
import { flatMap, map, type Result } from "./core/types/result.js";
import { loadConfig, toFormatterOptions } from "./infrastructure/config/config.js";
import { formatterFromOptions } from "./infrastructure/formatting/formatter.js";
import { createLogger } from "./infrastructure/logging/logger.js";

/**
 * Bootstrap: environment → validated config → formatter → logger.
 * Fails with a VALIDATION error instead of exiting, so the host decides.
 */
export const createLoggerFromEnv = (env: NodeJS.ProcessEnv = process.env): Result<Logger, AppError> =>
  flatMap(loadConfig(env), (config) =>
    map(formatterFromOptions(toFormatterOptions(config.log)), (formatter) =>
      createLogger({ formatter, level: config.log.level }),
    ),
  );
