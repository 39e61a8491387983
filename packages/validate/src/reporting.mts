/**
 * @module reporting
 * @description Opt-in logging of validation failures.
 * The validators never log on their own. When an application wants a record of
 * rejected values, it wraps the validators it cares about; the wrapper logs the
 * failure and rethrows the very same error, so control flow is unchanged.
 *
 * @example
 * ```typescript
 * import { loggerFactory } from '@onecheck/logger';
 * import { reportFailures, validate } from '@onecheck/validate';
 *
 * const { logger } = loggerFactory({ level: 'info' });
 * const reported = reportFailures(logger, { level: 'error' });
 *
 * const positive = reported(validate.positive);
 * positive(-1); // logs "validation failed" { validator: 'positive', err }, then throws
 * ```
 *
 * @category Observability
 * @since 2025-07-03
 */

import type { BaseLogger, LoggerLevels } from "@onecheck/logger";

import { isValidationError } from "@onecheck/errors";

export interface ReportFailuresOptions {
  /** Level the failure is logged at. Defaults to `warn`. */
  level?: LoggerLevels;
  /** Log message. Defaults to `validation failed`. */
  message?: string;
}

/**
 * Builds a wrapper that logs `ValidationError`s thrown by a validator before
 * rethrowing them. Other errors pass through without being logged.
 *
 * @param logger - Any logger with the standard level methods
 * @param options - Level and message of the log record
 * @returns A function wrapping a validator; the optional `name` overrides the
 * validator's function name in the log meta
 */
export const reportFailures = (
  logger: BaseLogger,
  options: ReportFailuresOptions = {},
) => {
  const { level = "warn", message = "validation failed" } = options;

  return <A extends unknown[]>(
      validator: (...args: A) => void,
      name: string = validator.name,
    ) =>
    (...args: A): void => {
      try {
        validator(...args);
      } catch (error) {
        if (isValidationError(error)) {
          logger[level](message, { validator: name, err: error });
        }
        throw error;
      }
    };
};
