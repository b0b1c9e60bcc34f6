import { toError } from '@/core/errors.js';
import type { CostwardenError } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';

/** Sink for failures that must not be dropped silently. */
export interface ErrorReporter {
  report(error: CostwardenError): void | Promise<void>;
}

/** Reports at `error` level through the logger. */
export function createLoggingErrorReporter(logger: Logger): ErrorReporter {
  return {
    report(error: CostwardenError): void {
      logger.error(error.message, {
        component: 'error-reporter',
        code: error.code,
        ...error.context,
        cause: error.cause instanceof Error ? error.cause.message : undefined,
      });
    },
  };
}

/** Hand a failure to the reporter. A reporter that throws is logged, never rethrown. */
export async function reportFailure(
  reporter: ErrorReporter,
  failure: CostwardenError,
  logger: Logger,
  component: string,
): Promise<void> {
  try {
    await reporter.report(failure);
  } catch (error) {
    logger.error('Error reporter failed', {
      component,
      code: failure.code,
      error: toError(error).message,
    });
  }
}
