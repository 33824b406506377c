/**
 * Global error handler returning OpenAI-format errors.
 * Routing failures never reach here (they are typed outcomes); this covers
 * invalid request bodies, configuration faults and anything unexpected.
 */

import type { ErrorHandler } from 'hono';
import { logger } from '../../shared/logger.js';
import { ConfigError, openAIError, RequestValidationError } from '../../shared/errors.js';

/**
 * Error mapping:
 * - RequestValidationError -> 400 invalid_request_error
 * - ConfigError -> 500 (no internal details exposed)
 * - Unknown -> 500
 */
export const errorHandler: ErrorHandler = (err, c) => {
  if (err instanceof RequestValidationError) {
    logger.debug({ details: err.details }, 'Rejected invalid request');
    return c.json(err.toOpenAIError(), 400);
  }

  if (err instanceof ConfigError) {
    logger.error({ err }, 'Configuration error');
    return c.json(openAIError('Internal configuration error', 'server_error', 'config_error'), 500);
  }

  logger.error({ err }, 'Unhandled error');
  return c.json(openAIError('Internal server error', 'server_error', null), 500);
};
