/**
 * Dev-only warnings
 */

import { logger } from './logger';

export function warnIf(condition: boolean, message: string): void {
  if (condition) {
    logger.warn(`[quiesce] ${message}`);
  }
}
