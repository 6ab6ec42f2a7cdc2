/**
 * Correlation IDs link the log entries written by a single CLI run.
 */

import { randomUUID } from 'node:crypto'

/**
 * Generate an 8-character correlation ID.
 *
 * @returns Short hex string (e.g., "a1b2c3d4")
 *
 * @example
 * ```typescript
 * const cid = createCorrelationId();
 * logger.info("Rendering transcript", { cid, file });
 * ```
 */
export function createCorrelationId(): string {
	return randomUUID().slice(0, 8)
}
