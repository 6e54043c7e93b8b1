/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Logger } from "pino";
import type { ExplorerService } from "../services/explorer-service.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by the request-context middleware) */
    requestId: string;

    /** Logger bound to the request id */
    logger: Logger;

    /** Block, transaction and latest-blocks lookups */
    explorer: ExplorerService;
  };
}
