/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createBlockRoutes } from "./blocks.js";
export { createTransactionRoutes } from "./transactions.js";
export { createLatestBlocksRoutes } from "./latest-blocks.js";
