/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createIntentRoutes } from "./intents.js";
export { createExecutionRoutes } from "./executions.js";
export { createTreasuryRoutes } from "./treasury.js";
export { createConfigRoutes } from "./config.js";
export { createStatsRoutes } from "./stats.js";
export { createEventRoutes } from "./events.js";
