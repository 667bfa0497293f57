export { historyMiddleware } from "./history-middleware.js"
export { describeAction, loggingMiddleware } from "./logging-middleware.js"
export { createPersistenceMiddleware } from "./persistence-middleware.js"
export { scheduleMiddleware } from "./schedule-middleware.js"
export { startupMiddleware } from "./startup-middleware.js"
