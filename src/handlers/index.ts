/**
 * Handler exports
 * Barrel file for WebSocket message handlers.
 */

export { createGuideHandlers, type GuideHandlerDeps, type GuideHandlers } from "./guideHandlers";
