/**
 * Audio — The render engine boundary.
 */

export { OfflineEngine, OutputRoute } from './engine';
export type { RenderEngine, RouteSource, OfflineEngineOptions } from './engine';
