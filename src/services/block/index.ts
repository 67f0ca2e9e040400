export { BlockFetchService } from './block-fetch-service.js';
export type { BlockFetchServiceDependencies } from './block-fetch-service.js';
export {
  BlockInspectorService,
  InvalidBlockRangeError,
} from './block-inspector-service.js';
export type {
  BlockInspectorServiceDependencies,
  InspectBlockOptions,
  InspectedBlockResult,
  InspectRangeOptions,
  MonitorLiveOptions,
} from './block-inspector-service.js';
