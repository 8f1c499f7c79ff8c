/**
 * Connection - Public API
 *
 * Barrel exports for the coordinator and its reconnection machinery.
 */

export { PanelCoordinator } from './PanelCoordinator.mjs';

export {
  ReconnectScheduler,
  DEFAULT_BACKOFF_CONFIG,
  abortableSleep,
  type BackoffConfig,
  type ReconnectFn,
} from './ReconnectScheduler.mjs';

export {
  resolveCoordinatorConfig,
  type ResolvedCoordinatorConfig,
} from './CoordinatorConfig.mjs';
