/**
 * State Management - Public API
 *
 * Barrel exports for the state store and listener registry.
 */

export {
  StateStore,
  EMPTY_PANEL_INFO,
  type EntityDescriptor,
  type EntityKind,
  type EntityStateMap,
  type PanelData,
  type PanelInfo,
} from './StateStore.mjs';

export {
  ListenerRegistry,
  type ChangeListener,
  type UnsubscribeFunction,
} from './ListenerRegistry.mjs';
