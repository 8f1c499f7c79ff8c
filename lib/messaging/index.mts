/**
 * Messaging - Public API
 *
 * Barrel exports for push event handling.
 */

export {
  PanelEventHandler,
  type ChangeEvent,
  type PanelSnapshot,
} from './PanelEventHandler.mjs';
