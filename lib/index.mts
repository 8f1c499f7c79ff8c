/**
 * ATS Panel Bridge Library - Public API
 *
 * This is the main entry point for the panel bridge library.
 * Import from here to access all public types and utilities.
 */

// =============================================================================
// Types (from central types.mts)
// =============================================================================
export type {
  // Configuration
  CoordinatorConfig,
  PanelConnectionConfig,
  LogSink,
  LoggerFunction,
  SleepFunction,
  // Connection
  CoordinatorState,
  StateChangeCallback,
  // Entities
  EntityKind,
  EntityDescriptor,
  EntityState,
  EntityStateMap,
  AreaState,
  ZoneState,
  OutputState,
  TriggerState,
  ArmMode,
  PanelInfo,
  PanelData,
  // Protocol client
  PanelClient,
  PanelClientFactory,
  PanelClientHandlers,
  PanelSnapshot,
  ChangeEvent,
  // Listeners
  ChangeListener,
  UnsubscribeFunction,
} from './types.mjs';

// =============================================================================
// Constants
// =============================================================================
export {
  ENTITY_KINDS,
  ARM_MODES,
  COORDINATOR_STATES,
  CONNECTION_CONFIG,
  RECONNECT_CONFIG,
  UNKNOWN_STATE_TEXT,
  isArmMode,
} from './PanelProtocol.mjs';

// =============================================================================
// Errors
// =============================================================================
export {
  ConnectionFailedError,
  NotConnectedError,
  ConfigurationError,
} from './errors.mjs';

// =============================================================================
// Utilities
// =============================================================================
export * from './utils/index.mjs';

// =============================================================================
// Connection
// =============================================================================
export * from './connection/index.mjs';

// =============================================================================
// State Management
// =============================================================================
export * from './state/index.mjs';

// =============================================================================
// Messaging
// =============================================================================
export * from './messaging/index.mjs';
