/**
 * ATS Panel Bridge Constants
 *
 * Entity kinds, arm modes, connection defaults and the reconnection
 * schedule shared by the coordinator modules.
 */

import type { ArmMode, CoordinatorState, EntityKind } from './types.mjs';

/**
 * Entity kinds in the order they are logged and populated
 */
export const ENTITY_KINDS = ['area', 'zone', 'output', 'trigger'] as const satisfies readonly EntityKind[];

/**
 * Arm modes accepted by armArea
 */
export const ARM_MODES = ['full', 'part1', 'part2'] as const satisfies readonly ArmMode[];

/**
 * Coordinator States
 */
export const COORDINATOR_STATES = {
  DISCONNECTED: 'disconnected',
  CONNECTING: 'connecting',
  INITIALIZING: 'initializing',
  CONNECTED: 'connected',
  ERROR_DETECTED: 'error_detected',
  RECONNECTING: 'reconnecting',
} as const satisfies Record<string, CoordinatorState>;

/**
 * Connection Configuration
 */
export const CONNECTION_CONFIG = {
  DEFAULT_PORT: 32000,
  PORT_MIN: 1,
  PORT_MAX: 65535,
} as const;

/**
 * Reconnection Configuration
 */
export const RECONNECT_CONFIG = {
  // 5s, 10s, 20s, 40s, 60s, then 120s for every later attempt
  DELAYS: [5000, 10000, 20000, 40000, 60000, 120000],
  MAX_ATTEMPTS: 20,
} as const;

/**
 * Text used when an entity has no state record yet
 */
export const UNKNOWN_STATE_TEXT = 'unknown';

/**
 * Helper function to validate an arm mode received at runtime
 */
export function isArmMode(value: string): value is ArmMode {
  return (ARM_MODES as readonly string[]).includes(value);
}
