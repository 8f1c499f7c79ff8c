/**
 * Coordinator configuration defaults and validation
 */

import { CONNECTION_CONFIG, RECONNECT_CONFIG } from '../PanelProtocol.mjs';
import { ConfigurationError } from '../errors.mjs';
import { abortableSleep } from './ReconnectScheduler.mjs';
import type {
  CoordinatorConfig,
  LogSink,
  PanelClientFactory,
  PanelConnectionConfig,
  SleepFunction,
} from '../types.mjs';

/**
 * Configuration with every default applied
 */
export interface ResolvedCoordinatorConfig {
  connection: Required<PanelConnectionConfig>;
  clientFactory: PanelClientFactory;
  reconnectDelays: readonly number[];
  maxReconnectAttempts: number;
  logger: LogSink;
  sleep: SleepFunction;
}

/**
 * Apply defaults and validate a coordinator configuration
 *
 * @throws ConfigurationError when a value is out of range
 */
export function resolveCoordinatorConfig(config: CoordinatorConfig): ResolvedCoordinatorConfig {
  const { connection } = config;

  if (!connection.host || connection.host.trim() === '') {
    throw new ConfigurationError('Panel host is required');
  }

  const port = connection.port ?? CONNECTION_CONFIG.DEFAULT_PORT;
  if (
    !Number.isInteger(port) ||
    port < CONNECTION_CONFIG.PORT_MIN ||
    port > CONNECTION_CONFIG.PORT_MAX
  ) {
    throw new ConfigurationError(`Invalid panel port: ${port}`);
  }

  const reconnectDelays = config.reconnectDelays ?? RECONNECT_CONFIG.DELAYS;
  if (reconnectDelays.length === 0) {
    throw new ConfigurationError('Reconnect delay schedule must not be empty');
  }
  const invalidDelay = reconnectDelays.find((delay) => !Number.isFinite(delay) || delay <= 0);
  if (invalidDelay !== undefined) {
    throw new ConfigurationError(`Invalid reconnect delay: ${invalidDelay}`);
  }

  const maxReconnectAttempts = config.maxReconnectAttempts ?? RECONNECT_CONFIG.MAX_ATTEMPTS;
  if (!Number.isInteger(maxReconnectAttempts) || maxReconnectAttempts < 1) {
    throw new ConfigurationError(`Invalid max reconnect attempts: ${maxReconnectAttempts}`);
  }

  return {
    connection: { ...connection, host: connection.host.trim(), port },
    clientFactory: config.clientFactory,
    reconnectDelays: [...reconnectDelays],
    maxReconnectAttempts,
    logger: config.logger ?? console,
    sleep: config.sleep ?? abortableSleep,
  };
}
