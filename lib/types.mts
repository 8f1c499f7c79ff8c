/**
 * ATS Panel Bridge - Shared TypeScript Interfaces
 *
 * This file contains all shared type definitions used across the library.
 * All modules should import types from here to avoid duplication.
 */

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Connection descriptor for a single panel
 */
export interface PanelConnectionConfig {
  /** Host name or IP address of the panel */
  host: string;
  /** TCP port of the panel (default: 32000) */
  port?: number;
  /** User PIN code used to log in */
  pinCode: string;
  /** Encryption key programmed on the panel */
  encryptionKey: string;
}

/**
 * Configuration for creating a PanelCoordinator
 */
export interface CoordinatorConfig {
  connection: PanelConnectionConfig;
  /** Creates a fresh protocol client for every session */
  clientFactory: PanelClientFactory;
  /** Backoff schedule in ms (default: 5s, 10s, 20s, 40s, 60s, 120s) */
  reconnectDelays?: readonly number[];
  /** Attempts after which the give-up notice is logged (default: 20) */
  maxReconnectAttempts?: number;
  /** Log sink (defaults to console) */
  logger?: LogSink;
  /** Abortable sleep used between reconnection attempts */
  sleep?: SleepFunction;
}

/** Logger function signature */
export type LoggerFunction = (...args: unknown[]) => void;

/**
 * Destination for log output. `console` satisfies this interface.
 */
export interface LogSink {
  debug: LoggerFunction;
  log: LoggerFunction;
  warn: LoggerFunction;
  error: LoggerFunction;
}

/** Sleep that rejects when the signal is aborted */
export type SleepFunction = (ms: number, signal: AbortSignal) => Promise<void>;

// =============================================================================
// Connection Types
// =============================================================================

/**
 * Coordinator lifecycle states
 */
export type CoordinatorState =
  | 'disconnected'
  | 'connecting'
  | 'initializing'
  | 'connected'
  | 'error_detected'
  | 'reconnecting';

/**
 * Callback for lifecycle transitions
 */
export type StateChangeCallback = (
  state: CoordinatorState,
  previous: CoordinatorState
) => void;

// =============================================================================
// Entity Types
// =============================================================================

/**
 * Area, zone, output or trigger as reported by the panel
 */
export interface EntityDescriptor {
  number: number;
  name: string;
}

/**
 * Zone state flags
 */
export interface ZoneState {
  isActive: boolean;
  isTampered: boolean;
  hasFault: boolean;
  isAlarming: boolean;
  isIsolated: boolean;
  isInhibited: boolean;
  isSet: boolean;
  isAntiMask: boolean;
  isInSoakTest: boolean;
  hasBatteryFault: boolean;
  isDirty: boolean;
}

/**
 * Area state flags
 */
export interface AreaState {
  isUnset: boolean;
  isFullSet: boolean;
  isPartiallySet: boolean;
  isPartiallySet2: boolean;
  isAlarming: boolean;
  isAlarmAcknowledged: boolean;
  isTampered: boolean;
  isReadyToArm: boolean;
  isExiting: boolean;
  isEntering: boolean;
  hasFire: boolean;
  hasPanic: boolean;
  hasMedical: boolean;
  hasDuress: boolean;
  hasTechnical: boolean;
  hasActiveZones: boolean;
  hasInhibitedZones: boolean;
  hasIsolatedZones: boolean;
  hasZoneFaults: boolean;
  hasZoneTamper: boolean;
  isBuzzerActive: boolean;
  isInternalSiren: boolean;
  isExternalSiren: boolean;
  isStrobeActive: boolean;
}

/**
 * Output state flags
 */
export interface OutputState {
  isOn: boolean;
  isActive: boolean;
  isForced: boolean;
}

/**
 * Trigger state flags
 */
export interface TriggerState {
  isActive: boolean;
  isRemoteOutput: boolean;
  isFob: boolean;
  isSchedule: boolean;
  isFunctionKey: boolean;
}

/**
 * State record type per entity kind
 */
export interface EntityStateMap {
  area: AreaState;
  zone: ZoneState;
  output: OutputState;
  trigger: TriggerState;
}

export type EntityKind = keyof EntityStateMap;

/** Any state record */
export type EntityState = EntityStateMap[EntityKind];

/**
 * Arm modes accepted by the panel
 */
export type ArmMode = 'full' | 'part1' | 'part2';

/**
 * Panel identification, set once per connection
 */
export interface PanelInfo {
  model: string | null;
  name: string | null;
  firmwareVersion: string | null;
  protocolVersion: number | null;
}

// =============================================================================
// Protocol Client Types
// =============================================================================

/**
 * Result of the full-state fetch
 */
export interface PanelSnapshot {
  panel: PanelInfo;
  areas: EntityDescriptor[];
  zones: EntityDescriptor[];
  outputs: EntityDescriptor[];
  triggers: EntityDescriptor[];
  areaStates: Map<number, AreaState>;
  zoneStates: Map<number, ZoneState>;
  outputStates: Map<number, OutputState>;
  triggerStates: Map<number, TriggerState>;
}

/**
 * Change notification for a single entity
 */
export interface ChangeEvent<K extends EntityKind = EntityKind> {
  number: number;
  name: string;
  previous?: EntityStateMap[K];
  next: EntityStateMap[K];
}

/**
 * Handlers installed on the client's push channel
 */
export interface PanelClientHandlers {
  onInitialized(snapshot: PanelSnapshot): void;
  onChange<K extends EntityKind>(kind: K, event: ChangeEvent<K>): void;
  /** Monitor error; the session is considered lost */
  onError(error: Error): void;
  /** Keep-alive failure detected by the client */
  onConnectionLost(): void;
}

/**
 * Asynchronous RPC contract of the protocol client
 */
export interface PanelClient {
  /** Open the session and authenticate */
  connect(): Promise<void>;
  /** Fetch all descriptors and current states */
  initialize(): Promise<PanelSnapshot>;
  /** Close the session; must not reject for an already closed session */
  disconnect(): Promise<void>;
  subscribe(handlers: PanelClientHandlers): UnsubscribeFunction;

  armArea(area: number, mode: ArmMode, force: boolean): Promise<void>;
  disarmArea(area: number): Promise<void>;
  inhibitZone(zone: number): Promise<void>;
  uninhibitZone(zone: number): Promise<void>;
  activateOutput(output: number): Promise<void>;
  deactivateOutput(output: number): Promise<void>;
  activateTrigger(trigger: number): Promise<void>;
  deactivateTrigger(trigger: number): Promise<void>;
}

export type PanelClientFactory = (connection: PanelConnectionConfig) => PanelClient;

// =============================================================================
// Data Snapshot Types
// =============================================================================

/**
 * Read-only view of everything the store holds
 */
export interface PanelData {
  panel: PanelInfo;
  entities: { readonly [K in EntityKind]: readonly EntityDescriptor[] };
  states: { readonly [K in EntityKind]: ReadonlyMap<number, EntityStateMap[K]> };
}

// =============================================================================
// Listener Types
// =============================================================================

/**
 * Unsubscribe function returned when adding listeners
 */
export type UnsubscribeFunction = () => void;

/**
 * Entity or global change listener
 */
export type ChangeListener = () => void;
