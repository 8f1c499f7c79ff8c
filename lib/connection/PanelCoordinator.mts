/**
 * Panel Coordinator - Facade
 *
 * Main entry point for talking to one ATS panel. It owns the session with
 * the protocol client, keeps the state store in sync with the push channel,
 * fans changes out to entity listeners and reconnects with backoff when an
 * established connection is lost.
 *
 * Hosts create one coordinator per configured panel and hand it to the
 * entity views that need it.
 */

import { COORDINATOR_STATES, UNKNOWN_STATE_TEXT, isArmMode } from '../PanelProtocol.mjs';
import { ConnectionFailedError, NotConnectedError, errorMessage } from '../errors.mjs';
import { StateStore } from '../state/StateStore.mjs';
import { ListenerRegistry } from '../state/ListenerRegistry.mjs';
import { PanelEventHandler } from '../messaging/PanelEventHandler.mjs';
import { describeState, toAlarmPanelState, type AlarmPanelState } from '../utils/StateSummaries.mjs';
import { createLogger, type ScopedLogger } from '../utils/Logger.mjs';
import { ReconnectScheduler } from './ReconnectScheduler.mjs';
import { resolveCoordinatorConfig, type ResolvedCoordinatorConfig } from './CoordinatorConfig.mjs';
import type {
  ArmMode,
  ChangeEvent,
  ChangeListener,
  CoordinatorConfig,
  CoordinatorState,
  EntityDescriptor,
  EntityKind,
  EntityStateMap,
  PanelClient,
  PanelClientHandlers,
  PanelData,
  PanelInfo,
  StateChangeCallback,
  UnsubscribeFunction,
} from '../types.mjs';

// ============================================================================
// PanelCoordinator Class
// ============================================================================

export class PanelCoordinator {
  private config: ResolvedCoordinatorConfig;

  // Modules
  private store: StateStore;
  private registry: ListenerRegistry;
  private eventHandler: PanelEventHandler;
  private reconnectScheduler: ReconnectScheduler;
  private logger: ScopedLogger;

  // Session
  private client: PanelClient | null = null;
  private unsubscribe: UnsubscribeFunction | null = null;
  private sessionLock: Promise<void> = Promise.resolve();
  /** Bumped by disconnect(); a queued connect from an older generation fails */
  private sessionGeneration: number = 0;

  // State
  private connected: boolean = false;
  private connectionState: CoordinatorState = COORDINATOR_STATES.DISCONNECTED;
  private forceArm: Map<number, boolean> = new Map();
  private onStateChange?: StateChangeCallback;

  constructor(config: CoordinatorConfig) {
    this.config = resolveCoordinatorConfig(config);
    const sink = this.config.logger;

    this.logger = createLogger('PanelCoordinator', sink);
    this.store = new StateStore();
    this.registry = new ListenerRegistry(sink);
    this.eventHandler = new PanelEventHandler(this.store, this.registry, sink);
    this.reconnectScheduler = new ReconnectScheduler(
      (signal) => this.reconnectSession(signal),
      {
        delays: this.config.reconnectDelays,
        maxAttempts: this.config.maxReconnectAttempts,
      },
      this.config.sleep,
      sink
    );
  }

  /**
   * Set callback for lifecycle transitions
   */
  setOnStateChange(callback: StateChangeCallback): void {
    this.onStateChange = callback;
  }

  // ===========================================================================
  // Public API - Lifecycle
  // ===========================================================================

  /**
   * Open a session, fetch the full state and start monitoring.
   * Cancels a pending reconnection; never retries on its own.
   *
   * @throws ConnectionFailedError when any step fails
   */
  async connect(): Promise<void> {
    const { host, port } = this.config.connection;

    this.reconnectScheduler.cancel();
    this.logger.log(`Connecting to panel at ${host}:${port}`);
    const generation = this.sessionGeneration;

    await this.withSessionLock(async () => {
      try {
        if (generation !== this.sessionGeneration) {
          throw new ConnectionFailedError('Failed to connect: Session was closed while connecting');
        }
        await this.teardown();
        await this.openSession();
      } catch (error) {
        this.logger.error(`Failed to connect to panel: ${errorMessage(error)}`);
        this.setState(COORDINATOR_STATES.DISCONNECTED);
        throw error;
      }
    });
  }

  /**
   * Stop monitoring and close the session. Safe to call in any state.
   */
  async disconnect(): Promise<void> {
    this.sessionGeneration += 1;
    this.reconnectScheduler.cancel();
    await this.teardown();
    this.setState(COORDINATOR_STATES.DISCONNECTED);
    this.logger.log('Disconnected from panel');
  }

  isConnected(): boolean {
    return this.connected;
  }

  get state(): CoordinatorState {
    return this.connectionState;
  }

  /**
   * Reconnection attempts since the last successful connect
   */
  get reconnectAttempts(): number {
    return this.reconnectScheduler.attempts;
  }

  isReconnecting(): boolean {
    return this.reconnectScheduler.isPending();
  }

  // ===========================================================================
  // Public API - Listeners
  // ===========================================================================

  registerListener(kind: EntityKind, entityNumber: number, callback: ChangeListener): UnsubscribeFunction {
    return this.registry.register(kind, entityNumber, callback);
  }

  registerGlobalListener(callback: ChangeListener): UnsubscribeFunction {
    return this.registry.registerGlobal(callback);
  }

  // ===========================================================================
  // Public API - Data Access
  // ===========================================================================

  getEntities(kind: EntityKind): readonly EntityDescriptor[] {
    return this.store.getEntities(kind);
  }

  getState<K extends EntityKind>(kind: K, entityNumber: number): EntityStateMap[K] | undefined {
    return this.store.getState(kind, entityNumber);
  }

  /**
   * Summary text of an entity's state, or 'unknown' before its first record
   */
  getStateText(kind: EntityKind, entityNumber: number): string {
    const record = this.store.getState(kind, entityNumber);
    return record ? describeState(kind, record) : UNKNOWN_STATE_TEXT;
  }

  getAlarmState(area: number): AlarmPanelState {
    return toAlarmPanelState(this.store.getState('area', area));
  }

  getPanelInfo(): Readonly<PanelInfo> {
    return this.store.getPanelInfo();
  }

  /**
   * Snapshot of the whole store
   *
   * @throws NotConnectedError while disconnected
   */
  getData(): PanelData {
    if (!this.connected) {
      throw new NotConnectedError();
    }
    return this.store.snapshot();
  }

  // ===========================================================================
  // Public API - Force Arm
  // ===========================================================================

  setForceArm(area: number, enabled: boolean): void {
    this.forceArm.set(area, enabled);
  }

  getForceArm(area: number): boolean {
    return this.forceArm.get(area) ?? false;
  }

  // ===========================================================================
  // Public API - Commands
  // ===========================================================================

  /**
   * Arm an area. The force flag comes from setForceArm.
   */
  async armArea(area: number, mode: ArmMode = 'full'): Promise<void> {
    if (!isArmMode(mode)) {
      throw new Error(`Invalid arm mode: ${String(mode)}`);
    }

    const force = this.getForceArm(area);
    await this.runCommand(`arm area ${area} (${mode}${force ? ', force' : ''})`, (client) =>
      client.armArea(area, mode, force)
    );
  }

  async disarmArea(area: number): Promise<void> {
    await this.runCommand(`disarm area ${area}`, (client) => client.disarmArea(area));
  }

  async inhibitZone(zone: number): Promise<void> {
    await this.runCommand(`inhibit zone ${zone}`, (client) => client.inhibitZone(zone));
  }

  async uninhibitZone(zone: number): Promise<void> {
    await this.runCommand(`uninhibit zone ${zone}`, (client) => client.uninhibitZone(zone));
  }

  async activateOutput(output: number): Promise<void> {
    await this.runCommand(`activate output ${output}`, (client) => client.activateOutput(output));
  }

  async deactivateOutput(output: number): Promise<void> {
    await this.runCommand(`deactivate output ${output}`, (client) => client.deactivateOutput(output));
  }

  async activateTrigger(trigger: number): Promise<void> {
    await this.runCommand(`activate trigger ${trigger}`, (client) => client.activateTrigger(trigger));
  }

  async deactivateTrigger(trigger: number): Promise<void> {
    await this.runCommand(`deactivate trigger ${trigger}`, (client) =>
      client.deactivateTrigger(trigger)
    );
  }

  // ===========================================================================
  // Session Handling
  // ===========================================================================

  /**
   * Create a fresh client and bring it to the connected state.
   * Callers hold the session lock.
   */
  private async openSession(): Promise<void> {
    const client = this.config.clientFactory(this.config.connection);
    this.client = client;

    try {
      this.setState(COORDINATOR_STATES.CONNECTING);
      await client.connect();
      this.assertCurrent(client);

      this.setState(COORDINATOR_STATES.INITIALIZING);
      const snapshot = await client.initialize();
      this.assertCurrent(client);

      this.eventHandler.populate(snapshot);
      this.unsubscribe = client.subscribe(this.createHandlers(client));
      this.connected = true;
      this.reconnectScheduler.reset();
      this.setState(COORDINATOR_STATES.CONNECTED);

      const panel = this.store.getPanelInfo();
      this.logger.log(
        `Connected to ${panel.name ?? 'panel'} (${panel.model ?? 'unknown model'}) ` +
          `firmware ${panel.firmwareVersion ?? 'unknown'}`
      );

      this.registry.notifyGlobal();
    } catch (error) {
      this.connected = false;
      if (this.client === client) {
        await this.teardown();
      }
      throw new ConnectionFailedError(`Failed to connect: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Reconnect action run by the scheduler after its backoff sleep
   */
  private async reconnectSession(signal: AbortSignal): Promise<void> {
    await this.withSessionLock(async () => {
      if (signal.aborted) return;

      await this.teardown();
      try {
        await this.openSession();
      } catch (error) {
        if (!signal.aborted) {
          this.setState(COORDINATOR_STATES.RECONNECTING);
        }
        throw error;
      }
    });

    if (!signal.aborted && !this.connected) {
      throw new NotConnectedError('Connection lost again during reconnection');
    }
  }

  /**
   * Unsubscribe and close the current session, logging any failure
   */
  private async teardown(): Promise<void> {
    const client = this.client;
    const unsubscribe = this.unsubscribe;

    this.client = null;
    this.unsubscribe = null;
    this.connected = false;

    if (unsubscribe) {
      try {
        unsubscribe();
      } catch (error) {
        this.logger.error(`Failed to stop panel monitor: ${errorMessage(error)}`);
      }
    }

    if (client) {
      try {
        await client.disconnect();
      } catch (error) {
        this.logger.error(`Error while closing panel session: ${errorMessage(error)}`);
      }
    }
  }

  private createHandlers(client: PanelClient): PanelClientHandlers {
    return {
      onInitialized: (snapshot) => {
        if (!this.isCurrent(client)) return;
        this.eventHandler.applyInitialization(snapshot);
      },
      onChange: <K extends EntityKind>(kind: K, event: ChangeEvent<K>) => {
        if (!this.isCurrent(client)) return;
        this.eventHandler.applyChange(kind, event);
      },
      onError: (error) => {
        this.logger.error(`Panel monitor error: ${error.message}`);
        this.handleConnectionLost(client);
      },
      onConnectionLost: () => {
        this.logger.warn('Panel connection lost detected');
        this.handleConnectionLost(client);
      },
    };
  }

  private handleConnectionLost(client: PanelClient): void {
    if (!this.isCurrent(client)) return;

    this.connected = false;
    this.setState(COORDINATOR_STATES.ERROR_DETECTED);
    this.reconnectScheduler.schedule();
    this.setState(COORDINATOR_STATES.RECONNECTING);
  }

  private isCurrent(client: PanelClient): boolean {
    return this.connected && this.client === client;
  }

  private assertCurrent(client: PanelClient): void {
    if (this.client !== client) {
      throw new Error('Session was closed while connecting');
    }
  }

  private async runCommand(
    description: string,
    command: (client: PanelClient) => Promise<void>
  ): Promise<void> {
    const client = this.requireConnection();

    try {
      await command(client);
    } catch (error) {
      this.logger.error(`Failed to ${description}: ${errorMessage(error)}`);
      throw error;
    }
  }

  private requireConnection(): PanelClient {
    if (!this.connected || !this.client) {
      throw new NotConnectedError();
    }
    return this.client;
  }

  private withSessionLock<T>(task: () => Promise<T>): Promise<T> {
    const run = this.sessionLock.then(task);
    this.sessionLock = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private setState(state: CoordinatorState): void {
    const previous = this.connectionState;
    if (previous === state) return;

    this.connectionState = state;
    try {
      this.onStateChange?.(state, previous);
    } catch (error) {
      this.logger.error(`Error in state change callback: ${errorMessage(error)}`);
    }
  }
}
