/**
 * Panel Event Handler
 *
 * Applies initialization and change events to the state store, then fans
 * the change out to listeners. The store is always written before any
 * listener runs, so a failing listener cannot leave the store stale.
 */

import { ENTITY_KINDS } from '../PanelProtocol.mjs';
import { StateStore } from '../state/StateStore.mjs';
import { ListenerRegistry } from '../state/ListenerRegistry.mjs';
import { describeState } from '../utils/StateSummaries.mjs';
import { createLogger, type ScopedLogger } from '../utils/Logger.mjs';
import type {
  ChangeEvent,
  EntityDescriptor,
  EntityKind,
  EntityStateMap,
  LogSink,
  PanelSnapshot,
} from '../types.mjs';

// Re-export types for module consumers
export type { ChangeEvent, PanelSnapshot };

type SnapshotTables = {
  [K in EntityKind]: {
    entities: EntityDescriptor[];
    states: Map<number, EntityStateMap[K]>;
  };
};

function snapshotTables(snapshot: PanelSnapshot): SnapshotTables {
  return {
    area: { entities: snapshot.areas, states: snapshot.areaStates },
    zone: { entities: snapshot.zones, states: snapshot.zoneStates },
    output: { entities: snapshot.outputs, states: snapshot.outputStates },
    trigger: { entities: snapshot.triggers, states: snapshot.triggerStates },
  };
}

// ============================================================================
// PanelEventHandler Class
// ============================================================================

export class PanelEventHandler {
  private store: StateStore;
  private registry: ListenerRegistry;
  private logger: ScopedLogger;

  constructor(store: StateStore, registry: ListenerRegistry, sink?: LogSink) {
    this.store = store;
    this.registry = registry;
    this.logger = createLogger('PanelEventHandler', sink);
  }

  /**
   * Bulk-populate every kind, then broadcast once
   */
  applyInitialization(snapshot: PanelSnapshot): void {
    this.populate(snapshot);
    this.registry.notifyGlobal();
  }

  /**
   * Bulk-populate every kind without notifying anyone
   */
  populate(snapshot: PanelSnapshot): void {
    const tables = snapshotTables(snapshot);

    this.store.setPanelInfo(snapshot.panel);
    ENTITY_KINDS.forEach((kind) => this.populateKind(kind, tables));

    this.logger.log(
      `Initialized: ${snapshot.zones.length} zones, ${snapshot.areas.length} areas, ` +
        `${snapshot.outputs.length} outputs, ${snapshot.triggers.length} triggers`
    );
  }

  /**
   * Replace one entity's record, then notify its listeners and the global ones
   */
  applyChange<K extends EntityKind>(kind: K, event: ChangeEvent<K>): void {
    this.logger.debug(
      `${kind} ${event.number} (${event.name}) changed: ` +
        `${event.previous ? describeState(kind, event.previous) : 'NEW'} -> ${describeState(kind, event.next)}`
    );

    this.store.applyState(kind, event.number, event.next);

    this.registry.notify(kind, event.number);
    this.registry.notifyGlobal();
  }

  private populateKind<K extends EntityKind>(kind: K, tables: SnapshotTables): void {
    const table: SnapshotTables[K] = tables[kind];
    this.store.setEntities(kind, table.entities);
    this.store.replaceStates(kind, table.states);
  }
}
