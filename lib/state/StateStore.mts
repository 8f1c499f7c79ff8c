/**
 * State Store for ATS panel entities
 *
 * Holds the entity descriptors, the latest state record of every entity and
 * the panel descriptor. Mutated only by the coordinator.
 */

import type {
  EntityDescriptor,
  EntityKind,
  EntityStateMap,
  PanelData,
  PanelInfo,
} from '../types.mjs';

// Re-export types for module consumers
export type { EntityDescriptor, EntityKind, EntityStateMap, PanelData, PanelInfo };

type EntityTables = { [K in EntityKind]: EntityDescriptor[] };
type StateTables = { [K in EntityKind]: Map<number, EntityStateMap[K]> };

export const EMPTY_PANEL_INFO: Readonly<PanelInfo> = {
  model: null,
  name: null,
  firmwareVersion: null,
  protocolVersion: null,
};

// ============================================================================
// StateStore Class
// ============================================================================

export class StateStore {
  private panelInfo: PanelInfo = { ...EMPTY_PANEL_INFO };
  private entities: EntityTables = { area: [], zone: [], output: [], trigger: [] };
  private states: StateTables = {
    area: new Map(),
    zone: new Map(),
    output: new Map(),
    trigger: new Map(),
  };

  /**
   * Replace the ordered descriptor list for a kind
   */
  setEntities(kind: EntityKind, descriptors: readonly EntityDescriptor[]): void {
    this.entities[kind] = descriptors.map((descriptor) => ({ ...descriptor }));
  }

  /**
   * Get the ordered descriptors for a kind (empty until initialized)
   */
  getEntities(kind: EntityKind): readonly EntityDescriptor[] {
    return this.entities[kind];
  }

  /**
   * Replace the record of one entity, creating the entry if absent
   */
  applyState<K extends EntityKind>(kind: K, entityNumber: number, record: EntityStateMap[K]): void {
    const table: Map<number, EntityStateMap[K]> = this.states[kind];
    table.set(entityNumber, record);
  }

  /**
   * Replace every record of a kind
   */
  replaceStates<K extends EntityKind>(
    kind: K,
    records: ReadonlyMap<number, EntityStateMap[K]>
  ): void {
    const table: Map<number, EntityStateMap[K]> = this.states[kind];
    table.clear();
    records.forEach((record, entityNumber) => {
      table.set(entityNumber, record);
    });
  }

  /**
   * Get the record of one entity, or undefined when none was received
   */
  getState<K extends EntityKind>(kind: K, entityNumber: number): EntityStateMap[K] | undefined {
    const table: Map<number, EntityStateMap[K]> = this.states[kind];
    return table.get(entityNumber);
  }

  setPanelInfo(info: PanelInfo): void {
    this.panelInfo = { ...info };
  }

  getPanelInfo(): Readonly<PanelInfo> {
    return this.panelInfo;
  }

  /**
   * Copy of everything the store holds
   */
  snapshot(): PanelData {
    return {
      panel: { ...this.panelInfo },
      entities: {
        area: [...this.entities.area],
        zone: [...this.entities.zone],
        output: [...this.entities.output],
        trigger: [...this.entities.trigger],
      },
      states: {
        area: new Map(this.states.area),
        zone: new Map(this.states.zone),
        output: new Map(this.states.output),
        trigger: new Map(this.states.trigger),
      },
    };
  }
}
