/**
 * Listener Registry for ATS panel entities
 *
 * Tracks entity-scoped listeners keyed by (kind, number) plus global
 * "data changed" listeners, and runs the synchronous fan-out.
 */

import { createLogger, type ScopedLogger } from '../utils/Logger.mjs';
import type {
  ChangeListener,
  EntityKind,
  LogSink,
  UnsubscribeFunction,
} from '../types.mjs';

// Re-export types for module consumers
export type { ChangeListener, UnsubscribeFunction };

/**
 * One register call. Removal is by registration identity, so the same
 * callback registered twice needs two unregister calls.
 */
interface Registration {
  readonly callback: ChangeListener;
}

type RegistrationTables = { [K in EntityKind]: Map<number, Registration[]> };

// ============================================================================
// ListenerRegistry Class
// ============================================================================

export class ListenerRegistry {
  private listeners: RegistrationTables = {
    area: new Map(),
    zone: new Map(),
    output: new Map(),
    trigger: new Map(),
  };
  private globalListeners: Registration[] = [];
  private logger: ScopedLogger;

  constructor(sink?: LogSink) {
    this.logger = createLogger('ListenerRegistry', sink);
  }

  /**
   * Add a listener for a specific entity
   */
  register(kind: EntityKind, entityNumber: number, callback: ChangeListener): UnsubscribeFunction {
    const table = this.listeners[kind];
    const registration: Registration = { callback };

    const entityListeners = table.get(entityNumber);
    if (entityListeners) {
      entityListeners.push(registration);
    } else {
      table.set(entityNumber, [registration]);
    }
    this.logger.debug(`Added listener for ${kind} ${entityNumber}`);

    return () => {
      const current = table.get(entityNumber);
      if (!current) return;

      const index = current.indexOf(registration);
      if (index === -1) return;

      current.splice(index, 1);
      if (current.length === 0) {
        table.delete(entityNumber);
      }
    };
  }

  /**
   * Add a listener for every data change
   */
  registerGlobal(callback: ChangeListener): UnsubscribeFunction {
    const registration: Registration = { callback };
    this.globalListeners.push(registration);

    return () => {
      const index = this.globalListeners.indexOf(registration);
      if (index !== -1) {
        this.globalListeners.splice(index, 1);
      }
    };
  }

  /**
   * Invoke the listeners of one entity in registration order
   */
  notify(kind: EntityKind, entityNumber: number): void {
    const entityListeners = this.listeners[kind].get(entityNumber);
    if (!entityListeners) return;

    this.invokeAll([...entityListeners], `${kind} ${entityNumber}`);
  }

  /**
   * Invoke every global listener in registration order
   */
  notifyGlobal(): void {
    this.invokeAll([...this.globalListeners], 'global update');
  }

  private invokeAll(registrations: Registration[], target: string): void {
    registrations.forEach(({ callback }) => {
      try {
        callback();
      } catch (error) {
        this.logger.error(`Error in listener for ${target}:`, error);
      }
    });
  }
}
