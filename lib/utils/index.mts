/**
 * Utilities barrel export
 */

export {
  describeAreaState,
  describeZoneState,
  describeOutputState,
  describeTriggerState,
  describeState,
  toAlarmPanelState,
  type AlarmPanelState,
} from './StateSummaries.mjs';

export { createLogger, type ScopedLogger } from './Logger.mjs';
