/**
 * State Summaries for ATS panel entities
 *
 * Derives the human-readable text shown for a state record and the alarm
 * panel state of an area.
 */

import type {
  AreaState,
  EntityKind,
  EntityStateMap,
  OutputState,
  TriggerState,
  ZoneState,
} from '../types.mjs';

/**
 * Alarm panel states an area maps onto
 */
export type AlarmPanelState =
  | 'disarmed'
  | 'armed_away'
  | 'armed_home'
  | 'armed_night'
  | 'arming'
  | 'pending'
  | 'triggered';

/**
 * Summarize an area, highest priority condition first
 *
 * @example
 * describeAreaState({ ...unset, isAlarming: true, isFullSet: true }) // 'Alarming'
 */
export function describeAreaState(state: AreaState): string {
  if (state.isAlarming) return 'Alarming';
  if (state.isFullSet) return 'Full Set';
  if (state.isPartiallySet) return 'Part Set 1';
  if (state.isPartiallySet2) return 'Part Set 2';
  return 'Unset';
}

const ZONE_CONDITIONS: ReadonlyArray<[keyof ZoneState, string]> = [
  ['isActive', 'Active'],
  ['isTampered', 'Tampered'],
  ['hasFault', 'Fault'],
  ['isAlarming', 'Alarming'],
  ['isIsolated', 'Isolated'],
  ['isInhibited', 'Inhibited'],
];

/**
 * Summarize a zone as its active conditions, or 'Normal'
 *
 * @example
 * describeZoneState({ ...idle, isActive: true, isInhibited: true }) // 'Active, Inhibited'
 */
export function describeZoneState(state: ZoneState): string {
  const conditions = ZONE_CONDITIONS.filter(([flag]) => state[flag]).map(
    ([, label]) => label
  );
  return conditions.length > 0 ? conditions.join(', ') : 'Normal';
}

export function describeOutputState(state: OutputState): string {
  return state.isOn || state.isActive ? 'On' : 'Off';
}

export function describeTriggerState(state: TriggerState): string {
  return state.isActive ? 'Active' : 'Inactive';
}

const DESCRIBERS: { [K in EntityKind]: (state: EntityStateMap[K]) => string } = {
  area: describeAreaState,
  zone: describeZoneState,
  output: describeOutputState,
  trigger: describeTriggerState,
};

/**
 * Summary text for a record of any kind
 */
export function describeState<K extends EntityKind>(
  kind: K,
  state: EntityStateMap[K]
): string {
  const describe: (state: EntityStateMap[K]) => string = DESCRIBERS[kind];
  return describe(state);
}

/**
 * Map an area record onto an alarm panel state.
 * Alarm conditions win over entry/exit, which win over set states.
 */
export function toAlarmPanelState(state: AreaState | undefined): AlarmPanelState {
  if (!state) return 'disarmed';

  if (state.isAlarming) return 'triggered';
  if (state.isEntering) return 'pending';
  if (state.isExiting) return 'arming';
  if (state.isFullSet) return 'armed_away';
  if (state.isPartiallySet) return 'armed_home';
  if (state.isPartiallySet2) return 'armed_night';
  return 'disarmed';
}
