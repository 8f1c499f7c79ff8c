/**
 * State record builders and a sample panel
 */

import type {
  AreaState,
  OutputState,
  PanelSnapshot,
  TriggerState,
  ZoneState,
} from '../../lib/types.mjs';

export function zoneState(overrides: Partial<ZoneState> = {}): ZoneState {
  return {
    isActive: false,
    isTampered: false,
    hasFault: false,
    isAlarming: false,
    isIsolated: false,
    isInhibited: false,
    isSet: false,
    isAntiMask: false,
    isInSoakTest: false,
    hasBatteryFault: false,
    isDirty: false,
    ...overrides,
  };
}

export function areaState(overrides: Partial<AreaState> = {}): AreaState {
  return {
    isUnset: true,
    isFullSet: false,
    isPartiallySet: false,
    isPartiallySet2: false,
    isAlarming: false,
    isAlarmAcknowledged: false,
    isTampered: false,
    isReadyToArm: true,
    isExiting: false,
    isEntering: false,
    hasFire: false,
    hasPanic: false,
    hasMedical: false,
    hasDuress: false,
    hasTechnical: false,
    hasActiveZones: false,
    hasInhibitedZones: false,
    hasIsolatedZones: false,
    hasZoneFaults: false,
    hasZoneTamper: false,
    isBuzzerActive: false,
    isInternalSiren: false,
    isExternalSiren: false,
    isStrobeActive: false,
    ...overrides,
  };
}

export function outputState(overrides: Partial<OutputState> = {}): OutputState {
  return { isOn: false, isActive: false, isForced: false, ...overrides };
}

export function triggerState(overrides: Partial<TriggerState> = {}): TriggerState {
  return {
    isActive: false,
    isRemoteOutput: false,
    isFob: false,
    isSchedule: false,
    isFunctionKey: false,
    ...overrides,
  };
}

/**
 * Three zones, two areas, two outputs and one trigger, all idle
 */
export function createSnapshot(): PanelSnapshot {
  return {
    panel: {
      model: 'ATS4500',
      name: 'Test Panel',
      firmwareVersion: '1.2.3',
      protocolVersion: 4,
    },
    areas: [
      { number: 1, name: 'Ground Floor' },
      { number: 2, name: 'First Floor' },
    ],
    zones: [
      { number: 1, name: 'Front Door' },
      { number: 2, name: 'Hall Motion' },
      { number: 3, name: 'Kitchen Window' },
    ],
    outputs: [
      { number: 1, name: 'Siren' },
      { number: 2, name: 'Strobe' },
    ],
    triggers: [{ number: 1, name: 'Panic Button' }],
    areaStates: new Map([
      [1, areaState()],
      [2, areaState()],
    ]),
    zoneStates: new Map([
      [1, zoneState()],
      [2, zoneState()],
      [3, zoneState()],
    ]),
    outputStates: new Map([
      [1, outputState()],
      [2, outputState()],
    ]),
    triggerStates: new Map([[1, triggerState()]]),
  };
}
