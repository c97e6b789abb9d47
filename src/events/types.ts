/**
 * Event types emitted by dome controllers
 *
 * Events are emitted after a tick has been committed, so a listener
 * never observes a state that is later rolled back.
 */

import type { Alert } from '@features/alerts';
import type { EmergencyEvent } from '@core/emergency';
import type { ActuatorCommand, ControlFault, Mode, SensorReading } from '$types/common';

/**
 * State emitted after every committed tick
 */
export interface DomeTickEvent {
  domeId: string;
  time: number;
  mode: Mode;
  reading: SensorReading;
  command: ActuatorCommand;
  /** Cumulative energy (kWh) */
  energyKwh: number;
}

export interface DomeModeChangedEvent {
  domeId: string;
  from: Mode;
  to: Mode;
  at: number;
  reason: string;
}

export interface DomeEmergencyEvent {
  domeId: string;
  event: EmergencyEvent;
}

export interface DomeFaultEvent {
  domeId: string;
  fault: ControlFault;
}

export interface DomeAlertEvent {
  domeId: string;
  alert: Alert;
}

/**
 * Event names
 */
export const EVENT_NAMES = {
  TICK: 'tick',
  MODE_CHANGED: 'mode_changed',
  EMERGENCY_OPENED: 'emergency_opened',
  EMERGENCY_RESOLVED: 'emergency_resolved',
  FAULT: 'fault',
  ALERT: 'alert'
} as const;

export type DomeEventName = typeof EVENT_NAMES[keyof typeof EVENT_NAMES];

/**
 * Payload per event name
 */
export interface DomeEventMap {
  tick: DomeTickEvent;
  mode_changed: DomeModeChangedEvent;
  emergency_opened: DomeEmergencyEvent;
  emergency_resolved: DomeEmergencyEvent;
  fault: DomeFaultEvent;
  alert: DomeAlertEvent;
}

export type DomeEventListener<K extends DomeEventName> = (event: DomeEventMap[K]) => void;

/**
 * Typed view over an event emitter
 */
export interface DomeEventEmitter {
  on<K extends DomeEventName>(name: K, listener: DomeEventListener<K>): void;
  off<K extends DomeEventName>(name: K, listener: DomeEventListener<K>): void;
  emit<K extends DomeEventName>(name: K, event: DomeEventMap[K]): void;
  listenerCount(name: DomeEventName): number;
}
