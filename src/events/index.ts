export { createDomeEventEmitter } from './emitter';
export { EVENT_NAMES } from './types';
export type {
  DomeEventEmitter,
  DomeEventListener,
  DomeEventMap,
  DomeEventName,
  DomeTickEvent,
  DomeModeChangedEvent,
  DomeEmergencyEvent,
  DomeFaultEvent,
  DomeAlertEvent
} from './types';
