/**
 * Dome event emitter
 *
 * Thin typed wrapper over Node's EventEmitter.
 */

import { EventEmitter } from 'node:events';

import type { DomeEventEmitter, DomeEventListener, DomeEventMap, DomeEventName } from './types';

export function createDomeEventEmitter(): DomeEventEmitter {
  const emitter = new EventEmitter();

  return {
    on: function<K extends DomeEventName>(name: K, listener: DomeEventListener<K>) {
      emitter.on(name, listener);
    },
    off: function<K extends DomeEventName>(name: K, listener: DomeEventListener<K>) {
      emitter.off(name, listener);
    },
    emit: function<K extends DomeEventName>(name: K, event: DomeEventMap[K]) {
      emitter.emit(name, event);
    },
    listenerCount: function(name: DomeEventName) {
      return emitter.listenerCount(name);
    }
  };
}
