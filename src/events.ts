/**
 * FlatDoc Event System — Typed event emitter
 *
 * All lifecycle, operation, schema and error events flow through this.
 */

import { EventEmitter } from 'events';
import type { FlatDocEvents } from './types.js';

export class FlatDocEventEmitter extends EventEmitter {
  on<E extends keyof FlatDocEvents>(
    event: E,
    listener: (payload: FlatDocEvents[E]) => void,
  ): this {
    return super.on(event, listener);
  }

  once<E extends keyof FlatDocEvents>(
    event: E,
    listener: (payload: FlatDocEvents[E]) => void,
  ): this {
    return super.once(event, listener);
  }

  emit<E extends keyof FlatDocEvents>(
    event: E,
    payload: FlatDocEvents[E],
  ): boolean {
    return super.emit(event, payload);
  }

  off<E extends keyof FlatDocEvents>(
    event: E,
    listener: (payload: FlatDocEvents[E]) => void,
  ): this {
    return super.off(event, listener);
  }
}
