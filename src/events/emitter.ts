/**
 * rowstack - Event Emitter
 * Typed notifications for stack changes (`StackEvents`)
 */

import type { EventHandler, Unsubscribe, EventMap } from "../types";
import { LOG_PREFIX } from "../constants";

type HandlerSets<T extends EventMap> = {
  [K in keyof T]?: Set<EventHandler<T[K]>>;
};

export interface Emitter<T extends EventMap> {
  on: <K extends keyof T>(event: K, handler: EventHandler<T[K]>) => Unsubscribe;
  off: <K extends keyof T>(event: K, handler: EventHandler<T[K]>) => void;

  /**
   * Deliver `payload` to the handlers registered when the call starts.
   * A handler that throws is logged; the rest still run.
   */
  emit: <K extends keyof T>(event: K, payload: T[K]) => void;

  /** Drop every handler; used when the stack is destroyed */
  clear: () => void;
}

export const createEmitter = <T extends EventMap>(): Emitter<T> => {
  let handlers: HandlerSets<T> = {};

  const off = <K extends keyof T>(event: K, handler: EventHandler<T[K]>): void => {
    const set = handlers[event];
    if (!set) return;
    set.delete(handler);
    if (set.size === 0) delete handlers[event];
  };

  const on = <K extends keyof T>(
    event: K,
    handler: EventHandler<T[K]>,
  ): Unsubscribe => {
    const set = handlers[event] ?? new Set<EventHandler<T[K]>>();
    set.add(handler);
    handlers[event] = set;
    return () => off(event, handler);
  };

  const emit = <K extends keyof T>(event: K, payload: T[K]): void => {
    const set = handlers[event];
    if (!set) return;

    // Handlers may unsubscribe while we iterate
    for (const handler of [...set]) {
      try {
        handler(payload);
      } catch (error) {
        console.error(`${LOG_PREFIX} Error in "${String(event)}" handler:`, error);
      }
    }
  };

  return {
    on,
    off,
    emit,
    clear() {
      handlers = {};
    },
  };
};
