// src/adapters/react.ts
/**
 * rowstack/react - Thin React wrapper for rowstack
 *
 * Provides a `useRowStack` hook that manages the stack lifecycle
 * within React's component model. The hook creates a stack on mount,
 * replaces rows when the `rows` option changes, and destroys on unmount.
 *
 * @packageDocumentation
 */

import { useRef, useEffect, useCallback, type RefObject } from "react";
import { createStack } from "../stack/core";
import type {
  StackConfig,
  RowStack,
  StackEvents,
  EventHandler,
  Unsubscribe,
} from "../types";

// =============================================================================
// Types
// =============================================================================

/** Configuration for useRowStack (StackConfig without container) */
export type UseRowStackConfig = Omit<StackConfig, "container">;

/** Return value from the useRowStack hook */
export interface UseRowStackReturn {
  /**
   * Ref to attach to your container element.
   *
   * ```tsx
   * const { containerRef } = useRowStack(config);
   * return <div ref={containerRef} style={{ height: 400 }} />;
   * ```
   */
  containerRef: RefObject<HTMLDivElement>;

  /** Ref holding the stack. Populated after mount, `null` before. */
  instanceRef: RefObject<RowStack | null>;

  /** Stable helper to get the stack (or null) */
  getInstance: () => RowStack | null;
}

// =============================================================================
// Hook
// =============================================================================

/**
 * React hook for rowstack integration.
 *
 * Rows are plain elements; build them once (e.g. in a `useMemo`) and pass a
 * new array when the set of rows changes.
 *
 * ```tsx
 * function Settings({ rows }: { rows: HTMLElement[] }) {
 *   const { containerRef, instanceRef } = useRowStack({
 *     rows,
 *     rowInset: { top: 12, left: 16, bottom: 12, right: 16 },
 *   });
 *
 *   return (
 *     <div
 *       ref={containerRef}
 *       style={{ height: 400 }}
 *       onDoubleClick={() => instanceRef.current?.scrollRowToVisible(rows[0])}
 *     />
 *   );
 * }
 * ```
 */
export function useRowStack(config: UseRowStackConfig): UseRowStackReturn {
  const containerRef = useRef<HTMLDivElement>(null);
  const instanceRef = useRef<RowStack | null>(null);

  // Latest config, read by the mount effect without re-running it
  const configRef = useRef(config);
  configRef.current = config;

  // Rows the stack currently shows, by reference
  const rowsRef = useRef<readonly HTMLElement[] | undefined>(undefined);

  // --- Lifecycle: create on mount, destroy on unmount ---
  useEffect(() => {
    const container = containerRef.current;
    if (!container) return;

    const instance = createStack({
      ...configRef.current,
      container,
    });

    instanceRef.current = instance;
    rowsRef.current = configRef.current.rows;

    return () => {
      instance.destroy();
      instanceRef.current = null;
      rowsRef.current = undefined;
    };
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, []);

  // --- Sync rows when they change by reference ---
  useEffect(() => {
    const instance = instanceRef.current;
    if (!instance || config.rows === rowsRef.current) return;

    rowsRef.current = config.rows;
    if (config.rows) {
      instance.setRows(config.rows);
    }
  }, [config.rows]);

  const getInstance = useCallback((): RowStack | null => {
    return instanceRef.current;
  }, []);

  return {
    containerRef,
    instanceRef,
    getInstance,
  };
}

// =============================================================================
// Event Hook (optional convenience)
// =============================================================================

/**
 * Subscribe to a stack event within React's lifecycle.
 * Automatically unsubscribes on unmount or when the instance changes.
 *
 * ```tsx
 * const { instanceRef } = useRowStack(config);
 *
 * useRowStackEvent(instanceRef, 'row:tap', ({ row }) => {
 *   console.log('Tapped', row.dataset.id);
 * });
 * ```
 */
export function useRowStackEvent<K extends keyof StackEvents>(
  instanceRef: RefObject<RowStack | null>,
  event: K,
  handler: EventHandler<StackEvents[K]>,
): void {
  // Keep latest handler in a ref to avoid re-subscribing on every render
  const handlerRef = useRef(handler);
  handlerRef.current = handler;

  useEffect(() => {
    const instance = instanceRef.current;
    if (!instance) return;

    const wrappedHandler: EventHandler<StackEvents[K]> = (payload) => {
      handlerRef.current(payload);
    };

    const unsub: Unsubscribe = instance.on(event, wrappedHandler);
    return unsub;
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [instanceRef.current, event]);
}
