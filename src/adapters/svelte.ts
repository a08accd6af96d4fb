// src/adapters/svelte.ts
/**
 * rowstack/svelte - Thin Svelte wrapper for rowstack
 *
 * Provides a `rowstack` action that manages the stack lifecycle
 * within Svelte's component model. The action creates a stack when the
 * element mounts, replaces rows when an update carries a new `rows` array,
 * and destroys on unmount.
 *
 * Works with both Svelte 4 and Svelte 5 (actions are framework-stable).
 * No Svelte imports needed; actions are plain functions.
 *
 * @packageDocumentation
 */

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

/** Configuration for the rowstack action (StackConfig without container) */
export type RowStackActionConfig = Omit<StackConfig, "container">;

/** Callback invoked once the stack is ready */
export type OnInstanceCallback = (instance: RowStack) => void;

/** Full options passed to the rowstack action */
export interface RowStackActionOptions {
  config: RowStackActionConfig;

  /**
   * Called once the stack is created (on mount), and again on every update.
   *
   * ```svelte
   * <script>
   *   let stack;
   *   const options = { config: { rows }, onInstance: (s) => { stack = s; } };
   * </script>
   * <div use:rowstack={options} />
   * <button on:click={() => stack?.hideRow(rows[0])}>Hide first</button>
   * ```
   */
  onInstance?: OnInstanceCallback;
}

/** Svelte action return type */
export interface RowStackActionReturn {
  /** Called by Svelte when the action parameter changes */
  update?: (newOptions: RowStackActionOptions) => void;

  /** Called by Svelte when the element is removed from the DOM */
  destroy?: () => void;
}

// =============================================================================
// Action
// =============================================================================

/**
 * Svelte action for rowstack integration.
 *
 * ```svelte
 * <script>
 *   import { rowstack } from 'rowstack/svelte';
 *   export let rows;
 *
 *   // Svelte re-runs the action's update when this object changes
 *   $: options = { config: { rows, axis: 'horizontal' } };
 * </script>
 *
 * <div use:rowstack={options} style="height: 120px" />
 * ```
 *
 * @param node - The DOM element Svelte binds the action to
 */
export function rowstack(
  node: HTMLElement,
  options: RowStackActionOptions,
): RowStackActionReturn {
  const instance: RowStack = createStack({
    ...options.config,
    container: node,
  });

  options.onInstance?.(instance);

  // Rows are only replaced when the array changes by reference
  let lastRows = options.config.rows;

  return {
    update(newOptions: RowStackActionOptions) {
      const { rows } = newOptions.config;
      if (rows && rows !== lastRows) {
        instance.setRows(rows);
      }
      lastRows = rows;

      newOptions.onInstance?.(instance);
    },

    destroy() {
      instance.destroy();
    },
  };
}

// =============================================================================
// Event Helper
// =============================================================================

/**
 * Subscribe to stack events; returns an unsubscribe function.
 *
 * ```svelte
 * <script>
 *   import { rowstack, onRowStackEvent } from 'rowstack/svelte';
 *   import { onDestroy } from 'svelte';
 *
 *   let unsub = () => {};
 *   const handleInstance = (stack) => {
 *     unsub = onRowStackEvent(stack, 'row:tap', ({ row }) => select(row));
 *   };
 *
 *   onDestroy(() => unsub());
 * </script>
 * ```
 */
export function onRowStackEvent<K extends keyof StackEvents>(
  instance: RowStack,
  event: K,
  handler: EventHandler<StackEvents[K]>,
): Unsubscribe {
  return instance.on(event, handler);
}
