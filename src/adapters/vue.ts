// src/adapters/vue.ts
/**
 * rowstack/vue - Thin Vue 3 wrapper for rowstack
 *
 * Provides a `useRowStack` composable that manages the stack lifecycle
 * within Vue's composition API. The composable creates a stack on mount,
 * replaces rows when a reactive config's `rows` change, and destroys on
 * unmount.
 *
 * @packageDocumentation
 */

import {
  ref,
  shallowRef,
  onMounted,
  onBeforeUnmount,
  watch,
  isRef,
  unref,
  type Ref,
  type ShallowRef,
} from "vue";
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

/** Accepted config input: plain object or reactive ref */
export type UseRowStackConfigInput = UseRowStackConfig | Ref<UseRowStackConfig>;

/** Return value from the useRowStack composable */
export interface UseRowStackReturn {
  /**
   * Template ref to bind to your container element.
   *
   * ```vue
   * <template>
   *   <div ref="containerRef" style="height: 400px" />
   * </template>
   * ```
   */
  containerRef: Ref<HTMLElement | null>;

  /** Shallow ref holding the stack. Populated after mount, `null` before. */
  instance: ShallowRef<RowStack | null>;
}

// =============================================================================
// Composable
// =============================================================================

/**
 * Vue 3 composable for rowstack integration.
 *
 * ```vue
 * <script setup lang="ts">
 * import { useRowStack } from 'rowstack/vue';
 * import { computed } from 'vue';
 *
 * const props = defineProps<{ rows: HTMLElement[] }>();
 * const config = computed(() => ({ rows: props.rows }));
 *
 * const { containerRef, instance } = useRowStack(config);
 * </script>
 * ```
 */
export function useRowStack(configInput: UseRowStackConfigInput): UseRowStackReturn {
  const containerRef = ref<HTMLElement | null>(null);
  const instance = shallowRef<RowStack | null>(null);

  // --- Lifecycle: create on mount, destroy on unmount ---

  onMounted(() => {
    const container = containerRef.value;
    if (!container) return;

    instance.value = createStack({
      ...unref(configInput),
      container,
    });
  });

  onBeforeUnmount(() => {
    instance.value?.destroy();
    instance.value = null;
  });

  // --- Sync rows when config changes ---

  if (isRef(configInput)) {
    const configRef = configInput;
    watch(
      () => configRef.value.rows,
      (rows) => {
        if (instance.value && rows) {
          instance.value.setRows(rows);
        }
      },
    );
  }

  return {
    containerRef,
    instance,
  };
}

// =============================================================================
// Event Composable (optional convenience)
// =============================================================================

/**
 * Subscribe to a stack event within Vue's lifecycle.
 * Automatically unsubscribes on unmount.
 *
 * ```vue
 * <script setup lang="ts">
 * const { containerRef, instance } = useRowStack(config);
 *
 * useRowStackEvent(instance, 'row:remove', ({ row }) => {
 *   console.log('Removed', row.id);
 * });
 * </script>
 * ```
 */
export function useRowStackEvent<K extends keyof StackEvents>(
  instance: ShallowRef<RowStack | null>,
  event: K,
  handler: EventHandler<StackEvents[K]>,
): void {
  let unsub: Unsubscribe | null = null;

  // Subscribe whenever the instance becomes available
  watch(
    instance,
    (stack) => {
      if (unsub) {
        unsub();
        unsub = null;
      }

      if (stack) {
        unsub = stack.on(event, handler);
      }
    },
    { immediate: true },
  );

  onBeforeUnmount(() => {
    if (unsub) {
      unsub();
      unsub = null;
    }
  });
}
