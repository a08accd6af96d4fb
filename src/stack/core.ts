/**
 * rowstack/stack - Main Factory
 * Creates a stack instance
 *
 * This is the composition root that:
 * 1. Validates configuration
 * 2. Builds the DOM scaffold
 * 3. Keeps the ordered list of cells in the rows container
 * 4. Returns the public API
 */

import type {
  AnimationOptions,
  EdgeInsets,
  EventHandler,
  InsertOptions,
  RowCell,
  RowPosition,
  RowStack,
  RowType,
  StackAxis,
  StackConfig,
  StackEvents,
  Unsubscribe,
} from "../types";

import { createEmitter } from "../events/emitter";
import { cellFromElement, cellOfRow, createRowCell } from "../cell/cell";
import { assertInvariant } from "../invariant";
import { applyAxis, createDOMStructure, resolveContainer } from "./dom";
import { createAnimator } from "./animation";
import { getContentRect, scrollRectToVisible } from "./scroll";

import {
  DEFAULT_ANIMATION_DURATION,
  DEFAULT_CLASS_PREFIX,
  DEFAULT_ROW_BACKGROUND_COLOR,
  DEFAULT_ROW_HIGHLIGHT_COLOR,
  DEFAULT_ROW_INSET,
  DEFAULT_STACK_BACKGROUND_COLOR,
  LOG_PREFIX,
} from "../constants";

// =============================================================================
// Helpers
// =============================================================================

const toRows = (
  rows: HTMLElement | readonly HTMLElement[],
): readonly HTMLElement[] => ("nodeType" in rows ? [rows] : rows);

const isInstance = <R extends HTMLElement>(
  value: HTMLElement,
  type: RowType<R>,
): value is R => value instanceof type;

// =============================================================================
// Main Factory
// =============================================================================

/**
 * Create a stack of rows
 *
 * ```ts
 * const stack = createStack({ container: '#settings' })
 *
 * stack.addRow(titleRow)
 * stack.addRows([wifiRow, bluetoothRow], { animated: true })
 * stack.setTapHandler(wifiRow, (row) => openWifi(row))
 * stack.hideRow(bluetoothRow)
 * ```
 */
export const createStack = (config: StackConfig): RowStack => {
  // ===========================================================================
  // Validation & Defaults
  // ===========================================================================

  if (!config.container) {
    throw new Error(`${LOG_PREFIX} Container is required`);
  }

  const container = resolveContainer(config.container);
  const classPrefix = config.classPrefix ?? DEFAULT_CLASS_PREFIX;
  const makeCell = config.cellForRow ?? ((row: HTMLElement) => createRowCell(row));

  let axis: StackAxis = config.axis ?? "vertical";
  let rowBackgroundColor = config.rowBackgroundColor ?? DEFAULT_ROW_BACKGROUND_COLOR;
  let rowHighlightColor = config.rowHighlightColor ?? DEFAULT_ROW_HIGHLIGHT_COLOR;
  let rowInset: EdgeInsets = { ...(config.rowInset ?? DEFAULT_ROW_INSET) };
  let isDestroyed = false;

  // ===========================================================================
  // Components
  // ===========================================================================

  const dom = createDOMStructure(container, classPrefix, config.ariaLabel);
  dom.root.style.backgroundColor =
    config.backgroundColor ?? DEFAULT_STACK_BACKGROUND_COLOR;
  applyAxis(dom, axis, classPrefix);

  const emitter = createEmitter<StackEvents>();
  const animator = createAnimator(
    config.animationDuration ?? DEFAULT_ANIMATION_DURATION,
  );

  const warnDestroyed = (method: string): boolean => {
    if (!isDestroyed) return false;
    console.warn(`${LOG_PREFIX} ${method}() called on a destroyed stack`);
    return true;
  };

  // ===========================================================================
  // Cell Bookkeeping
  // ===========================================================================

  /** The cell wrapping `row`, if that cell belongs to this stack */
  const ownCell = (row: HTMLElement): RowCell | null => {
    const cell = cellOfRow(row);
    return cell && cell.element.parentElement === dom.rows ? cell : null;
  };

  /** Every cell in visual order */
  const arrangedCells = (): RowCell[] =>
    Array.from(dom.rows.children, (child) => {
      const cell = cellFromElement(child);
      assertInvariant(
        cell !== null,
        `rows container holds a <${child.tagName.toLowerCase()}> that is not a row cell`,
      );
      return cell;
    });

  const indexOfCell = (cell: RowCell): number =>
    Array.prototype.indexOf.call(dom.rows.children, cell.element);

  const createCell = (row: HTMLElement): RowCell => {
    const cell = makeCell(row);

    cell.element.classList.add(`${classPrefix}-cell`);
    cell.backgroundColor = rowBackgroundColor;
    cell.highlightColor = rowHighlightColor;
    cell.insets = rowInset;

    config.configureCell?.(cell);

    return cell;
  };

  const removeCell = (cell: RowCell, animated: boolean): void => {
    const detach = (): void => {
      if (cell.element.parentElement !== dom.rows) return;
      cell.element.remove();
      cell.destroy();
      emitter.emit("row:remove", { row: cell.content });
    };

    if (animated) {
      animator.hide(cell, detach);
    } else {
      detach();
    }
  };

  const insertCell = (
    row: HTMLElement,
    index: number,
    options: InsertOptions = {},
  ): void => {
    if (warnDestroyed("insertRow")) return;

    const cellToRemove = ownCell(row);

    const cell = createCell(row);
    options.configure?.(cell);
    dom.rows.insertBefore(cell.element, dom.rows.children[index] ?? null);

    if (cellToRemove) {
      removeCell(cellToRemove, false);
    }

    emitter.emit("row:insert", { row, index: indexOfCell(cell) });

    if (options.animated) {
      animator.fadeIn(cell);
    }
  };

  // ===========================================================================
  // Adding and Removing Rows
  // ===========================================================================

  const addRow = (row: HTMLElement, options?: InsertOptions): void => {
    insertCell(row, dom.rows.children.length, options);
  };

  const addRows = (rows: readonly HTMLElement[], options?: InsertOptions): void => {
    rows.forEach((row) => addRow(row, options));
  };

  const prependRow = (row: HTMLElement, options?: InsertOptions): void => {
    insertCell(row, 0, options);
  };

  const prependRows = (
    rows: readonly HTMLElement[],
    options?: InsertOptions,
  ): void => {
    [...rows].reverse().forEach((row) => prependRow(row, options));
  };

  const insertRow = (
    row: HTMLElement,
    position: RowPosition,
    options?: InsertOptions,
  ): void => {
    const anchor = "before" in position ? position.before : position.after;
    const cell = ownCell(anchor);
    if (!cell) return;

    const index = indexOfCell(cell);
    insertCell(row, "before" in position ? index : index + 1, options);
  };

  const insertRows = (
    rows: readonly HTMLElement[],
    position: RowPosition,
    options?: InsertOptions,
  ): void => {
    if ("before" in position) {
      rows.forEach((row) => insertRow(row, position, options));
      return;
    }

    rows.reduce((after, row) => {
      insertRow(row, { after }, options);
      return row;
    }, position.after);
  };

  const removeRow = (row: HTMLElement, options: AnimationOptions = {}): void => {
    const cell = ownCell(row);
    if (cell) removeCell(cell, options.animated ?? false);
  };

  const removeRows = (
    rows: readonly HTMLElement[],
    options?: AnimationOptions,
  ): void => {
    rows.forEach((row) => removeRow(row, options));
  };

  const removeAllRows = (options?: AnimationOptions): void => {
    Array.from(dom.rows.children).forEach((child) => {
      const cell = cellFromElement(child);
      if (cell) removeRow(cell.content, options);
    });
  };

  const setRows = (rows: readonly HTMLElement[]): void => {
    removeAllRows();
    addRows(rows);
  };

  // ===========================================================================
  // Accessing Rows
  // ===========================================================================

  const rows = (): HTMLElement[] => arrangedCells().map((cell) => cell.content);

  const containsRow = (row: HTMLElement): boolean => ownCell(row) !== null;

  // ===========================================================================
  // Hiding and Showing Rows
  // ===========================================================================

  const setRowHidden = (
    row: HTMLElement,
    hidden: boolean,
    options: AnimationOptions = {},
  ): void => {
    const cell = ownCell(row);
    if (!cell || cell.isHidden === hidden) return;

    if (options.animated) {
      if (hidden) {
        animator.hide(cell);
      } else {
        animator.show(cell);
      }
    } else {
      cell.isHidden = hidden;
    }

    emitter.emit("row:visibility", { row, hidden });
  };

  const setRowsHidden = (
    rows: readonly HTMLElement[],
    hidden: boolean,
    options?: AnimationOptions,
  ): void => {
    rows.forEach((row) => setRowHidden(row, hidden, options));
  };

  const isRowHidden = (row: HTMLElement): boolean =>
    ownCell(row)?.isHidden ?? false;

  // ===========================================================================
  // Handling User Interaction
  // ===========================================================================

  /**
   * With `type`, the handler only runs for content that is an instance of
   * it; other taps are dropped silently.
   */
  const setTapHandler = <R extends HTMLElement>(
    row: R,
    handler: ((row: R) => void) | null,
    type?: RowType<R>,
  ): void => {
    if (warnDestroyed("setTapHandler")) return;

    const cell = ownCell(row);
    if (!cell) return;

    if (!handler) {
      cell.tapHandler = null;
      return;
    }

    cell.tapHandler = (content) => {
      emitter.emit("row:tap", { row: content });

      if (type) {
        if (isInstance(content, type)) handler(content);
      } else if (content === row) {
        handler(row);
      }
    };
  };

  // ===========================================================================
  // Styling Rows
  // ===========================================================================

  const setBackgroundColor = (
    rows: HTMLElement | readonly HTMLElement[],
    color: string,
  ): void => {
    toRows(rows).forEach((row) => {
      const cell = ownCell(row);
      if (cell) cell.backgroundColor = color;
    });
  };

  const setInset = (
    rows: HTMLElement | readonly HTMLElement[],
    inset: EdgeInsets,
  ): void => {
    toRows(rows).forEach((row) => {
      const cell = ownCell(row);
      if (cell) cell.insets = inset;
    });
  };

  // ===========================================================================
  // Scrolling
  // ===========================================================================

  const scrollRowToVisible = (
    row: HTMLElement,
    options: AnimationOptions = {},
  ): void => {
    if (!ownCell(row)) return;
    const rect = getContentRect(dom.viewport, row);
    scrollRectToVisible(dom.viewport, rect, options.animated ?? true);
  };

  // ===========================================================================
  // Events
  // ===========================================================================

  const on = <K extends keyof StackEvents>(
    event: K,
    handler: EventHandler<StackEvents[K]>,
  ): Unsubscribe => emitter.on(event, handler);

  const off = <K extends keyof StackEvents>(
    event: K,
    handler: EventHandler<StackEvents[K]>,
  ): void => {
    emitter.off(event, handler);
  };

  // ===========================================================================
  // Destroy
  // ===========================================================================

  const destroy = (): void => {
    if (isDestroyed) return;
    isDestroyed = true;

    animator.cancelAll();
    Array.from(dom.rows.children).forEach((child) => {
      cellFromElement(child)?.destroy();
    });
    emitter.clear();
    dom.root.remove();
  };

  // ===========================================================================
  // Initialization
  // ===========================================================================

  if (config.rows) addRows(config.rows);

  // ===========================================================================
  // Return Public API
  // ===========================================================================

  return {
    get element() {
      return dom.root;
    },

    get axis() {
      return axis;
    },
    set axis(value: StackAxis) {
      axis = value;
      applyAxis(dom, axis, classPrefix);
    },

    get rowBackgroundColor() {
      return rowBackgroundColor;
    },
    set rowBackgroundColor(value: string) {
      rowBackgroundColor = value;
    },

    get rowHighlightColor() {
      return rowHighlightColor;
    },
    set rowHighlightColor(value: string) {
      rowHighlightColor = value;
    },

    get rowInset() {
      return { ...rowInset };
    },
    set rowInset(value: EdgeInsets) {
      rowInset = { ...value };
    },

    get firstRow() {
      return cellFromElement(dom.rows.firstElementChild)?.content ?? null;
    },

    get lastRow() {
      return cellFromElement(dom.rows.lastElementChild)?.content ?? null;
    },

    // Adding and removing rows
    addRow,
    addRows,
    prependRow,
    prependRows,
    insertRow,
    insertRows,
    removeRow,
    removeRows,
    removeAllRows,
    setRows,

    // Accessing rows
    rows,
    containsRow,
    cellOfRow: ownCell,

    // Hiding and showing rows
    hideRow: (row, options) => setRowHidden(row, true, options),
    hideRows: (rows, options) => setRowsHidden(rows, true, options),
    showRow: (row, options) => setRowHidden(row, false, options),
    showRows: (rows, options) => setRowsHidden(rows, false, options),
    setRowHidden,
    setRowsHidden,
    isRowHidden,

    // Interaction, styling, scrolling
    setTapHandler,
    setBackgroundColor,
    setInset,
    scrollRowToVisible,

    // Events
    on,
    off,

    // Lifecycle
    destroy,
  };
};
