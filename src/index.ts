/**
 * rowstack - Stacked Row List
 * A convenient API for laying out a collection of elements as rows
 *
 * @packageDocumentation
 */

// Main factory
export { createStack } from "./stack/core";

// Cells
export {
  createRowCell,
  isTappable,
  isHighlightable,
  shouldReceiveTap,
  isInteractiveControl,
} from "./cell";

// Events
export { createEmitter, type Emitter } from "./events/emitter";

// Constants
export {
  DEFAULT_ANIMATION_DURATION,
  DEFAULT_ROW_BACKGROUND_COLOR,
  DEFAULT_ROW_HIGHLIGHT_COLOR,
  DEFAULT_ROW_INSET,
  ACCESSORY_SPACING,
} from "./constants";

// Types
export type {
  // Stack
  RowStack,
  StackConfig,
  StackAxis,
  InsertOptions,
  AnimationOptions,
  RowPosition,

  // Cells
  RowCell,
  RowCellOptions,
  InsetsReference,
  ContentEdges,
  EdgePin,
  EdgeTarget,
  CellTapHandler,
  EdgeInsets,
  Rect,

  // Capabilities
  Tappable,
  Highlightable,
  RowType,

  // Events
  StackEvents,
  EventMap,
  EventHandler,
  Unsubscribe,
} from "./types";
