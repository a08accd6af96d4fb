/**
 * rowstack - Cell Domain
 * Row wrappers, capabilities, tap and highlight handling
 */

export { createRowCell, cellFromElement, cellOfRow } from "./cell";
export {
  isTappable,
  isHighlightable,
  isInteractionEnabled,
} from "./capabilities";
export {
  createTapRecognizer,
  shouldReceiveTap,
  isInteractiveControl,
  type TapRecognizer,
} from "./gesture";
export {
  createHighlightTracker,
  isPointInside,
  type HighlightTracker,
} from "./highlight";
export { resolveContentEdges } from "./layout";
