/**
 * rowstack - Constants
 * All default values and magic numbers in one place
 */

import type { EdgeInsets } from "./types";

// =============================================================================
// Stack
// =============================================================================

/** Default CSS class prefix */
export const DEFAULT_CLASS_PREFIX = "rowstack";

/** Prefix for thrown errors and log lines */
export const LOG_PREFIX = "[rowstack]";

/** Default background color of the stack itself */
export const DEFAULT_STACK_BACKGROUND_COLOR = "#ffffff";

// =============================================================================
// Rows
// =============================================================================

/** Default background color of new rows */
export const DEFAULT_ROW_BACKGROUND_COLOR = "transparent";

/** Default highlight color of new rows (#D9D9D9) */
export const DEFAULT_ROW_HIGHLIGHT_COLOR = "rgb(217, 217, 217)";

/** Default inset of new rows: 12px top and bottom, flush left and right */
export const DEFAULT_ROW_INSET: Readonly<EdgeInsets> = {
  top: 12,
  left: 0,
  bottom: 12,
  right: 0,
};

/** Insets of a cell created outside a stack */
export const ZERO_INSETS: Readonly<EdgeInsets> = {
  top: 0,
  left: 0,
  bottom: 0,
  right: 0,
};

/** Horizontal gap between a row's content and its accessory */
export const ACCESSORY_SPACING = 8;

// =============================================================================
// Animation
// =============================================================================

/** Duration of animated insert, remove, hide and show (ms) */
export const DEFAULT_ANIMATION_DURATION = 300;
