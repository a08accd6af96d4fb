/**
 * rowstack/cell - Edge Layout
 * Resolves what each content edge is pinned to, then maps the pins onto
 * the cell's flex box.
 */

import type {
  ContentEdges,
  EdgeInsets,
  EdgePin,
  InsetsReference,
} from "../types";
import { ACCESSORY_SPACING } from "../constants";

// =============================================================================
// Edge Pins
// =============================================================================

const pin = (
  reference: InsetsReference,
  inset: number,
  required = true,
): EdgePin =>
  reference === "layoutMargins"
    ? { target: "margins", constant: inset, required }
    : { target: "bounds", constant: 0, required };

/**
 * Resolve the four content edge pins.
 *
 * The bottom pin is never required, so zero-height content or a fixed cell
 * height clips the content instead of conflicting with it. With an accessory
 * the right pin targets the accessory's left edge.
 */
export const resolveContentEdges = (
  reference: InsetsReference,
  insets: EdgeInsets,
  hasAccessory: boolean,
): ContentEdges => ({
  top: pin(reference, insets.top),
  left: pin(reference, insets.left),
  bottom: pin(reference, insets.bottom, false),
  right: hasAccessory
    ? { target: "accessory", constant: ACCESSORY_SPACING, required: true }
    : pin(reference, insets.right),
});

// =============================================================================
// DOM Mapping
// =============================================================================

/**
 * Apply pins as cell padding.
 * An accessory is always right-aligned to the cell's margin.
 */
export const applyContentEdges = (
  cell: HTMLElement,
  edges: ContentEdges,
  insets: EdgeInsets,
): void => {
  const right =
    edges.right.target === "accessory" ? insets.right : edges.right.constant;

  cell.style.paddingTop = `${edges.top.constant}px`;
  cell.style.paddingLeft = `${edges.left.constant}px`;
  cell.style.paddingBottom = `${edges.bottom.constant}px`;
  cell.style.paddingRight = `${right}px`;
};

/** Static styles of the cell box and its content */
export const applyCellBoxStyles = (
  cell: HTMLElement,
  content: HTMLElement,
  overrideHeight: number | null,
): void => {
  cell.style.display = "flex";
  cell.style.flexDirection = "row";
  cell.style.alignItems = "stretch";
  cell.style.boxSizing = "border-box";
  cell.style.overflow = "hidden";
  cell.style.flexShrink = "0";

  if (overrideHeight !== null) {
    cell.style.height = `${overrideHeight}px`;
  }

  content.style.flex = "1 1 auto";
  content.style.minWidth = "0";
};

/** Styles an accessory needs to sit right of the content */
export const applyAccessoryStyles = (accessory: HTMLElement): void => {
  accessory.style.flex = "0 0 auto";
  accessory.style.alignSelf = "center";
  accessory.style.marginLeft = `${ACCESSORY_SPACING}px`;
};

/** Undo {@link applyAccessoryStyles} on a detached accessory */
export const clearAccessoryStyles = (accessory: HTMLElement): void => {
  accessory.style.flex = "";
  accessory.style.alignSelf = "";
  accessory.style.marginLeft = "";
};
