/**
 * rowstack/cell - Row Cell
 * The wrapper element around every row: edge insets, background and
 * highlight colors, accessory placement, tap and highlight forwarding.
 */

import type {
  CellTapHandler,
  ContentEdges,
  EdgeInsets,
  RowCell,
  RowCellOptions,
} from "../types";
import {
  DEFAULT_ROW_BACKGROUND_COLOR,
  DEFAULT_ROW_HIGHLIGHT_COLOR,
  ZERO_INSETS,
} from "../constants";
import { isInteractionEnabled, isTappable } from "./capabilities";
import { createTapRecognizer, type TapRecognizer } from "./gesture";
import { createHighlightTracker } from "./highlight";
import {
  applyAccessoryStyles,
  applyCellBoxStyles,
  applyContentEdges,
  clearAccessoryStyles,
  resolveContentEdges,
} from "./layout";

// =============================================================================
// Cell Registry
// =============================================================================

/** Cell element → cell. Only cells made by createRowCell are in here. */
const cellsByElement = new WeakMap<Element, RowCell>();

/** The cell whose element is `element`, or null */
export const cellFromElement = (element: Element | null): RowCell | null =>
  element ? (cellsByElement.get(element) ?? null) : null;

/** The cell currently wrapping `row`, or null */
export const cellOfRow = (row: HTMLElement): RowCell | null => {
  const cell = cellFromElement(row.parentElement);
  return cell && cell.content === row ? cell : null;
};

// =============================================================================
// Factory
// =============================================================================

/**
 * Wrap `content` in a new cell.
 *
 * The content is moved into the cell element, so a row that was wrapped
 * before leaves its previous cell empty.
 *
 * ```ts
 * const cell = createRowCell(row, { insetsReference: 'none', overrideHeight: 44 })
 * cell.accessory = chevron
 * ```
 */
export const createRowCell = (
  content: HTMLElement,
  options: RowCellOptions = {},
): RowCell => {
  const insetsReference = options.insetsReference ?? "layoutMargins";
  const overrideHeight = options.overrideHeight ?? null;

  const element = content.ownerDocument.createElement("div");
  element.setAttribute("role", "listitem");

  let insets: EdgeInsets = { ...ZERO_INSETS };
  let accessory: HTMLElement | null = null;
  let edges: ContentEdges = resolveContentEdges(insetsReference, insets, false);
  let backgroundColor = DEFAULT_ROW_BACKGROUND_COLOR;
  let highlightColor = DEFAULT_ROW_HIGHLIGHT_COLOR;
  let highlighted = false;
  let isHidden = false;
  let opacity = 1;
  let tapHandler: CellTapHandler | null = null;
  let recognizer: TapRecognizer | null = null;

  element.appendChild(content);
  applyCellBoxStyles(element, content, overrideHeight);
  applyContentEdges(element, edges, insets);

  const relayout = (): void => {
    edges = resolveContentEdges(insetsReference, insets, accessory !== null);
    applyContentEdges(element, edges, insets);
  };

  const paintBackground = (): void => {
    element.style.backgroundColor = highlighted
      ? highlightColor
      : backgroundColor;
  };

  paintBackground();

  // ── Taps ──────────────────────────────────────────────────────

  const handleTap = (): void => {
    if (!isInteractionEnabled(content)) return;
    if (isTappable(content)) content.didTapView();
    tapHandler?.(content);
  };

  const installRecognizer = (): TapRecognizer => {
    if (!recognizer) {
      recognizer = createTapRecognizer(element, handleTap);
    }
    return recognizer;
  };

  if (isTappable(content)) installRecognizer();

  // ── Highlight ─────────────────────────────────────────────────

  const highlightTracker = createHighlightTracker(
    element,
    content,
    (value) => {
      highlighted = value;
      paintBackground();
    },
  );

  // ── Public shape ──────────────────────────────────────────────

  const cell: RowCell = {
    element,
    content,
    insetsReference,
    overrideHeight,

    get edges() {
      return edges;
    },

    get accessory() {
      return accessory;
    },
    set accessory(value: HTMLElement | null) {
      if (value === accessory) return;

      if (accessory) {
        accessory.remove();
        clearAccessoryStyles(accessory);
      }

      accessory = value;
      if (accessory) {
        applyAccessoryStyles(accessory);
        element.appendChild(accessory);
      }
      relayout();
    },

    get backgroundColor() {
      return backgroundColor;
    },
    set backgroundColor(value: string) {
      backgroundColor = value;
      paintBackground();
    },

    get highlightColor() {
      return highlightColor;
    },
    set highlightColor(value: string) {
      highlightColor = value;
      paintBackground();
    },

    get insets() {
      return { ...insets };
    },
    set insets(value: EdgeInsets) {
      insets = { ...value };
      relayout();
    },

    get isHidden() {
      return isHidden;
    },
    set isHidden(value: boolean) {
      isHidden = value;
      element.style.display = value ? "none" : "flex";
      element.setAttribute("aria-hidden", String(value));
    },

    get opacity() {
      return opacity;
    },
    set opacity(value: number) {
      opacity = value;
      element.style.opacity = String(value);
    },

    get tapHandler() {
      return tapHandler;
    },
    set tapHandler(handler: CellTapHandler | null) {
      tapHandler = handler;
      if (handler) {
        installRecognizer().enabled = true;
      } else if (recognizer) {
        recognizer.enabled = false;
      }
    },

    get isTapEnabled() {
      return recognizer?.enabled ?? false;
    },

    destroy() {
      recognizer?.destroy();
      recognizer = null;
      highlightTracker.destroy();
    },
  };

  cellsByElement.set(element, cell);
  return cell;
};
