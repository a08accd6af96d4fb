// src/stack/dom.ts
/**
 * rowstack/stack - DOM Structure
 * Container resolution, DOM scaffold and axis styling for the stack.
 */

import type { StackAxis } from "../types";
import { LOG_PREFIX } from "../constants";

// =============================================================================
// Types
// =============================================================================

export interface DOMStructure {
  root: HTMLElement;
  viewport: HTMLElement;
  rows: HTMLElement;
}

// =============================================================================
// Container Resolution
// =============================================================================

export const resolveContainer = (container: HTMLElement | string): HTMLElement => {
  if (typeof container === "string") {
    const el = document.querySelector<HTMLElement>(container);
    if (!el) throw new Error(`${LOG_PREFIX} Container not found: ${container}`);
    return el;
  }
  return container;
};

// =============================================================================
// DOM Structure Factory
// =============================================================================

export const createDOMStructure = (
  container: HTMLElement,
  classPrefix: string,
  ariaLabel?: string,
): DOMStructure => {
  const doc = container.ownerDocument;

  const root = doc.createElement("div");
  root.className = classPrefix;
  root.style.position = "relative";
  root.style.height = "100%";
  root.style.width = "100%";

  const viewport = doc.createElement("div");
  viewport.className = `${classPrefix}-viewport`;
  viewport.style.height = "100%";
  viewport.style.width = "100%";

  const rows = doc.createElement("div");
  rows.className = `${classPrefix}-rows`;
  rows.style.display = "flex";
  rows.setAttribute("role", "list");
  if (ariaLabel) rows.setAttribute("aria-label", ariaLabel);

  viewport.appendChild(rows);
  root.appendChild(viewport);
  container.appendChild(root);

  return { root, viewport, rows };
};

// =============================================================================
// Axis
// =============================================================================

/**
 * Lay rows out along `axis`.
 *
 * The rows container matches the stack along the cross axis only: its
 * width when vertical, its height when horizontal. The main axis grows
 * with the rows and scrolls.
 */
export const applyAxis = (
  dom: DOMStructure,
  axis: StackAxis,
  classPrefix: string,
): void => {
  const horizontal = axis === "horizontal";

  dom.root.classList.toggle(`${classPrefix}--horizontal`, horizontal);
  dom.rows.setAttribute("aria-orientation", axis);
  dom.rows.style.flexDirection = horizontal ? "row" : "column";

  dom.viewport.style.overflowX = horizontal ? "auto" : "hidden";
  dom.viewport.style.overflowY = horizontal ? "hidden" : "auto";

  if (horizontal) {
    dom.rows.style.width = "";
    dom.rows.style.height = "100%";
  } else {
    dom.rows.style.height = "";
    dom.rows.style.width = "100%";
  }
};
