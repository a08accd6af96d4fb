/**
 * Shared test helpers
 */

import { vi, type Mock } from "vitest";
import type { Highlightable, Tappable } from "../src/types";

/** Plain row element with an id for readable assertions */
export const createRow = (id: string): HTMLDivElement => {
  const row = document.createElement("div");
  row.id = id;
  row.textContent = id;
  return row;
};

/** Row that implements Tappable with a spy */
export const createTappableRow = (
  id: string,
): HTMLDivElement & Tappable & { didTapView: Mock } =>
  Object.assign(createRow(id), { didTapView: vi.fn() });

/** Row that implements Highlightable with a spy */
export const createHighlightableRow = (
  id: string,
  isHighlightable = true,
): HTMLDivElement &
  Highlightable & { setIsHighlighted: Mock } =>
  Object.assign(createRow(id), { isHighlightable, setIsHighlighted: vi.fn() });

/** A DOMRect-shaped value for getBoundingClientRect stubs */
export const rect = (
  left: number,
  top: number,
  width: number,
  height: number,
): DOMRect => ({
  x: left,
  y: top,
  left,
  top,
  width,
  height,
  right: left + width,
  bottom: top + height,
  toJSON: () => ({}),
});

/** Dispatch a bubbling pointer-style event with coordinates */
export const pointer = (
  target: EventTarget,
  type: "pointerdown" | "pointermove" | "pointerup" | "pointercancel",
  clientX = 0,
  clientY = 0,
): void => {
  target.dispatchEvent(
    new MouseEvent(type, { bubbles: true, clientX, clientY }),
  );
};
