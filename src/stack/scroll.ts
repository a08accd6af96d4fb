/**
 * rowstack/stack - Scroll Into View
 * Minimal scrolling that brings a rectangle of the scroll content on screen
 */

import type { Rect } from "../types";

// =============================================================================
// Geometry
// =============================================================================

/**
 * Rectangle of `element` in the coordinate space of the viewport's scroll
 * content, i.e. independent of the current scroll position.
 */
export const getContentRect = (viewport: HTMLElement, element: HTMLElement): Rect => {
  const viewportRect = viewport.getBoundingClientRect();
  const rect = element.getBoundingClientRect();

  return {
    x: rect.left - viewportRect.left + viewport.scrollLeft,
    y: rect.top - viewportRect.top + viewport.scrollTop,
    width: rect.width,
    height: rect.height,
  };
};

/**
 * New scroll offset along one axis that makes [start, start + length)
 * visible, moving as little as possible. A span longer than the viewport
 * is aligned to its start.
 */
export const scrollOffsetToReveal = (
  offset: number,
  size: number,
  start: number,
  length: number,
): number => {
  if (start < offset) return start;
  if (start + length > offset + size) {
    return length > size ? start : start + length - size;
  }
  return offset;
};

// =============================================================================
// Scrolling
// =============================================================================

/**
 * Scroll `viewport` so that `rect` is fully visible.
 * Does nothing when it already is.
 */
export const scrollRectToVisible = (
  viewport: HTMLElement,
  rect: Rect,
  animated: boolean,
): void => {
  const left = scrollOffsetToReveal(
    viewport.scrollLeft,
    viewport.clientWidth,
    rect.x,
    rect.width,
  );
  const top = scrollOffsetToReveal(
    viewport.scrollTop,
    viewport.clientHeight,
    rect.y,
    rect.height,
  );

  if (left === viewport.scrollLeft && top === viewport.scrollTop) return;

  viewport.scrollTo({ left, top, behavior: animated ? "smooth" : "auto" });
};
