/**
 * rowstack/cell - Content Capabilities
 * Runtime checks for the optional Tappable and Highlightable interfaces
 */

import type { Highlightable, Tappable } from "../types";

export const isTappable = <E extends HTMLElement>(
  content: E,
): content is E & Tappable =>
  "didTapView" in content && typeof content.didTapView === "function";

export const isHighlightable = <E extends HTMLElement>(
  content: E,
): content is E & Highlightable =>
  "setIsHighlighted" in content &&
  typeof content.setIsHighlighted === "function" &&
  "isHighlightable" in content;

/**
 * Whether the content currently accepts user interaction.
 * `inert` and `aria-disabled="true"` both switch it off.
 */
export const isInteractionEnabled = (content: HTMLElement): boolean =>
  !content.hasAttribute("inert") &&
  content.getAttribute("aria-disabled") !== "true";
