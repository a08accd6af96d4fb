/**
 * rowstack/cell - Tap Recognition
 * Row-level tap recognizer that gives way to interactive controls inside the row
 */

// =============================================================================
// Interactive Controls
// =============================================================================

const CONTROL_TAGS = new Set([
  "BUTTON",
  "INPUT",
  "SELECT",
  "TEXTAREA",
  "OPTION",
  "LABEL",
  "SUMMARY",
]);

const CONTROL_ROLES = new Set([
  "button",
  "link",
  "checkbox",
  "switch",
  "radio",
  "slider",
  "textbox",
  "menuitem",
  "tab",
]);

/** Whether the element handles its own pointer input */
export const isInteractiveControl = (element: Element): boolean => {
  if (CONTROL_TAGS.has(element.tagName)) return true;
  if (element.tagName === "A" && element.hasAttribute("href")) return true;

  const editable = element.getAttribute("contenteditable");
  if (editable !== null && editable !== "false") return true;

  const role = element.getAttribute("role");
  return role !== null && CONTROL_ROLES.has(role);
};

// =============================================================================
// Disambiguation
// =============================================================================

/**
 * Decide whether a tap that hit `target` belongs to the row.
 *
 * Walks from the hit element up through its ancestors, stopping at (and
 * including) `owner`. Any interactive control on the way keeps the tap.
 */
export const shouldReceiveTap = (
  owner: Element,
  target: EventTarget | null,
): boolean => {
  let node: Element | null =
    target instanceof Element
      ? target
      : target instanceof Node
        ? target.parentElement
        : null;

  while (node) {
    if (isInteractiveControl(node)) return false;
    if (node === owner) break;
    node = node.parentElement;
  }

  return true;
};

// =============================================================================
// Recognizer
// =============================================================================

export interface TapRecognizer {
  /** Disabled recognizers ignore every tap */
  enabled: boolean;
  destroy: () => void;
}

/**
 * Attach a tap recognizer to `owner`.
 * `onTap` runs for every click that passes {@link shouldReceiveTap}.
 */
export const createTapRecognizer = (
  owner: HTMLElement,
  onTap: (event: MouseEvent) => void,
): TapRecognizer => {
  let enabled = true;

  const handleClick = (event: MouseEvent): void => {
    if (!enabled) return;
    if (!shouldReceiveTap(owner, event.target)) return;
    onTap(event);
  };

  owner.addEventListener("click", handleClick);

  return {
    get enabled() {
      return enabled;
    },
    set enabled(value: boolean) {
      enabled = value;
    },
    destroy() {
      owner.removeEventListener("click", handleClick);
    },
  };
};
