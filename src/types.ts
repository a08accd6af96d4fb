/**
 * rowstack - Type Definitions
 * Public types for the stack, its cells and events
 */

// =============================================================================
// Shared Types
// =============================================================================

/** Generic event map */
export type EventMap = Record<string, unknown>;

/** Stack direction */
export type StackAxis = "vertical" | "horizontal";

/** Edge insets in pixels */
export interface EdgeInsets {
  top: number;
  left: number;
  bottom: number;
  right: number;
}

/** Rectangle in pixels, relative to the stack's scroll content */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

// =============================================================================
// Capabilities
// =============================================================================

/**
 * Implemented by row content that wants to be told when its row is tapped.
 *
 * A cell only installs its tap recognizer up front for tappable content.
 */
export interface Tappable {
  didTapView(): void;
}

/** Implemented by row content that renders its own pressed state */
export interface Highlightable {
  /** Checked on every pointer event, so content can opt out temporarily */
  readonly isHighlightable: boolean;
  setIsHighlighted(highlighted: boolean): void;
}

/**
 * Constructor used as a type tag for tap handlers.
 * Abstract classes are accepted too.
 */
export type RowType<R extends HTMLElement = HTMLElement> = abstract new (
  ...args: never[]
) => R;

// =============================================================================
// Cell Types
// =============================================================================

/**
 * What the content's edges are aligned to:
 * - 'none': the cell's own bounds
 * - 'layoutMargins': the cell's bounds inset by its insets
 */
export type InsetsReference = "none" | "layoutMargins";

/** Options fixed when a cell is created */
export interface RowCellOptions {
  /** Default: 'layoutMargins' */
  insetsReference?: InsetsReference;

  /** Fixed total height of the cell in pixels */
  overrideHeight?: number;
}

/** Target of a single content edge pin */
export type EdgeTarget = "bounds" | "margins" | "accessory";

/** One content edge pin */
export interface EdgePin {
  readonly target: EdgeTarget;

  /** Distance between the content edge and its target */
  readonly constant: number;

  /** Soft pins give way to a fixed cell height instead of growing the cell */
  readonly required: boolean;
}

/** Content edge pins, by edge */
export interface ContentEdges {
  readonly top: EdgePin;
  readonly left: EdgePin;
  readonly bottom: EdgePin;
  readonly right: EdgePin;
}

/** Tap handler as stored on a cell (already type-checked by the stack) */
export type CellTapHandler = (content: HTMLElement) => void;

/** Wrapper around a single row */
export interface RowCell {
  /** The cell element inserted into the stack */
  readonly element: HTMLElement;

  /** The caller's row */
  readonly content: HTMLElement;

  readonly insetsReference: InsetsReference;
  readonly overrideHeight: number | null;

  /** Content edge pins */
  readonly edges: ContentEdges;

  /** Optional element laid out to the right of the content */
  accessory: HTMLElement | null;

  backgroundColor: string;
  highlightColor: string;
  insets: EdgeInsets;
  isHidden: boolean;

  /** Current opacity, 0-1 */
  opacity: number;

  /** Row-level tap handler, invoked after the content's own didTapView */
  tapHandler: CellTapHandler | null;

  /** Whether a tap recognizer is installed and enabled */
  readonly isTapEnabled: boolean;

  /** Detach listeners */
  destroy: () => void;
}

// =============================================================================
// Stack Configuration
// =============================================================================

/** Stack configuration */
export interface StackConfig {
  /** Container element or selector */
  container: HTMLElement | string;

  /** Rows added on creation */
  rows?: readonly HTMLElement[];

  /** Layout direction (default: 'vertical') */
  axis?: StackAxis;

  /** Custom CSS class prefix (default: 'rowstack') */
  classPrefix?: string;

  /** Accessible label for the list */
  ariaLabel?: string;

  /** Background color of the stack itself (default: '#ffffff') */
  backgroundColor?: string;

  /** Default background color of new rows (default: 'transparent') */
  rowBackgroundColor?: string;

  /** Default highlight color of new rows (default: 'rgb(217, 217, 217)') */
  rowHighlightColor?: string;

  /** Default inset of new rows (default: 12px top and bottom) */
  rowInset?: EdgeInsets;

  /** Duration of animated operations in ms (default: 300) */
  animationDuration?: number;

  /**
   * Returns the cell that wraps the given row.
   *
   * Values set on the cell here may be overwritten by the stack's defaults;
   * use `configureCell` for customization.
   */
  cellForRow?: (row: HTMLElement) => RowCell;

  /** Called for every new cell after the stack's defaults were applied */
  configureCell?: (cell: RowCell) => void;
}

/** Options for insert operations */
export interface InsertOptions {
  /** Fade the new row in (default: false) */
  animated?: boolean;

  /** Runs after `configureCell`, for this insertion only */
  configure?: (cell: RowCell) => void;
}

/** Options for remove and visibility operations */
export interface AnimationOptions {
  animated?: boolean;
}

/** Anchor for insertRow/insertRows */
export type RowPosition = { before: HTMLElement } | { after: HTMLElement };

// =============================================================================
// Event Types
// =============================================================================

/** Events emitted by the stack */
export interface StackEvents extends EventMap {
  /** A cell was inserted at index */
  "row:insert": { row: HTMLElement; index: number };

  /** A cell was detached from the stack */
  "row:remove": { row: HTMLElement };

  /** A row was hidden or shown */
  "row:visibility": { row: HTMLElement; hidden: boolean };

  /** A row's tap recognizer fired */
  "row:tap": { row: HTMLElement };
}

/** Event handler type */
export type EventHandler<T> = (payload: T) => void;

/** Unsubscribe function */
export type Unsubscribe = () => void;

// =============================================================================
// Public API
// =============================================================================

/** Stack instance */
export interface RowStack {
  /** Root DOM element */
  readonly element: HTMLElement;

  /** Layout direction */
  axis: StackAxis;

  // Defaults for new rows
  rowBackgroundColor: string;
  rowHighlightColor: string;
  rowInset: EdgeInsets;

  // Adding and removing rows
  addRow: (row: HTMLElement, options?: InsertOptions) => void;
  addRows: (rows: readonly HTMLElement[], options?: InsertOptions) => void;
  prependRow: (row: HTMLElement, options?: InsertOptions) => void;
  prependRows: (rows: readonly HTMLElement[], options?: InsertOptions) => void;
  insertRow: (
    row: HTMLElement,
    position: RowPosition,
    options?: InsertOptions,
  ) => void;
  insertRows: (
    rows: readonly HTMLElement[],
    position: RowPosition,
    options?: InsertOptions,
  ) => void;
  removeRow: (row: HTMLElement, options?: AnimationOptions) => void;
  removeRows: (rows: readonly HTMLElement[], options?: AnimationOptions) => void;
  removeAllRows: (options?: AnimationOptions) => void;

  /** Replace every row with `rows`, in order */
  setRows: (rows: readonly HTMLElement[]) => void;

  // Accessing rows
  readonly firstRow: HTMLElement | null;
  readonly lastRow: HTMLElement | null;
  rows: () => HTMLElement[];
  containsRow: (row: HTMLElement) => boolean;
  /** The cell currently wrapping `row`, or null when `row` is not in the stack */
  cellOfRow: (row: HTMLElement) => RowCell | null;

  // Hiding and showing rows
  hideRow: (row: HTMLElement, options?: AnimationOptions) => void;
  hideRows: (rows: readonly HTMLElement[], options?: AnimationOptions) => void;
  showRow: (row: HTMLElement, options?: AnimationOptions) => void;
  showRows: (rows: readonly HTMLElement[], options?: AnimationOptions) => void;
  setRowHidden: (
    row: HTMLElement,
    hidden: boolean,
    options?: AnimationOptions,
  ) => void;
  setRowsHidden: (
    rows: readonly HTMLElement[],
    hidden: boolean,
    options?: AnimationOptions,
  ) => void;
  isRowHidden: (row: HTMLElement) => boolean;

  // Handling user interaction
  setTapHandler: <R extends HTMLElement>(
    row: R,
    handler: ((row: R) => void) | null,
    type?: RowType<R>,
  ) => void;

  // Styling rows
  setBackgroundColor: (
    rows: HTMLElement | readonly HTMLElement[],
    color: string,
  ) => void;
  setInset: (rows: HTMLElement | readonly HTMLElement[], inset: EdgeInsets) => void;

  // Scrolling
  scrollRowToVisible: (row: HTMLElement, options?: AnimationOptions) => void;

  // Events
  on: <K extends keyof StackEvents>(
    event: K,
    handler: EventHandler<StackEvents[K]>,
  ) => Unsubscribe;
  off: <K extends keyof StackEvents>(
    event: K,
    handler: EventHandler<StackEvents[K]>,
  ) => void;

  // Lifecycle
  destroy: () => void;
}
