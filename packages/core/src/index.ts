/**
 * @cellterm/core
 *
 * Runtime-agnostic core: cell set, automaton engine, renderer, layout,
 * keybindings and the interactive session loop.
 * This package MUST NOT use Node-specific APIs (Buffer, node:* imports).
 */

// =============================================================================
// Cells and board
// =============================================================================

export {
  type Cell,
  type CellKey,
  type CellSet,
  cell,
  cellKey,
  cellSetOf,
  emptyCellSet,
  hasCell,
  sortedCells,
  toggleCell,
  withCell,
  withoutCell,
} from "./cells.js";
export {
  type Board,
  createBoard,
  isAlive,
  isInBounds,
  populationOf,
  withOccupied,
} from "./board.js";
export { CellTermError, type CellTermErrorCode, isCellTermError } from "./errors.js";
export { type Rng, createMathRng, createSeededRng } from "./rng.js";

// =============================================================================
// Engine
// =============================================================================

export { type NeighborTally, advance, advanceBy, countNeighbors } from "./engine/advance.js";
export {
  RANDOM_DENSITY_DIVISOR,
  clearBoard,
  randomTrialCount,
  randomize,
  toggleAt,
} from "./engine/edit.js";

// =============================================================================
// Rendering and layout
// =============================================================================

export { SIDE_BORDER, renderBoard } from "./renderer/board.js";
export { type PositionedText, renderDelayReadout, renderFrame } from "./renderer/frame.js";
export { DEAD_CELL, GLYPHS, type GlyphName, glyphChar, nextGlyph } from "./renderer/glyphs.js";
export {
  type FrameLayout,
  INSTRUCTIONS,
  type InstructionEntry,
  MIN_BOARD_HEIGHT,
  MIN_BOARD_WIDTH,
  PANEL_HEIGHT,
  PANEL_WIDTH,
  type RequestedSize,
  type ScreenPoint,
  type Viewport,
  cellToScreen,
  computeLayout,
  fitBoardToViewport,
  requiredViewport,
} from "./layout.js";

// =============================================================================
// Input and session
// =============================================================================

export {
  type DisplaySink,
  type InputSource,
  type InputSymbol,
  NOOP_LOGGER,
  type SessionLogger,
  type Sleep,
  type ViewportProbe,
} from "./ports.js";
export { resolveInputSymbol } from "./keybindings.js";
export {
  DEFAULT_DELAY_MS,
  DELAY_STEP_MS,
  MAX_DELAY_MS,
  MIN_DELAY_MS,
  advanceSession,
  clampCursor,
  clampDelay,
  createSessionState,
  reduceSession,
} from "./session/state.js";
export {
  type SessionPorts,
  type TickResult,
  computeTick,
  guardDisplay,
  runSession,
} from "./session/loop.js";
export type {
  SessionOptions,
  SessionState,
  SessionSummary,
  SessionTransition,
} from "./session/types.js";
