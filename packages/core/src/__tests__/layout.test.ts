import { assert, test } from "@cellterm/testkit";
import { CellTermError } from "../errors.js";
import {
  MIN_BOARD_HEIGHT,
  MIN_BOARD_WIDTH,
  PANEL_HEIGHT,
  PANEL_WIDTH,
  cellToScreen,
  computeLayout,
  fitBoardToViewport,
  requiredViewport,
} from "../layout.js";

test("panel geometry constants", () => {
  assert.equal(PANEL_WIDTH, 29);
  assert.equal(PANEL_HEIGHT, 12);
  assert.equal(MIN_BOARD_WIDTH, 28);
  assert.equal(MIN_BOARD_HEIGHT, 4);
});

test("computeLayout places panel rows below the board", () => {
  const layout = computeLayout(28, 4);
  assert.deepEqual(layout.boardOrigin, { col: 0, row: 1 });
  assert.equal(layout.bottomBorderRow, 5);
  assert.equal(layout.panelTopRow, 6);
  assert.deepEqual(layout.delayReadout, { col: 2, row: 16 });
  assert.equal(layout.panelBottomRow, 17);
  assert.equal(layout.exitRow, 18);
  assert.deepEqual(layout.required, { cols: 30, rows: 18 });
});

test("cellToScreen offsets by the border", () => {
  const layout = computeLayout(40, 10);
  assert.deepEqual(cellToScreen(layout, 0, 0), { col: 1, row: 1 });
  assert.deepEqual(cellToScreen(layout, 5, 3), { col: 6, row: 4 });
});

test("requiredViewport never goes below the panel width", () => {
  assert.deepEqual(requiredViewport(10, 4), { cols: 29, rows: 18 });
  assert.deepEqual(requiredViewport(100, 30), { cols: 102, rows: 44 });
});

test("fitBoardToViewport fills the viewport by default and clips requests", () => {
  assert.deepEqual(fitBoardToViewport({ cols: 80, rows: 24 }), { width: 78, height: 10 });
  assert.deepEqual(fitBoardToViewport({ cols: 80, rows: 24 }, { width: 40, height: 100 }), {
    width: 40,
    height: 10,
  });
});

test("fitBoardToViewport rejects a viewport that cannot hold the minimum board", () => {
  for (const viewport of [
    { cols: 29, rows: 24 },
    { cols: 80, rows: 17 },
  ]) {
    assert.throws(
      () => fitBoardToViewport(viewport),
      (err: unknown) =>
        err instanceof CellTermError &&
        err.code === "VIEWPORT_TOO_SMALL" &&
        err.message.endsWith("at least 30x18 is needed"),
    );
  }
});

test("fitBoardToViewport rejects requests below the minimum board", () => {
  assert.throws(
    () => fitBoardToViewport({ cols: 80, rows: 24 }, { width: 10 }),
    (err: unknown) => err instanceof CellTermError && err.code === "INVALID_ARGUMENT",
  );
  assert.throws(
    () => fitBoardToViewport({ cols: 80, rows: 24 }, { height: 2 }),
    (err: unknown) => err instanceof CellTermError && err.code === "INVALID_ARGUMENT",
  );
});
