import { assert, createSeededRng, liveCells, test } from "@cellterm/testkit";
import { createBoard, isAlive } from "../board.js";
import { clearBoard, randomTrialCount, randomize, toggleAt } from "../engine/edit.js";
import type { Rng } from "../rng.js";

test("randomTrialCount floors a quarter of the area", () => {
  assert.equal(randomTrialCount(3, 3), 2);
  assert.equal(randomTrialCount(5, 5), 6);
  assert.equal(randomTrialCount(10, 8), 20);
});

test("randomize stays in bounds and never exceeds the trial count", () => {
  const rng = createSeededRng(42);
  for (let i = 0; i < 10; i++) {
    const board = randomize(createBoard(10, 8), rng);
    assert.ok(board.occupied.size <= 20);
    for (const c of board.occupied.values()) {
      assert.ok(c.x >= 0 && c.x < 10 && c.y >= 0 && c.y < 8);
    }
  }
});

test("randomize collapses duplicate draws", () => {
  const zero: Rng = { nextInt: () => 0 };
  const board = randomize(createBoard(6, 6), zero);
  assert.deepEqual(liveCells(board), [[0, 0]]);
});

test("randomize replaces existing cells and is reproducible for a seed", () => {
  const start = createBoard(12, 12, [{ x: 11, y: 11 }]);
  const a = randomize(start, createSeededRng(9));
  const b = randomize(start, createSeededRng(9));
  assert.deepEqual(liveCells(a), liveCells(b));
  assert.equal(a.width, 12);
});

test("clearBoard keeps dimensions", () => {
  const cleared = clearBoard(createBoard(4, 3, [{ x: 1, y: 1 }]));
  assert.equal(cleared.occupied.size, 0);
  assert.equal(cleared.width, 4);
  assert.equal(cleared.height, 3);
});

test("toggleAt twice restores the cell and ignores out-of-range coordinates", () => {
  const board = createBoard(4, 4);
  const once = toggleAt(board, 2, 3);
  assert.equal(isAlive(once, 2, 3), true);
  assert.equal(isAlive(toggleAt(once, 2, 3), 2, 3), false);
  assert.equal(toggleAt(board, 4, 0), board);
  assert.equal(toggleAt(board, 0, -1), board);
});
