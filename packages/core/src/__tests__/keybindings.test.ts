import assert from "node:assert/strict";
import test from "node:test";
import { resolveInputSymbol } from "../keybindings.js";

test("keybinding map resolves expected symbols", () => {
  assert.equal(resolveInputSymbol("q"), "quit");
  assert.equal(resolveInputSymbol("Q"), "quit");
  assert.equal(resolveInputSymbol("ctrl+c"), "quit");
  assert.equal(resolveInputSymbol("space"), "toggle-pause");
  assert.equal(resolveInputSymbol("r"), "randomize");
  assert.equal(resolveInputSymbol("c"), "clear");
  assert.equal(resolveInputSymbol("f"), "step-once");
  assert.equal(resolveInputSymbol("up"), "move-up");
  assert.equal(resolveInputSymbol("j"), "move-down");
  assert.equal(resolveInputSymbol("left"), "move-left");
  assert.equal(resolveInputSymbol("l"), "move-right");
  assert.equal(resolveInputSymbol("enter"), "toggle-cell");
  assert.equal(resolveInputSymbol("v"), "toggle-cursor-visibility");
  assert.equal(resolveInputSymbol("g"), "toggle-glyph");
  assert.equal(resolveInputSymbol("+"), "increase-delay");
  assert.equal(resolveInputSymbol("-"), "decrease-delay");
});

test("unknown keys and prototype names are unrecognized", () => {
  assert.equal(resolveInputSymbol("z"), "unrecognized");
  assert.equal(resolveInputSymbol("unknown"), "unrecognized");
  assert.equal(resolveInputSymbol("constructor"), "unrecognized");
  assert.equal(resolveInputSymbol(""), "unrecognized");
});
