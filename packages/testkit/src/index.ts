export { assert, describe, test } from "./nodeTest.js";
export {
  type DisplayCall,
  type InstantSleep,
  type RecordingDisplay,
  type RecordingLogger,
  type ScriptedInput,
  createInstantSleep,
  createRecordingDisplay,
  createRecordingLogger,
  createScriptedInput,
} from "./doubles.js";
export { boardFromRows, liveCells } from "./patterns.js";
export { type Rng, createSeededRng } from "@cellterm/core";
