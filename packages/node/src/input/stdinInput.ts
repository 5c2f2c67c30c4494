import type { EventEmitter } from "node:events";
import {
  type InputSource,
  type InputSymbol,
  NOOP_LOGGER,
  type SessionLogger,
  resolveInputSymbol,
} from "@cellterm/core";
import { decodeKeys, flushStaleKeys } from "./keyDecoder.js";

/** The part of `process.stdin` the input source relies on. */
export type RawInputStream = EventEmitter &
  Readonly<{
    isTTY?: boolean;
    setRawMode?: (mode: boolean) => unknown;
    setEncoding: (encoding: BufferEncoding) => unknown;
    resume: () => unknown;
    pause: () => unknown;
  }>;

export type StdinInputSource = InputSource &
  Readonly<{
    /** Enters raw mode and starts queueing keys. Idempotent. */
    start: () => void;
    /** Restores cooked mode and stops listening. Idempotent. */
    dispose: () => void;
    /** Queues a symbol that did not come from the keyboard (e.g. a signal). */
    push: (symbol: InputSymbol) => void;
    pending: () => number;
  }>;

export type StdinInputOptions = Readonly<{
  /** Oldest keys are kept; keys beyond this many pending ones are dropped, except `quit`. */
  maxPending?: number;
  logger?: SessionLogger;
}>;

const DEFAULT_MAX_PENDING = 64;

function chunkToText(chunk: unknown): string {
  if (typeof chunk === "string") return chunk;
  if (Buffer.isBuffer(chunk)) return chunk.toString("utf8");
  return "";
}

function hasRawMode(stream: RawInputStream): boolean {
  return stream.isTTY === true && typeof stream.setRawMode === "function";
}

/**
 * Non-blocking keyboard source over a readable stream. Keys arrive on `data`
 * events and wait in a FIFO queue; `poll()` takes at most one and returns
 * immediately.
 *
 * An escape sequence cut off at the end of a read waits for its remaining
 * bytes. If a whole poll passes with no new data, the next poll decodes the
 * tail as it stands, so a bare ESC press still arrives one tick late.
 */
export function createStdinInputSource(
  stream: RawInputStream,
  opts: StdinInputOptions = {},
): StdinInputSource {
  const maxPending = opts.maxPending ?? DEFAULT_MAX_PENDING;
  const logger = opts.logger ?? NOOP_LOGGER;
  const queue: InputSymbol[] = [];
  let carry = "";
  let carrySeenByPoll = false;
  let overflowing = false;
  let started = false;

  const enqueue = (symbol: InputSymbol): void => {
    if (symbol === "quit") {
      queue.push(symbol);
      return;
    }
    if (queue.length < maxPending) {
      overflowing = false;
      queue.push(symbol);
      return;
    }
    if (!overflowing) {
      overflowing = true;
      logger.warn(`input backlog full at ${String(maxPending)} keys, dropping keys`);
    }
  };

  const enqueueKeys = (keys: readonly string[]): void => {
    for (const key of keys) {
      enqueue(resolveInputSymbol(key));
    }
  };

  const onData = (chunk: unknown): void => {
    const decoded = decodeKeys(carry + chunkToText(chunk));
    carry = decoded.rest;
    carrySeenByPoll = false;
    enqueueKeys(decoded.keys);
  };

  const flushStaleCarry = (): void => {
    if (carry.length === 0) return;
    if (!carrySeenByPoll) {
      carrySeenByPoll = true;
      return;
    }
    const stale = carry;
    carry = "";
    carrySeenByPoll = false;
    enqueueKeys(flushStaleKeys(stale));
  };

  return {
    poll: () => {
      flushStaleCarry();
      return queue.shift();
    },
    start: () => {
      if (started) return;
      started = true;
      if (hasRawMode(stream)) stream.setRawMode?.(true);
      stream.setEncoding("utf8");
      stream.on("data", onData);
      stream.resume();
    },
    dispose: () => {
      if (!started) return;
      started = false;
      stream.off("data", onData);
      if (hasRawMode(stream)) stream.setRawMode?.(false);
      stream.pause();
      carry = "";
      carrySeenByPoll = false;
    },
    push: (symbol) => {
      queue.push(symbol);
    },
    pending: () => queue.length,
  };
}
