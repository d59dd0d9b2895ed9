import assert from "node:assert/strict";
import { test } from "vitest";

import { toOriginalOffset, toOriginalRanges } from "../../../src/text/mappings.js";

// "<root><p>Hello</p><p>World</p></root>" normalizes to "Hello\nWorld".
const MAPPINGS = [
  { originalRange: { start: 9, end: 14 }, normalizedRange: { start: 0, end: 5 } },
  { originalRange: { start: 21, end: 26 }, normalizedRange: { start: 6, end: 11 } },
];

test("toOriginalOffset follows the mapping that covers the offset", () => {
  assert.equal(toOriginalOffset(MAPPINGS, 0), 9);
  assert.equal(toOriginalOffset(MAPPINGS, 4), 13);
  assert.equal(toOriginalOffset(MAPPINGS, 6), 21);
  assert.equal(toOriginalOffset(MAPPINGS, 10), 25);
});

test("toOriginalOffset has no source for inserted breaks or out-of-range offsets", () => {
  assert.equal(toOriginalOffset(MAPPINGS, 5), null);
  assert.equal(toOriginalOffset(MAPPINGS, 11), null);
  assert.equal(toOriginalOffset(MAPPINGS, -1), null);
  assert.equal(toOriginalOffset([], 0), null);
});

test("toOriginalRanges splits a range at mapping boundaries", () => {
  assert.deepEqual(toOriginalRanges(MAPPINGS, { start: 3, end: 8 }), [
    { start: 12, end: 14 },
    { start: 21, end: 23 },
  ]);
  assert.deepEqual(toOriginalRanges(MAPPINGS, { start: 1, end: 3 }), [{ start: 10, end: 12 }]);
  assert.deepEqual(toOriginalRanges(MAPPINGS, { start: 0, end: 11 }), [
    { start: 9, end: 14 },
    { start: 21, end: 26 },
  ]);
});

test("toOriginalRanges is empty for breaks and empty ranges", () => {
  assert.deepEqual(toOriginalRanges(MAPPINGS, { start: 5, end: 6 }), []);
  assert.deepEqual(toOriginalRanges(MAPPINGS, { start: 2, end: 2 }), []);
  assert.deepEqual(toOriginalRanges(MAPPINGS, { start: 8, end: 3 }), []);
});
