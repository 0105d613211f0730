import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { distanceToSimilarity, euclideanDistance, normalize } from "./vector.js";

describe("euclideanDistance", () => {
  it("measures straight-line distance", () => {
    assert.equal(euclideanDistance([0, 0], [3, 4]), 5);
  });

  it("rejects vectors of different length", () => {
    assert.throws(() => euclideanDistance([1], [1, 2]), RangeError);
  });
});

describe("normalize", () => {
  it("scales to unit length", () => {
    const [x, y] = normalize([3, 4]);
    assert.ok(Math.abs((x ?? 0) - 0.6) < 1e-9);
    assert.ok(Math.abs((y ?? 0) - 0.8) < 1e-9);
  });

  it("leaves a zero vector alone", () => {
    assert.deepEqual(normalize([0, 0]), [0, 0]);
  });
});

describe("distanceToSimilarity", () => {
  it("maps identical vectors to 1 and opposite unit vectors to 0", () => {
    assert.equal(distanceToSimilarity(0), 1);
    assert.equal(distanceToSimilarity(2), 0);
    assert.equal(distanceToSimilarity(1), 0.5);
  });

  it("clamps out-of-range and non-finite distances", () => {
    assert.equal(distanceToSimilarity(3), 0);
    assert.equal(distanceToSimilarity(Number.NaN), 0);
    for (let d = 0; d <= 4; d += 0.25) {
      const value = distanceToSimilarity(d);
      assert.ok(value >= 0 && value <= 1);
    }
  });

  it("equals the dot product for unit vectors", () => {
    const a = normalize([1, 2, 3]);
    const b = normalize([3, 1, 2]);
    const dot = a.reduce((sum, value, i) => sum + value * (b[i] ?? 0), 0);
    assert.ok(Math.abs(distanceToSimilarity(euclideanDistance(a, b)) - dot) < 1e-9);
  });
});
