import assert from "node:assert/strict";

import { reconcileDrift } from "../src/utils/allocations";
import { resolveIdentifier } from "../src/utils/identifier";
import { roundHalfAwayFromZero, roundTo } from "../src/utils/rounding";

export const tests = [
  {
    name: "roundHalfAwayFromZero moves exact halves away from zero",
    run: () => {
      assert.equal(roundHalfAwayFromZero(2.5), 3);
      assert.equal(roundHalfAwayFromZero(-2.5), -3);
      assert.equal(roundHalfAwayFromZero(2.4), 2);
      assert.equal(roundHalfAwayFromZero(3.5), 4);
      assert.equal(roundTo(33.3333, 2), 33.33);
      assert.equal(roundTo(12.345, 1), 12.3);
    },
  },
  {
    name: "reconcileDrift assigns drift to the first largest count",
    run: () => {
      assert.deepEqual(reconcileDrift([3, 3, 3], 10), [4, 3, 3]);
      assert.deepEqual(reconcileDrift([3, 3], 5), [2, 3]);
      assert.deepEqual(reconcileDrift([1, 5, 2], 7), [1, 4, 2]);
      assert.deepEqual(reconcileDrift([2, 8], 10), [2, 8]);
      assert.deepEqual(reconcileDrift([], 4), []);
    },
  },
  {
    name: "resolveIdentifier tags numeric strings as serials and the rest as names",
    run: () => {
      assert.deepEqual(resolveIdentifier("1001"), {
        ok: true,
        value: { kind: "serial", value: "1001" },
      });
      assert.deepEqual(resolveIdentifier(" Brown Sugar "), {
        ok: true,
        value: { kind: "name", value: "Brown Sugar" },
      });
      assert.deepEqual(resolveIdentifier("10a"), {
        ok: true,
        value: { kind: "name", value: "10a" },
      });
      const empty = resolveIdentifier("   ");
      assert.equal(empty.ok ? "ok" : empty.error.kind, "InvalidInput");
    },
  },
];
