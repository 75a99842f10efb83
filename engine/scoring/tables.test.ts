import assert from "node:assert/strict";
import test from "node:test";

import { ConfigurationError } from "../ai/errors";
import { getPavementTables, loadPavementTables, parsePavementTables } from "./tables";

test("shipped tables load once and are frozen", () => {
  const tables = getPavementTables();

  assert.equal(getPavementTables(), tables);
  assert.equal(tables.correction.variant, "astm-d6433");
  assert.ok(Object.isFrozen(tables));
  assert.ok(Object.isFrozen(tables.deductCurves.pothole.high));
});

test("rejects tables with a decreasing deduct curve", () => {
  const tables = getPavementTables();

  assert.throws(
    () =>
      parsePavementTables({
        ...tables,
        deductCurves: {
          ...tables.deductCurves,
          marking: {
            ...tables.deductCurves.marking,
            low: [
              { density: 1, deduct: 10 },
              { density: 10, deduct: 5 },
            ],
          },
        },
      }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.equal(
        error.message,
        "[config] Invalid pavement tables: deductCurves.marking.low deducts must be non-decreasing",
      );
      return true;
    },
  );
});

test("rejects rating bands out of order", () => {
  const tables = getPavementTables();

  assert.throws(
    () => parsePavementTables({ ...tables, ratingBands: [...tables.ratingBands].reverse() }),
    ConfigurationError,
  );
});

test("rejects an unknown correction variant", () => {
  const tables = getPavementTables();

  assert.throws(
    () => parsePavementTables({ ...tables, correction: { ...tables.correction, variant: "average" } }),
    /\[config\] Invalid pavement tables: correction\.variant/,
  );
});

test("reports an unreadable tables file as a configuration error", () => {
  assert.throws(
    () => loadPavementTables(new URL("./missing-tables.json", import.meta.url)),
    /\[config\] Unable to read pavement tables/,
  );
});
