import { describe, expect, it } from "vitest";
import { ResultStore, filterByText, filterByType, queryResults } from "../src/domain/resultStore.js";
import { benchResult, hydrantResult, sampleResults } from "./helpers/results.js";

const ids = (results: { id: string }[]) => results.map((item) => item.id);

describe("ResultStore", () => {
  it("keeps recorded order", () => {
    const store = new ResultStore();
    store.append(hydrantResult());
    store.append(benchResult());
    expect(store.size).toBe(2);
    expect(ids(store.all())).toEqual(["test_hydrant", "test_bench"]);
  });

  it("returns a copy from all()", () => {
    const store = new ResultStore(sampleResults());
    store.all().pop();
    expect(store.size).toBe(3);
  });

  it("finds results by id", () => {
    const store = new ResultStore(sampleResults());
    expect(store.find("test_hydrant")?.notes).toBe("Hydrant 7, north");
    expect(store.find("test_missing")).toBeUndefined();
  });
});

describe("filterByType", () => {
  it("returns everything for the all filter", () => {
    expect(ids(filterByType(sampleResults(), "all"))).toEqual(["test_bench", "test_hydrant", "test_empty"]);
  });

  it("keeps only the chosen type in recorded order", () => {
    expect(ids(filterByType(sampleResults(), "lowFlow"))).toEqual(["test_bench", "test_empty"]);
    expect(ids(filterByType(sampleResults(), "highFlow"))).toEqual(["test_hydrant"]);
  });
});

describe("filterByText", () => {
  it("returns everything for blank text", () => {
    expect(filterByText(sampleResults(), "")).toHaveLength(3);
    expect(filterByText(sampleResults(), "   ")).toHaveLength(3);
  });

  it("matches the test type label case-insensitively", () => {
    expect(ids(filterByText(sampleResults(), "HIGH"))).toEqual(["test_hydrant"]);
    expect(ids(filterByText(sampleResults(), "low flow"))).toEqual(["test_bench", "test_empty"]);
  });

  it("matches notes", () => {
    expect(ids(filterByText(sampleResults(), "bench"))).toEqual(["test_bench"]);
    expect(ids(filterByText(sampleResults(), "north"))).toEqual(["test_hydrant"]);
  });

  it("ignores surrounding whitespace in the search text", () => {
    expect(ids(filterByText(sampleResults(), " north "))).toEqual(["test_hydrant"]);
    expect(filterByText(sampleResults(), " flow ")).toHaveLength(3);
  });

  it("returns nothing when no field matches", () => {
    expect(filterByText(sampleResults(), "reservoir")).toEqual([]);
  });
});

describe("queryResults", () => {
  const store = new ResultStore(sampleResults());

  it("defaults to every result in recorded order", () => {
    expect(ids(queryResults(store))).toEqual(["test_bench", "test_hydrant", "test_empty"]);
  });

  it("combines the type and text filters", () => {
    expect(ids(queryResults(store, { testType: "lowFlow", text: "flow" }))).toEqual(["test_bench", "test_empty"]);
    expect(ids(queryResults(store, { testType: "lowFlow", text: "hydrant" }))).toEqual([]);
  });

  it("orders by date when asked", () => {
    expect(ids(queryResults(store, { order: "asc" }))).toEqual(["test_hydrant", "test_empty", "test_bench"]);
    expect(ids(queryResults(store, { order: "desc" }))).toEqual(["test_bench", "test_empty", "test_hydrant"]);
  });
});
