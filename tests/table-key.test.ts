import { describe, expect, it } from "vitest";

import { InvalidPathComponentError } from "../src/results/errors.js";
import { buildTableKey, buildTablePath, serializeParams, type TableKeyInput } from "../src/results/table-key.js";
import { captureError } from "./helpers.js";

const input = (overrides: Partial<TableKeyInput> = {}): TableKeyInput => ({
  server: "109",
  ordering: "natural",
  coreCount: 4,
  algorithm: "heistream",
  params: [
    ["sbuf", 32768],
    ["mqs", "131072"]
  ],
  graph: "g1",
  k: 8,
  ...overrides
});

describe("serializeParams", () => {
  it("joins key=value pairs in insertion order", () => {
    expect(serializeParams([["a", 1], ["b", "x"]])).toBe("a=1_b=x");
    expect(serializeParams([["b", "x"], ["a", 1]])).toBe("b=x_a=1");
  });

  it("writes flag-style parameters as bare names", () => {
    expect(serializeParams({ mbs: "1m", haa: "", verbose: true })).toBe("mbs=1m_haa_verbose=true");
  });

  it("keeps numeric parameter names in order when given as pairs or a Map", () => {
    expect(serializeParams([["mbs", "1m"], ["2", "x"]])).toBe("mbs=1m_2=x");
    expect(serializeParams(new Map([["mbs", "1m"], ["2", "x"]]))).toBe("mbs=1m_2=x");
  });

  it("refuses numeric parameter names in a plain object", () => {
    const error = captureError(() => serializeParams({ mbs: "1m", "2": "x" }));
    expect(error).toBeInstanceOf(InvalidPathComponentError);
    expect(error).toMatchObject({ component: "params", value: "2" });
  });

  it("refuses parameters whose signature would be ambiguous", () => {
    expect(() => serializeParams([["a", "1_b=2"]])).toThrow(
      'Invalid params "a=1_b=2": parameter value must not contain "_"'
    );
    expect(() => serializeParams([["a_b", "1"]])).toThrow(
      'Invalid params "a_b": parameter name must not contain "_" or "="'
    );
    expect(captureError(() => serializeParams([["a=b", ""]]))).toMatchObject({ component: "params" });
    expect(captureError(() => serializeParams([["", "1"]]))).toMatchObject({ component: "params" });
    expect(serializeParams([["a", "1"], ["b", "2"]])).toBe("a=1_b=2");
  });

  it("names the empty parameter set", () => {
    expect(serializeParams([])).toBe("default");
    expect(serializeParams(new Map())).toBe("default");
  });
});

describe("buildTableKey", () => {
  it("lays out the table path under the results root", () => {
    const key = buildTableKey("/data/results", input());
    expect(key.tablePath).toBe(
      "/data/results/109/natural/4/heistream_sbuf=32768_mqs=131072.csv"
    );
    expect(key.rowIdentity).toEqual({ graph: "g1", k: 8 });
    expect(key.params).toBe("sbuf=32768_mqs=131072");
  });

  it("derives the table path without a row", () => {
    expect(
      buildTablePath("/r", { server: "109", ordering: "natural", coreCount: 1, algorithm: "cuttana", params: [] })
    ).toEqual({ tablePath: "/r/109/natural/1/cuttana_default.csv", params: "default" });
  });

  it("maps equivalent parameter collections to the same table", () => {
    const fromPairs = buildTableKey("/r", input());
    const fromMap = buildTableKey(
      "/r",
      input({
        params: new Map<string, string | number>([
          ["sbuf", "32768"],
          ["mqs", 131072]
        ])
      })
    );
    const fromObject = buildTableKey(
      "/r",
      input({ params: { sbuf: "32768", mqs: "131072" } })
    );
    expect(fromMap.tablePath).toBe(fromPairs.tablePath);
    expect(fromObject.tablePath).toBe(fromPairs.tablePath);
    expect(buildTableKey("/r", input()).tablePath).toBe(fromPairs.tablePath);
  });

  const invalidCases: Array<[Partial<TableKeyInput>, string]> = [
    [{ server: "a/b" }, "server"],
    [{ ordering: "nat\\ural" }, "ordering"],
    [{ ordering: ".." }, "ordering"],
    [{ algorithm: "" }, "algorithm"],
    [{ algorithm: "../heistream" }, "algorithm"],
    [{ params: [["gdir", "/tmp/graphs"]] }, "params"],
    [{ coreCount: 0 }, "core_count"],
    [{ coreCount: 2.5 }, "core_count"],
    [{ graph: "" }, "graph"],
    [{ k: 0 }, "k"],
    [{ k: 1.5 }, "k"],
    [{ k: Number.NaN }, "k"]
  ];

  it.each(invalidCases)("rejects %j", (overrides, component) => {
    const error = captureError(() => buildTableKey("/r", input(overrides)));
    expect(error).toBeInstanceOf(InvalidPathComponentError);
    expect(error).toMatchObject({ kind: "InvalidPathComponent", component });
  });
});
