import { describe, expect, it } from "vitest";

import { classifyFamily, classifyFormat } from "../src/results/format.js";

describe("classifyFormat", () => {
  it("classifies identifiers containing the line-based marker in any case", () => {
    expect(classifyFormat("cuttana")).toBe("LineBased");
    expect(classifyFormat("CutTana_mbs1m_subp16")).toBe("LineBased");
    expect(classifyFormat("fork-of-CUTTANA")).toBe("LineBased");
  });

  it("falls back to the artifact format for everything else", () => {
    expect(classifyFormat("heistream_32k")).toBe("FbsBased");
    expect(classifyFormat("PQv7_NBS3_16k_mbs131k")).toBe("FbsBased");
    expect(classifyFormat("cut-tana")).toBe("FbsBased");
    expect(classifyFormat("")).toBe("FbsBased");
  });
});

describe("classifyFamily", () => {
  it("names the family behind an identifier", () => {
    expect(classifyFamily("Cuttana_subp4k")).toBe("cuttana");
    expect(classifyFamily("HeiStream_65k")).toBe("heistream");
    expect(classifyFamily("PQv7_NBS3_1_mbs65k")).toBe("default");
  });
});
