export type OutputFormat = "FbsBased" | "LineBased";

export type AlgorithmFamily = "default" | "heistream" | "cuttana";

// Families whose binaries print one result line instead of writing an artifact.
const LINE_BASED_MARKERS = ["cuttana"] as const;

// Named families that write the same artifact as the default family.
const FBS_BASED_MARKERS = ["heistream"] as const;

const containsMarker = (identifier: string, markers: readonly string[]): string | undefined => {
  const lowered = identifier.toLowerCase();
  return markers.find((marker) => lowered.includes(marker));
};

export const classifyFormat = (identifier: string): OutputFormat =>
  containsMarker(identifier, LINE_BASED_MARKERS) ? "LineBased" : "FbsBased";

export const classifyFamily = (identifier: string): AlgorithmFamily => {
  if (containsMarker(identifier, LINE_BASED_MARKERS)) {
    return "cuttana";
  }
  if (containsMarker(identifier, FBS_BASED_MARKERS)) {
    return "heistream";
  }
  return "default";
};
