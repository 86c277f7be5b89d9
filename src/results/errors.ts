export type PartbenchErrorKind =
  | "MalformedArtifact"
  | "MissingGraphMetadata"
  | "MalformedLine"
  | "InvalidPathComponent"
  | "IOFailure";

export class PartbenchError extends Error {
  readonly kind: PartbenchErrorKind;

  constructor(kind: PartbenchErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
  }
}

export class MalformedArtifactError extends PartbenchError {
  readonly artifactPath: string;

  constructor(artifactPath: string, reason: string, options?: { cause?: unknown }) {
    super("MalformedArtifact", `Malformed result artifact ${artifactPath}: ${reason}`, options);
    this.artifactPath = artifactPath;
  }
}

export class MissingGraphMetadataError extends PartbenchError {
  constructor(graph: string, detail = "graph edge count is missing") {
    super("MissingGraphMetadata", `Missing graph metadata for ${graph}: ${detail}`);
  }
}

export class MalformedLineError extends PartbenchError {
  readonly line: string;

  constructor(line: string, reason: string) {
    super("MalformedLine", `Malformed output line "${line}": ${reason}`);
    this.line = line;
  }
}

export class InvalidPathComponentError extends PartbenchError {
  readonly component: string;
  readonly value: string;

  constructor(component: string, value: string, reason: string) {
    super("InvalidPathComponent", `Invalid ${component} "${value}": ${reason}`);
    this.component = component;
    this.value = value;
  }
}

export class IOFailureError extends PartbenchError {
  readonly path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super("IOFailure", `${reason}: ${path}`, options);
    this.path = path;
  }
}

export const isPartbenchError = (error: unknown): error is PartbenchError =>
  error instanceof PartbenchError;

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
