export class WirebindError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WirebindError";
  }
}

/** A decorator was applied somewhere it has no meaning. */
export class InvalidAnnotationError extends WirebindError {
  constructor(
    public readonly decorator: string,
    message: string,
  ) {
    super(`@${decorator}: ${message}`);
    this.name = "InvalidAnnotationError";
  }
}

export type AnnotationConflictKind =
  | "factory-shape"
  | "decorator-wrapper"
  | "duplicate-reuse"
  | "duplicate-metadata"
  | "condition-without-export";

export type AnnotationConflict = {
  kind: AnnotationConflictKind;
  /** Class name, or `Class.member` / `Class.static member` for members. */
  target: string;
  message: string;
};

export class AnnotationConflictError extends WirebindError {
  constructor(public readonly conflicts: readonly AnnotationConflict[]) {
    const details = conflicts.map((c) => `  ${c.target}: ${c.message}`).join("\n");
    super(`Conflicting annotations detected:\n\n${details}`);
    this.name = "AnnotationConflictError";
  }
}
