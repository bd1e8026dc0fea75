export type ReuseKind = "transient" | "singleton" | "currentScope" | "resolutionScope";

export type ReuseDescriptor = {
  kind: ReuseKind;
  /** Only carried by `currentScope`. Absent means any ambient scope. */
  scopeName?: string;
};

export type ReuseOptions = {
  weaklyReferenced: boolean;
  preventDisposal: boolean;
};
