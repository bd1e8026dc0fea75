export type ConflictPolicy = "error" | "warn" | "ignore";

const CONFLICT_POLICY_MAP: Record<string, ConflictPolicy> = {
  error: "error",
  warn: "warn",
  ignore: "ignore",
};

export const DEFAULT_CONFLICT_POLICY: ConflictPolicy = "error";

export class WirebindConfig {
  static getConflictPolicy(): ConflictPolicy {
    const raw = process.env.WIREBIND_ANNOTATION_CONFLICTS?.trim().toLowerCase() ?? "";
    return Object.hasOwn(CONFLICT_POLICY_MAP, raw)
      ? CONFLICT_POLICY_MAP[raw]
      : DEFAULT_CONFLICT_POLICY;
  }
}
