import createDebug from "debug";
import type { ExportKind } from "@wirebind/types";
import {
  type AnnotationConflict,
  AnnotationConflictError,
} from "../errors/wirebind-error";
import { type ConflictPolicy, WirebindConfig } from "../config/env";
import {
  getAnnotatedMembers,
  getExportConditions,
  getExports,
  getMetadataDeclarations,
  getReuseDeclarations,
} from "../metadata/readers";
import { type MemberKey, describeTarget, memberHost } from "../metadata/storage";

const debug = createDebug("wirebind:core:validation");

/**
 * Reports annotation combinations the metadata layer does not give a meaning:
 * a factory that is also a decorator or wrapper, a decorator that is also a
 * wrapper, more than one reuse or metadata declaration, and conditions on a
 * target that exports nothing.
 */
export function findAnnotationConflicts(
  target: object,
  member?: MemberKey,
): AnnotationConflict[] {
  const where = describeTarget(target, member);
  const kinds = new Set<ExportKind>(getExports(target, member).map((e) => e.kind));
  const conflicts: AnnotationConflict[] = [];

  if (kinds.has("asFactory") && (kinds.has("asDecorator") || kinds.has("asWrapper"))) {
    conflicts.push({
      kind: "factory-shape",
      target: where,
      message: "@AsFactory cannot be combined with @AsDecorator or @AsWrapper",
    });
  }

  if (kinds.has("asDecorator") && kinds.has("asWrapper")) {
    conflicts.push({
      kind: "decorator-wrapper",
      target: where,
      message: "@AsDecorator cannot be combined with @AsWrapper",
    });
  }

  const reuseCount = getReuseDeclarations(target, member).length;
  if (reuseCount > 1) {
    conflicts.push({
      kind: "duplicate-reuse",
      target: where,
      message: `${reuseCount} reuse declarations; at most one is allowed`,
    });
  }

  const metadataCount = getMetadataDeclarations(target, member).length;
  if (metadataCount > 1) {
    conflicts.push({
      kind: "duplicate-metadata",
      target: where,
      message: `${metadataCount} @WithMetadata declarations; at most one is allowed`,
    });
  }

  if (kinds.size === 0 && getExportConditions(target, member).length > 0) {
    conflicts.push({
      kind: "condition-without-export",
      target: where,
      message: "@ExportWhen has no effect without an export",
    });
  }

  return conflicts;
}

export type CheckAnnotationsOptions = {
  /** Defaults to `WirebindConfig.getConflictPolicy()`. */
  policy?: ConflictPolicy;
};

/**
 * Checks a class and each of its annotated members, then applies the conflict
 * policy: "error" throws every conflict at once, "warn" logs them, "ignore"
 * skips the check. Returns the conflicts found.
 */
export function checkAnnotations(
  target: object,
  options: CheckAnnotationsOptions = {},
): readonly AnnotationConflict[] {
  const policy = options.policy ?? WirebindConfig.getConflictPolicy();
  if (policy === "ignore") return [];

  const conflicts = [
    ...findAnnotationConflicts(target),
    ...getAnnotatedMembers(target).flatMap((member) =>
      findAnnotationConflicts(memberHost(target, member), member.key),
    ),
  ];

  if (conflicts.length === 0) return conflicts;

  if (policy === "error") {
    throw new AnnotationConflictError(conflicts);
  }

  for (const conflict of conflicts) {
    debug("conflict %s [%s]: %s", conflict.target, conflict.kind, conflict.message);
  }
  return conflicts;
}
