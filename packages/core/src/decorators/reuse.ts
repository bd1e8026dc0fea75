import "reflect-metadata";
import createDebug from "debug";
import type { ReuseDescriptor, ReuseKind } from "@wirebind/types";
import {
  ANNOTATED_MEMBERS_METADATA,
  PARAM_REUSE_METADATA,
  PREVENT_DISPOSAL_METADATA,
  REUSE_METADATA,
  WEAKLY_REFERENCED_METADATA,
} from "../metadata/constants";
import {
  type ClassOrMemberDecorator,
  type MemberKey,
  describeTarget,
  prependOwn,
  readOwn,
  trackMember,
  writeOwn,
} from "../metadata/storage";

const debug = createDebug("wirebind:core:annotations");

/** Conventional scope name for per-web-request reuse. */
export const WEB_REQUEST_SCOPE_NAME = "WebRequestScopeName";

/** Conventional name of the root scope kept per thread/async context. */
export const THREAD_SCOPE_NAME = "ThreadScopeContext";

export function createReuseDescriptor(kind: ReuseKind, scopeName?: string): ReuseDescriptor {
  // Only current-scope reuse matches ambient scopes by name.
  if (kind === "currentScope" && scopeName !== undefined) {
    return { kind, scopeName };
  }
  return { kind };
}

/**
 * Applies to classes, members and constructor or method parameters. On a
 * parameter it sets the reuse of the dependency injected there.
 */
export type ReuseDecorator = (
  target: object,
  propertyKey?: MemberKey,
  descriptorOrIndex?: PropertyDescriptor | number,
) => void;

/**
 * Declares how instances of the annotated class or member are reused.
 * `scopeName` is ignored for every kind except `currentScope`.
 */
export function Reuse(kind: ReuseKind, scopeName?: string): ReuseDecorator {
  const reuse = Object.freeze(createReuseDescriptor(kind, scopeName));
  return (target, propertyKey, descriptorOrIndex) => {
    if (typeof descriptorOrIndex === "number") {
      const existing =
        readOwn<Map<number, ReuseDescriptor[]>>(PARAM_REUSE_METADATA, target, propertyKey) ??
        new Map<number, ReuseDescriptor[]>();
      existing.set(descriptorOrIndex, [reuse, ...(existing.get(descriptorOrIndex) ?? [])]);
      writeOwn(PARAM_REUSE_METADATA, existing, target, propertyKey);
      debug(
        "reuse %s[%d] → %s %s",
        describeTarget(target, propertyKey),
        descriptorOrIndex,
        kind,
        reuse.scopeName ?? "",
      );
      return;
    }
    debug("reuse %s → %s %s", describeTarget(target, propertyKey), kind, reuse.scopeName ?? "");
    prependOwn(REUSE_METADATA, reuse, target, propertyKey);
    if (propertyKey !== undefined) {
      trackMember(ANNOTATED_MEMBERS_METADATA, target, propertyKey);
    }
  };
}

export function TransientReuse(): ReuseDecorator {
  return Reuse("transient");
}

export function SingletonReuse(): ReuseDecorator {
  return Reuse("singleton");
}

export function CurrentScopeReuse(scopeName?: string): ReuseDecorator {
  return Reuse("currentScope", scopeName);
}

export function WebRequestReuse(): ReuseDecorator {
  return CurrentScopeReuse(WEB_REQUEST_SCOPE_NAME);
}

export function ThreadReuse(): ReuseDecorator {
  return CurrentScopeReuse(THREAD_SCOPE_NAME);
}

export function ResolutionScopeReuse(): ReuseDecorator {
  return Reuse("resolutionScope");
}

/** The reused instance should be held through a weak reference. */
export function WeaklyReferenced(): ClassOrMemberDecorator {
  return (target, propertyKey) => {
    writeOwn(WEAKLY_REFERENCED_METADATA, true, target, propertyKey);
    if (propertyKey !== undefined) {
      trackMember(ANNOTATED_MEMBERS_METADATA, target, propertyKey);
    }
  };
}

/** The reused instance is not disposed together with its scope. */
export function PreventDisposal(): ClassOrMemberDecorator {
  return (target, propertyKey) => {
    writeOwn(PREVENT_DISPOSAL_METADATA, true, target, propertyKey);
    if (propertyKey !== undefined) {
      trackMember(ANNOTATED_MEMBERS_METADATA, target, propertyKey);
    }
  };
}
