import "reflect-metadata";
import createDebug from "debug";
import type {
  ContractKey,
  ContractType,
  ExportDescriptor,
  ExportManyContract,
} from "@wirebind/types";
import {
  ANNOTATED_MEMBERS_METADATA,
  EXPORTED_MEMBERS_METADATA,
  EXPORT_METADATA,
  IMPLEMENTS_METADATA,
} from "../metadata/constants";
import {
  type ClassOrMemberDecorator,
  type MemberKey,
  declaredMemberType,
  describeTarget,
  isClassType,
  prependOwn,
  readOwn,
  trackMember,
  writeOwn,
} from "../metadata/storage";
import { InvalidAnnotationError } from "../errors/wirebind-error";

const debug = createDebug("wirebind:core:annotations");

function defaultContractType(
  target: object,
  propertyKey?: MemberKey,
  descriptor?: PropertyDescriptor,
): ContractType | undefined {
  if (propertyKey === undefined) {
    return isClassType(target) ? target : undefined;
  }
  return declaredMemberType(target, propertyKey, descriptor);
}

/**
 * Builds the decorator that records an export descriptor. `build` receives the
 * type the annotated class or member declares, for variants that default to it.
 */
function exportDecorator(
  build: (declaredType: () => ContractType | undefined) => ExportDescriptor,
): ClassOrMemberDecorator {
  return (target, propertyKey, descriptor) => {
    const exported = Object.freeze(
      build(() => defaultContractType(target, propertyKey, descriptor)),
    );
    debug("export %s as %s", describeTarget(target, propertyKey), exported.kind);
    prependOwn(EXPORT_METADATA, exported, target, propertyKey);
    if (propertyKey !== undefined) {
      trackMember(EXPORTED_MEMBERS_METADATA, target, propertyKey);
      trackMember(ANNOTATED_MEMBERS_METADATA, target, propertyKey);
    }
  };
}

export type ExportOptions = {
  contractName?: string;
};

/**
 * Exports the annotated class or member under `contractType`, which defaults
 * to the class itself or the member's declared type.
 */
export function Export(
  contractType?: ContractType,
  options: ExportOptions = {},
): ClassOrMemberDecorator {
  return exportDecorator((declaredType) => ({
    kind: "export",
    contractType: contractType ?? declaredType(),
    contractName: options.contractName,
  }));
}

/** Exports under a service key. A contract name, when also given, takes precedence. */
export function ExportWithKey(
  contractKey: ContractKey,
  contractType?: ContractType,
  options: ExportOptions = {},
): ClassOrMemberDecorator {
  return exportDecorator((declaredType) => ({
    kind: "exportWithKey",
    contractKey,
    contractType: contractType ?? declaredType(),
    contractName: options.contractName,
  }));
}

export type ExportManyOptions = {
  contractKey?: ContractKey;
  contractName?: string;
  except?: readonly ContractType[];
  includeNonPublic?: boolean;
};

/** Exports every contract the annotated type implements, minus `except`. */
export function ExportMany(options: ExportManyOptions = {}): ClassOrMemberDecorator {
  const except = Object.freeze([...(options.except ?? [])]);
  return exportDecorator(
    (): ExportManyContract => ({
      kind: "exportMany",
      contractKey: options.contractKey,
      contractName: options.contractName,
      except,
      includeNonPublic: options.includeNonPublic ?? false,
    }),
  );
}

/** The annotated class or member produces services rather than being one. */
export function AsFactory(): ClassOrMemberDecorator {
  return exportDecorator(() => ({ kind: "asFactory" }));
}

export type AsWrapperOptions = {
  alwaysWrapsRequiredServiceType?: boolean;
};

/**
 * Marks a generic wrapper. `wrappedTypeArgIndex` names the type argument that
 * holds the wrapped service type; -1 leaves it unspecified.
 */
export function AsWrapper(
  wrappedTypeArgIndex = -1,
  options: AsWrapperOptions = {},
): ClassOrMemberDecorator {
  if (!Number.isInteger(wrappedTypeArgIndex) || wrappedTypeArgIndex < -1) {
    throw new InvalidAnnotationError(
      "AsWrapper",
      `wrappedTypeArgIndex must be -1 or a non-negative integer, got ${wrappedTypeArgIndex}`,
    );
  }
  return exportDecorator(() => ({
    kind: "asWrapper",
    wrappedTypeArgIndex,
    alwaysWrapsRequiredServiceType: options.alwaysWrapsRequiredServiceType ?? false,
  }));
}

export type AsDecoratorOptions = {
  contractName?: string;
  contractKey?: ContractKey;
};

/** Decorates exports of the same contract; matches by name first, then key. */
export function AsDecorator(options: AsDecoratorOptions = {}): ClassOrMemberDecorator {
  return exportDecorator(() => ({
    kind: "asDecorator",
    contractName: options.contractName,
    contractKey: options.contractKey,
  }));
}

/** When injected, the export opens a new resolution scope for its own dependencies. */
export function OpenResolutionScope(): ClassOrMemberDecorator {
  return exportDecorator(() => ({ kind: "openResolutionScope" }));
}

export function AsResolutionRoot(): ClassOrMemberDecorator {
  return exportDecorator(() => ({ kind: "asResolutionRoot" }));
}

/**
 * Declares contracts the class implements. Interfaces have no runtime
 * identity, so they are named by string or symbol tokens here.
 */
export function Implements(...contracts: ContractType[]): ClassDecorator {
  if (contracts.length === 0) {
    throw new InvalidAnnotationError("Implements", "at least one contract is required");
  }
  return (target) => {
    const existing = readOwn<ContractType[]>(IMPLEMENTS_METADATA, target) ?? [];
    writeOwn(IMPLEMENTS_METADATA, [...contracts, ...existing], target);
  };
}
