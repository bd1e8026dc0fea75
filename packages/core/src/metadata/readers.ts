import "reflect-metadata";
import createDebug from "debug";
import type {
  ContractType,
  ExportCondition,
  ExportDescriptor,
  ImportDescriptor,
  MetadataAttachment,
  ResolutionRequest,
  ReuseDescriptor,
  ReuseOptions,
  Type,
} from "@wirebind/types";
import {
  ANNOTATED_MEMBERS_METADATA,
  ATTACHED_METADATA,
  CONDITION_METADATA,
  EXPORTED_MEMBERS_METADATA,
  EXPORT_METADATA,
  IMPLEMENTS_METADATA,
  IMPORTED_PROPERTIES_METADATA,
  PARAM_IMPORT_METADATA,
  PARAM_METADATA_ATTACHMENT,
  PARAM_REUSE_METADATA,
  PREVENT_DISPOSAL_METADATA,
  PROPERTY_IMPORT_METADATA,
  REUSE_METADATA,
  WEAKLY_REFERENCED_METADATA,
} from "./constants";
import {
  type ExportedMember,
  type MemberKey,
  declaredMemberType,
  declaredParameterType,
  describeTarget,
  isClassType,
  memberHost,
  readOwn,
} from "./storage";

const debug = createDebug("wirebind:core:readers");

// Readers take the object a decorator was applied to: the class for
// class-level and static members, the prototype for instance members.
// All of them read metadata only.

export function getExports(target: object, member?: MemberKey): readonly ExportDescriptor[] {
  const exports = readOwn<ExportDescriptor[]>(EXPORT_METADATA, target, member) ?? [];
  debug(
    "exports %s → [%s]",
    describeTarget(target, member),
    exports.map((e) => e.kind).join(", "),
  );
  return exports;
}

export function isExported(target: object, member?: MemberKey): boolean {
  return getExports(target, member).length > 0;
}

/** Members of a class that carry at least one export, in decoration order. */
export function getExportedMembers(target: object): readonly ExportedMember[] {
  return readOwn<ExportedMember[]>(EXPORTED_MEMBERS_METADATA, target) ?? [];
}

/**
 * Members carrying any export, reuse, metadata or condition annotation.
 * Imported properties are listed by `getPropertyImports` instead.
 */
export function getAnnotatedMembers(target: object): readonly ExportedMember[] {
  return readOwn<ExportedMember[]>(ANNOTATED_MEMBERS_METADATA, target) ?? [];
}

/** The top-most reuse decorator, if any. */
export function getReuse(target: object, member?: MemberKey): ReuseDescriptor | undefined {
  return getReuseDeclarations(target, member)[0];
}

export function getReuseDeclarations(
  target: object,
  member?: MemberKey,
): readonly ReuseDescriptor[] {
  return readOwn<ReuseDescriptor[]>(REUSE_METADATA, target, member) ?? [];
}

/** Reuse declared on a constructor or method parameter for the dependency injected there. */
export function getParameterReuse(
  target: object,
  member: MemberKey | undefined,
  index: number,
): ReuseDescriptor | undefined {
  const declared = readOwn<Map<number, ReuseDescriptor[]>>(PARAM_REUSE_METADATA, target, member);
  return declared?.get(index)?.[0];
}

export function getReuseOptions(target: object, member?: MemberKey): ReuseOptions {
  return {
    weaklyReferenced: readOwn<boolean>(WEAKLY_REFERENCED_METADATA, target, member) === true,
    preventDisposal: readOwn<boolean>(PREVENT_DISPOSAL_METADATA, target, member) === true,
  };
}

/** The top-most `@WithMetadata` attachment, if any. */
export function getMetadataAttachment(
  target: object,
  member?: MemberKey,
): MetadataAttachment | undefined {
  return getMetadataDeclarations(target, member)[0];
}

export function getMetadataDeclarations(
  target: object,
  member?: MemberKey,
): readonly MetadataAttachment[] {
  return readOwn<MetadataAttachment[]>(ATTACHED_METADATA, target, member) ?? [];
}

export function getParameterMetadata(
  target: object,
  member: MemberKey | undefined,
  index: number,
): MetadataAttachment | undefined {
  const attachments = readOwn<Map<number, MetadataAttachment>>(
    PARAM_METADATA_ATTACHMENT,
    target,
    member,
  );
  return attachments?.get(index);
}

export function getExportConditions(
  target: object,
  member?: MemberKey,
): readonly ExportCondition[] {
  return readOwn<ExportCondition[]>(CONDITION_METADATA, target, member) ?? [];
}

/** True when every condition passes. An unguarded export is always eligible. */
export function isEligible(
  conditions: readonly ExportCondition[],
  request: ResolutionRequest,
): boolean {
  return conditions.every((c) => c.evaluate(request));
}

/**
 * Contracts a class declares through `@Implements` plus its base classes,
 * walking the inheritance chain. The class itself is not included.
 */
export function collectImplementedContracts(target: Type): readonly ContractType[] {
  const contracts: ContractType[] = [];
  const add = (contract: ContractType): void => {
    if (!contracts.includes(contract)) contracts.push(contract);
  };

  let current: unknown = target;
  while (typeof current === "function" && current !== Function.prototype) {
    for (const declared of readOwn<ContractType[]>(IMPLEMENTS_METADATA, current) ?? []) {
      add(declared);
    }
    const base: unknown = Object.getPrototypeOf(current);
    if (isClassType(base)) {
      add(base);
    }
    current = base;
  }
  return contracts;
}

// -- Imports ---------------------------------------------------------------

export type ParameterImport = {
  index: number;
  /** The top-most import on the parameter. */
  descriptor: ImportDescriptor;
  /** Every import on the parameter, in declaration order. */
  descriptors: readonly ImportDescriptor[];
  declaredType: Type | undefined;
};

export type PropertyImport = {
  key: MemberKey;
  static: boolean;
  /** The top-most import on the property. */
  descriptor: ImportDescriptor;
  /** Every import on the property, in declaration order. */
  descriptors: readonly ImportDescriptor[];
  declaredType: Type | undefined;
};

export type ImportSite = ParameterImport | PropertyImport;

/**
 * Annotated parameters of a constructor (pass the class) or of a method
 * (pass the prototype or class, and the method key), ordered by index.
 */
export function getParameterImports(
  target: object,
  member?: MemberKey,
): readonly ParameterImport[] {
  const imports = readOwn<Map<number, ImportDescriptor[]>>(PARAM_IMPORT_METADATA, target, member);
  if (!imports) return [];
  const sites: ParameterImport[] = [];
  for (const [index, descriptors] of [...imports.entries()].sort(([a], [b]) => a - b)) {
    const [descriptor] = descriptors;
    if (!descriptor) continue;
    sites.push({
      index,
      descriptor,
      descriptors,
      declaredType: declaredParameterType(target, member, index),
    });
  }
  return sites;
}

/** Annotated properties of a class, instance and static. */
export function getPropertyImports(target: object): readonly PropertyImport[] {
  const members = readOwn<ExportedMember[]>(IMPORTED_PROPERTIES_METADATA, target) ?? [];
  const imports: PropertyImport[] = [];
  for (const member of members) {
    const host = memberHost(target, member);
    const descriptors =
      readOwn<ImportDescriptor[]>(PROPERTY_IMPORT_METADATA, host, member.key) ?? [];
    const [descriptor] = descriptors;
    if (!descriptor) continue;
    imports.push({
      key: member.key,
      static: member.static,
      descriptor,
      descriptors,
      declaredType: declaredMemberType(host, member.key),
    });
  }
  return imports;
}

/**
 * Fills the unset fields of an import from the site's declared type. The
 * declared type is unknown when the compiler emitted none or erased it to
 * `Object` (interfaces, unions). Resolves the top-most import unless another
 * of the site's descriptors is given.
 */
export function resolveImport(
  site: ImportSite,
  descriptor: ImportDescriptor = site.descriptor,
): ImportDescriptor {
  const { declaredType } = site;
  switch (descriptor.kind) {
    case "import":
    case "importWithKey":
      return { ...descriptor, contractType: descriptor.contractType ?? declaredType };
    case "importExternal":
      return {
        ...descriptor,
        contractType: descriptor.contractType ?? declaredType,
        implementationType: descriptor.implementationType ?? declaredType,
      };
  }
}

/** Every import of the site, resolved, in declaration order. */
export function resolveImports(site: ImportSite): readonly ImportDescriptor[] {
  return site.descriptors.map((descriptor) => resolveImport(site, descriptor));
}
