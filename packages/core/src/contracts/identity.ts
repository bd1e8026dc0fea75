import type { ContractKey, ExportDescriptor, ImportDescriptor } from "@wirebind/types";

type Identified = {
  contractName?: string;
  contractKey?: ContractKey;
};

function nameOrKey(descriptor: Identified): ContractKey | undefined {
  return descriptor.contractName ?? descriptor.contractKey;
}

/**
 * The service key an export or import matches on. A contract name takes
 * precedence over a contract key; variants that are not matched by key
 * (factories, wrappers, scope and root markers) have none.
 */
export function contractIdentity(
  descriptor: ExportDescriptor | ImportDescriptor,
): ContractKey | undefined {
  switch (descriptor.kind) {
    case "export":
      return descriptor.contractName;
    case "exportWithKey":
    case "exportMany":
    case "asDecorator":
      return nameOrKey(descriptor);
    case "import":
      return descriptor.contractName;
    case "importWithKey":
    case "importExternal":
      return descriptor.contractKey;
    case "asFactory":
    case "asWrapper":
    case "openResolutionScope":
    case "asResolutionRoot":
      return undefined;
  }
}

/** Identities are compared with `Object.is`; an absent identity only matches an absent one. */
export function identitiesMatch(
  exported: ContractKey | undefined,
  requested: ContractKey | undefined,
): boolean {
  return Object.is(exported, requested);
}

export function matchesContract(
  exported: ExportDescriptor,
  requested: ImportDescriptor,
): boolean {
  return identitiesMatch(contractIdentity(exported), contractIdentity(requested));
}
