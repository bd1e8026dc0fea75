import "reflect-metadata";
import createDebug from "debug";
import type {
  ContractKey,
  ContractType,
  ImportDescriptor,
  ImportExternalContract,
  Type,
} from "@wirebind/types";
import {
  IMPORTED_PROPERTIES_METADATA,
  PARAM_IMPORT_METADATA,
  PROPERTY_IMPORT_METADATA,
} from "../metadata/constants";
import {
  type MemberKey,
  describeTarget,
  prependOwn,
  readOwn,
  trackMember,
  writeOwn,
} from "../metadata/storage";

const debug = createDebug("wirebind:core:annotations");

/**
 * Applies to constructor parameters, method parameters and properties.
 * Parameter decorators receive the index; property decorators do not.
 */
export type ImportDecorator = (
  target: object,
  propertyKey: MemberKey | undefined,
  parameterIndex?: number,
) => void;

/**
 * A site may carry several imports, e.g. a keyed import plus an external
 * fallback registration. They are kept in declaration order.
 */
function importDecorator(descriptor: ImportDescriptor): ImportDecorator {
  const imported = Object.freeze(descriptor);
  return (target, propertyKey, parameterIndex) => {
    if (typeof parameterIndex === "number") {
      const existing =
        readOwn<Map<number, ImportDescriptor[]>>(PARAM_IMPORT_METADATA, target, propertyKey) ??
        new Map<number, ImportDescriptor[]>();
      existing.set(parameterIndex, [imported, ...(existing.get(parameterIndex) ?? [])]);
      writeOwn(PARAM_IMPORT_METADATA, existing, target, propertyKey);
      debug(
        "import %s[%d] via %s",
        describeTarget(target, propertyKey),
        parameterIndex,
        imported.kind,
      );
      return;
    }
    if (propertyKey === undefined) return;
    prependOwn(PROPERTY_IMPORT_METADATA, imported, target, propertyKey);
    trackMember(IMPORTED_PROPERTIES_METADATA, target, propertyKey);
    debug("import %s via %s", describeTarget(target, propertyKey), imported.kind);
  };
}

export type ImportOptions = {
  contractName?: string;
};

/** Imports by contract type, which defaults to the site's declared type. */
export function Import(contractType?: ContractType, options: ImportOptions = {}): ImportDecorator {
  return importDecorator({ kind: "import", contractType, contractName: options.contractName });
}

/** Imports only the export registered under `contractKey`. String keys also match names. */
export function ImportWithKey(
  contractKey: ContractKey,
  contractType?: ContractType,
): ImportDecorator {
  return importDecorator({ kind: "importWithKey", contractKey, contractType });
}

export type ImportExternalOptions = {
  implementationType?: Type;
  constructorSignature?: readonly Type[];
  metadata?: unknown;
  contractKey?: ContractKey;
  contractType?: ContractType;
};

/**
 * Imports the service, registering it on the fly from these options when no
 * matching export exists. Unset fields fall back to the site's declared type.
 */
export function ImportExternal(options: ImportExternalOptions = {}): ImportDecorator {
  const descriptor: ImportExternalContract = {
    kind: "importExternal",
    implementationType: options.implementationType,
    constructorSignature: options.constructorSignature
      ? Object.freeze([...options.constructorSignature])
      : undefined,
    metadata: options.metadata,
    contractKey: options.contractKey,
    contractType: options.contractType,
  };
  return importDecorator(descriptor);
}
