import type { ContractKey, ContractType, Type } from "./common";

export type ImportContract = {
  kind: "import";
  contractType?: ContractType;
  contractName?: string;
};

export type ImportWithKeyContract = {
  kind: "importWithKey";
  /** String keys also match by contract name. */
  contractKey: ContractKey;
  contractType?: ContractType;
};

export type ImportExternalContract = {
  kind: "importExternal";
  implementationType?: Type;
  constructorSignature?: readonly Type[];
  metadata?: unknown;
  contractKey?: ContractKey;
  contractType?: ContractType;
};

export type ImportDescriptor = ImportContract | ImportWithKeyContract | ImportExternalContract;

export type ImportKind = ImportDescriptor["kind"];
