import type { ContractKey, ContractType } from "./common";

export type ExportContract = {
  kind: "export";
  contractType?: ContractType;
  contractName?: string;
};

export type ExportWithKeyContract = {
  kind: "exportWithKey";
  contractKey: ContractKey;
  contractType?: ContractType;
  contractName?: string;
};

export type ExportManyContract = {
  kind: "exportMany";
  contractKey?: ContractKey;
  contractName?: string;
  except: readonly ContractType[];
  includeNonPublic: boolean;
};

export type AsFactoryContract = { kind: "asFactory" };

export type AsWrapperContract = {
  kind: "asWrapper";
  /** -1 when the wrapped type argument is unspecified. */
  wrappedTypeArgIndex: number;
  alwaysWrapsRequiredServiceType: boolean;
};

export type AsDecoratorContract = {
  kind: "asDecorator";
  contractName?: string;
  contractKey?: ContractKey;
};

export type OpenResolutionScopeContract = { kind: "openResolutionScope" };

export type AsResolutionRootContract = { kind: "asResolutionRoot" };

export type ExportDescriptor =
  | ExportContract
  | ExportWithKeyContract
  | ExportManyContract
  | AsFactoryContract
  | AsWrapperContract
  | AsDecoratorContract
  | OpenResolutionScopeContract
  | AsResolutionRootContract;

export type ExportKind = ExportDescriptor["kind"];

export type MetadataAttachment = {
  value: unknown;
};
