export type { Type, AbstractType, ContractType, ContractKey } from "./common";

export type { ReuseKind, ReuseDescriptor, ReuseOptions } from "./reuse";

export type {
  ExportContract,
  ExportWithKeyContract,
  ExportManyContract,
  AsFactoryContract,
  AsWrapperContract,
  AsDecoratorContract,
  OpenResolutionScopeContract,
  AsResolutionRootContract,
  ExportDescriptor,
  ExportKind,
  MetadataAttachment,
} from "./exports";

export type {
  ImportContract,
  ImportWithKeyContract,
  ImportExternalContract,
  ImportDescriptor,
  ImportKind,
} from "./imports";

export type { RequestStep, ResolutionRequest, ExportCondition } from "./request";
