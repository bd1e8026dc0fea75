import "reflect-metadata";

// Decorators
export {
  Reuse,
  TransientReuse,
  SingletonReuse,
  CurrentScopeReuse,
  WebRequestReuse,
  ThreadReuse,
  ResolutionScopeReuse,
  WeaklyReferenced,
  PreventDisposal,
  createReuseDescriptor,
  WEB_REQUEST_SCOPE_NAME,
  THREAD_SCOPE_NAME,
} from "./decorators/reuse";
export {
  Export,
  ExportWithKey,
  ExportMany,
  AsFactory,
  AsWrapper,
  AsDecorator,
  OpenResolutionScope,
  AsResolutionRoot,
  Implements,
} from "./decorators/exports";
export { Import, ImportWithKey, ImportExternal } from "./decorators/imports";
export { WithMetadata } from "./decorators/metadata";
export { ExportWhen } from "./decorators/conditions";

// Readers
export {
  getExports,
  isExported,
  getExportedMembers,
  getReuse,
  getReuseDeclarations,
  getReuseOptions,
  getMetadataAttachment,
  getMetadataDeclarations,
  getParameterMetadata,
  getExportConditions,
  isEligible,
  collectImplementedContracts,
  getParameterImports,
  getPropertyImports,
  resolveImport,
  resolveImports,
  getAnnotatedMembers,
  getParameterReuse,
} from "./metadata/readers";
export { memberHost, contractToString } from "./metadata/storage";

// Request chain
export { RequestInfo } from "./request/request-info";

// Conditions
export {
  PredicateCondition,
  RootCondition,
  ParentCondition,
  AncestorCondition,
  AllOfCondition,
  AnyOfCondition,
  NotCondition,
  condition,
  whenRoot,
  whenParent,
  whenParentServiceKey,
  whenInjectedInto,
  whenAnyAncestor,
  allOf,
  anyOf,
  not,
} from "./conditions/conditions";

// Contracts
export { contractIdentity, identitiesMatch, matchesContract } from "./contracts/identity";
export { resolveExportManyContracts } from "./contracts/export-many";

// Validation
export { findAnnotationConflicts, checkAnnotations } from "./validation/annotations";

// Configuration
export { WirebindConfig, DEFAULT_CONFLICT_POLICY } from "./config/env";

// Errors
export {
  WirebindError,
  InvalidAnnotationError,
  AnnotationConflictError,
} from "./errors/wirebind-error";

// Metadata constants (used by discovery tools)
export {
  EXPORT_METADATA,
  EXPORTED_MEMBERS_METADATA,
  IMPLEMENTS_METADATA,
  REUSE_METADATA,
  WEAKLY_REFERENCED_METADATA,
  PREVENT_DISPOSAL_METADATA,
  ATTACHED_METADATA,
  PARAM_METADATA_ATTACHMENT,
  CONDITION_METADATA,
  PARAM_IMPORT_METADATA,
  PROPERTY_IMPORT_METADATA,
  IMPORTED_PROPERTIES_METADATA,
  ANNOTATED_MEMBERS_METADATA,
  PARAM_REUSE_METADATA,
} from "./metadata/constants";

// Re-export key types from @wirebind/types
export type {
  Type,
  AbstractType,
  ContractType,
  ContractKey,
  ReuseKind,
  ReuseDescriptor,
  ReuseOptions,
  ExportDescriptor,
  ExportKind,
  ExportManyContract,
  MetadataAttachment,
  ImportDescriptor,
  ImportKind,
  RequestStep,
  ResolutionRequest,
  ExportCondition,
} from "@wirebind/types";

// Re-export types defined in core
export type { ClassOrMemberDecorator, ExportedMember, MemberKey } from "./metadata/storage";
export type {
  ExportOptions,
  ExportManyOptions,
  AsWrapperOptions,
  AsDecoratorOptions,
} from "./decorators/exports";
export type { ReuseDecorator } from "./decorators/reuse";
export type { ImportDecorator, ImportOptions, ImportExternalOptions } from "./decorators/imports";
export type { ParameterImport, PropertyImport, ImportSite } from "./metadata/readers";
export type { RequestPredicate, ParentLookupOptions } from "./conditions/conditions";
export type { ExportManyResolveOptions } from "./contracts/export-many";
export type { CheckAnnotationsOptions } from "./validation/annotations";
export type { ConflictPolicy } from "./config/env";
export type { AnnotationConflict, AnnotationConflictKind } from "./errors/wirebind-error";
