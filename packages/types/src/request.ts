import type { ContractKey, ContractType, Type } from "./common";

/** One resolution step, as the container describes it. */
export type RequestStep = {
  serviceType: ContractType;
  serviceKey?: ContractKey;
  implementationType?: Type;
  isDecoratorOrWrapper?: boolean;
};

/**
 * Read-only view of an in-progress resolution. Iterating yields the current
 * request first and the root request last.
 */
export interface ResolutionRequest extends Iterable<ResolutionRequest> {
  readonly parent: ResolutionRequest | undefined;
  readonly isDecoratorOrWrapper: boolean;
  readonly serviceType: ContractType;
  readonly serviceKey: ContractKey | undefined;
  readonly implementationType: Type | undefined;
  readonly depth: number;
}

/** Decides whether an exported candidate applies to a request. Must be pure. */
export interface ExportCondition {
  evaluate(request: ResolutionRequest): boolean;
}
