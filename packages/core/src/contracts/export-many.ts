import type { ContractType, ExportManyContract } from "@wirebind/types";

export type ExportManyResolveOptions = {
  /** Decides contract visibility; without it every contract counts as public. */
  isPublic?: (contract: ContractType) => boolean;
};

/**
 * The contracts an `ExportMany` export registers under: the implemented
 * contracts, de-duplicated, minus `except`. Non-public contracts are dropped
 * unless the descriptor includes them.
 */
export function resolveExportManyContracts(
  descriptor: ExportManyContract,
  implemented: Iterable<ContractType>,
  options: ExportManyResolveOptions = {},
): readonly ContractType[] {
  const excluded = new Set<ContractType>(descriptor.except);
  const isPublic = options.isPublic;
  const result: ContractType[] = [];
  for (const contract of implemented) {
    if (excluded.has(contract) || result.includes(contract)) continue;
    if (!descriptor.includeNonPublic && isPublic && !isPublic(contract)) continue;
    result.push(contract);
  }
  return result;
}
