import type {
  AbstractType,
  ContractKey,
  ExportCondition,
  ResolutionRequest,
} from "@wirebind/types";

export type RequestPredicate = (request: ResolutionRequest) => boolean;

export type ParentLookupOptions = {
  /**
   * Skip decorator and wrapper requests between the current request and the
   * service that actually depends on it.
   */
  skipDecoratorsAndWrappers?: boolean;
};

function findParent(
  request: ResolutionRequest,
  options: ParentLookupOptions,
): ResolutionRequest | undefined {
  let parent = request.parent;
  if (options.skipDecoratorsAndWrappers) {
    while (parent?.isDecoratorOrWrapper) parent = parent.parent;
  }
  return parent;
}

/** Adapts a plain predicate to the condition contract. */
export class PredicateCondition implements ExportCondition {
  constructor(private readonly predicate: RequestPredicate) {}

  evaluate(request: ResolutionRequest): boolean {
    return this.predicate(request);
  }
}

/** Eligible only when the candidate is requested directly, not as a dependency. */
export class RootCondition implements ExportCondition {
  evaluate(request: ResolutionRequest): boolean {
    return request.parent === undefined;
  }
}

/** Eligible when the requesting parent exists and satisfies the predicate. */
export class ParentCondition implements ExportCondition {
  constructor(
    private readonly predicate: RequestPredicate,
    private readonly options: ParentLookupOptions = {},
  ) {}

  evaluate(request: ResolutionRequest): boolean {
    const parent = findParent(request, this.options);
    return parent !== undefined && this.predicate(parent);
  }
}

/** Eligible when any request above the current one satisfies the predicate. */
export class AncestorCondition implements ExportCondition {
  constructor(private readonly predicate: RequestPredicate) {}

  evaluate(request: ResolutionRequest): boolean {
    for (let node = request.parent; node; node = node.parent) {
      if (this.predicate(node)) return true;
    }
    return false;
  }
}

export class AllOfCondition implements ExportCondition {
  constructor(private readonly conditions: readonly ExportCondition[]) {}

  evaluate(request: ResolutionRequest): boolean {
    return this.conditions.every((c) => c.evaluate(request));
  }
}

export class AnyOfCondition implements ExportCondition {
  constructor(private readonly conditions: readonly ExportCondition[]) {}

  evaluate(request: ResolutionRequest): boolean {
    return this.conditions.some((c) => c.evaluate(request));
  }
}

export class NotCondition implements ExportCondition {
  constructor(private readonly inner: ExportCondition) {}

  evaluate(request: ResolutionRequest): boolean {
    return !this.inner.evaluate(request);
  }
}

export function condition(predicate: RequestPredicate): ExportCondition {
  return new PredicateCondition(predicate);
}

export function whenRoot(): ExportCondition {
  return new RootCondition();
}

export function whenParent(
  predicate: RequestPredicate,
  options: ParentLookupOptions = {},
): ExportCondition {
  return new ParentCondition(predicate, options);
}

/** Keys are compared with `Object.is`. */
export function whenParentServiceKey(
  key: ContractKey,
  options: ParentLookupOptions = {},
): ExportCondition {
  return new ParentCondition((parent) => Object.is(parent.serviceKey, key), options);
}

/** Eligible when the dependent's implementation type is `implementationType` or a subclass. */
export function whenInjectedInto(
  implementationType: AbstractType,
  options: ParentLookupOptions = { skipDecoratorsAndWrappers: true },
): ExportCondition {
  return new ParentCondition((parent) => {
    const impl = parent.implementationType;
    if (impl === undefined) return false;
    return impl === implementationType || impl.prototype instanceof implementationType;
  }, options);
}

export function whenAnyAncestor(predicate: RequestPredicate): ExportCondition {
  return new AncestorCondition(predicate);
}

export function allOf(...conditions: ExportCondition[]): ExportCondition {
  return new AllOfCondition(conditions);
}

export function anyOf(...conditions: ExportCondition[]): ExportCondition {
  return new AnyOfCondition(conditions);
}

export function not(inner: ExportCondition): ExportCondition {
  return new NotCondition(inner);
}
