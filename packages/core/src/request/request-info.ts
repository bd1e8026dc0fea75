import type {
  ContractKey,
  ContractType,
  RequestStep,
  ResolutionRequest,
  Type,
} from "@wirebind/types";

/**
 * One step of an in-progress resolution, linked back to the step that
 * requested it. Nodes are frozen on construction; extending a chain creates
 * a new node whose parent is the previous one, so chains share their tails
 * and concurrent resolutions never touch each other's nodes.
 *
 * Iteration is lazy and restartable: the current request first, the root
 * request last.
 *
 * @example
 * ```ts
 * const root = RequestInfo.root({ serviceType: OrderService });
 * const request = root.push({ serviceType: "IRepository", serviceKey: "primary" });
 * [...request].map((r) => r.serviceType); // ["IRepository", OrderService]
 * ```
 */
export class RequestInfo implements ResolutionRequest {
  readonly parent: RequestInfo | undefined;
  readonly isDecoratorOrWrapper: boolean;
  readonly serviceType: ContractType;
  readonly serviceKey: ContractKey | undefined;
  readonly implementationType: Type | undefined;
  /** Number of nodes from this one to the root, inclusive. */
  readonly depth: number;

  constructor(parent: RequestInfo | undefined, step: RequestStep) {
    this.parent = parent;
    this.isDecoratorOrWrapper = step.isDecoratorOrWrapper ?? false;
    this.serviceType = step.serviceType;
    this.serviceKey = step.serviceKey;
    this.implementationType = step.implementationType;
    this.depth = parent ? parent.depth + 1 : 1;
    Object.freeze(this);
  }

  static root(step: RequestStep): RequestInfo {
    return new RequestInfo(undefined, step);
  }

  /** Returns a new node for a dependency of this request. This node is unchanged. */
  push(step: RequestStep): RequestInfo {
    return new RequestInfo(this, step);
  }

  get isRoot(): boolean {
    return this.parent === undefined;
  }

  get root(): RequestInfo {
    let current: RequestInfo = this;
    while (current.parent) current = current.parent;
    return current;
  }

  *[Symbol.iterator](): Iterator<RequestInfo> {
    for (let node: RequestInfo | undefined = this; node; node = node.parent) {
      yield node;
    }
  }

  /** Traversal without the current node: parent first, root last. */
  *ancestors(): Generator<RequestInfo> {
    if (this.parent) yield* this.parent;
  }

  find(predicate: (request: RequestInfo) => boolean): RequestInfo | undefined {
    for (const node of this) {
      if (predicate(node)) return node;
    }
    return undefined;
  }
}
