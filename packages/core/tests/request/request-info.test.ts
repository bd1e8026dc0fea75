import { describe, it, expect } from "vitest";
import { RequestInfo } from "../../src/request/request-info";

const IService = Symbol("IService");
const IRepository = Symbol("IRepository");
const IConnection = Symbol("IConnection");

class SqlRepository {}

function buildChain(depth: number): RequestInfo {
  let node = RequestInfo.root({ serviceType: "step-0" });
  for (let i = 1; i < depth; i++) {
    node = node.push({ serviceType: `step-${i}` });
  }
  return node;
}

describe("RequestInfo", () => {
  describe("construction", () => {
    it("should create a root node without a parent", () => {
      // Arrange & Act
      const root = RequestInfo.root({ serviceType: IService });

      // Assert
      expect(root.parent).toBeUndefined();
      expect(root.isRoot).toBe(true);
      expect(root.depth).toBe(1);
      expect(root.isDecoratorOrWrapper).toBe(false);
      expect(root.serviceKey).toBeUndefined();
      expect(root.implementationType).toBeUndefined();
    });

    it("should link a pushed node to the node it was pushed from", () => {
      // Arrange
      const root = RequestInfo.root({ serviceType: IService });

      // Act
      const child = root.push({
        serviceType: IRepository,
        serviceKey: "primary",
        implementationType: SqlRepository,
        isDecoratorOrWrapper: true,
      });

      // Assert
      expect(child.parent).toBe(root);
      expect(child.depth).toBe(2);
      expect(child.isRoot).toBe(false);
      expect(child.serviceType).toBe(IRepository);
      expect(child.serviceKey).toBe("primary");
      expect(child.implementationType).toBe(SqlRepository);
      expect(child.isDecoratorOrWrapper).toBe(true);
    });

    it("should accept the parent through the constructor", () => {
      // Arrange
      const root = RequestInfo.root({ serviceType: IService });

      // Act
      const child = new RequestInfo(root, { serviceType: IRepository });

      // Assert
      expect(child.parent).toBe(root);
      expect(child.depth).toBe(2);
    });

    it("should leave the previous node unchanged when extending", () => {
      // Arrange
      const root = RequestInfo.root({ serviceType: IService });

      // Act
      root.push({ serviceType: IRepository });
      root.push({ serviceType: IConnection });

      // Assert
      expect([...root]).toEqual([root]);
      expect(root.depth).toBe(1);
    });

    it("should share tails between chains extended from the same node", () => {
      // Arrange
      const root = RequestInfo.root({ serviceType: IService });

      // Act
      const a = root.push({ serviceType: IRepository });
      const b = root.push({ serviceType: IConnection });

      // Assert
      expect(a.parent).toBe(b.parent);
    });

    it("should freeze nodes", () => {
      // Arrange
      const root = RequestInfo.root({ serviceType: IService });

      // Act & Assert
      expect(Object.isFrozen(root)).toBe(true);
      expect(Reflect.set(root, "serviceKey", "changed")).toBe(false);
      expect(root.serviceKey).toBeUndefined();
    });
  });

  describe("traversal", () => {
    it("should yield exactly one element for a root-only chain", () => {
      // Arrange
      const root = RequestInfo.root({ serviceType: IService });

      // Act
      const nodes = [...root];

      // Assert
      expect(nodes).toEqual([root]);
    });

    it("should yield the current request first and the root last", () => {
      // Arrange
      const root = RequestInfo.root({ serviceType: IService });
      const repo = root.push({ serviceType: IRepository, serviceKey: "primary" });
      const conn = repo.push({ serviceType: IConnection });

      // Act
      const types = [...conn].map((r) => r.serviceType);

      // Assert
      expect(types).toEqual([IConnection, IRepository, IService]);
    });

    it("should visit each ancestor exactly once and end at a node without a parent", () => {
      // Arrange
      for (const depth of [1, 2, 5, 20]) {
        const node = buildChain(depth);

        // Act
        const nodes = [...node];

        // Assert
        expect(nodes).toHaveLength(depth);
        expect(new Set(nodes).size).toBe(depth);
        expect(nodes[nodes.length - 1].parent).toBeUndefined();
        expect(nodes.map((n) => n.serviceType)).toEqual(
          Array.from({ length: depth }, (_, i) => `step-${depth - 1 - i}`),
        );
      }
    });

    it("should restart from the same node on every iteration", () => {
      // Arrange
      const node = buildChain(3);

      // Act
      const first = [...node];
      const second = [...node];

      // Assert
      expect(second).toEqual(first);
      expect(second[0]).toBe(node);
    });

    it("should iterate lazily", () => {
      // Arrange
      const node = buildChain(4);
      const iterator = node[Symbol.iterator]();

      // Act
      const first = iterator.next();

      // Assert
      expect(first).toEqual({ value: node, done: false });
    });

    it("should list ancestors without the current node", () => {
      // Arrange
      const root = RequestInfo.root({ serviceType: IService });
      const child = root.push({ serviceType: IRepository });

      // Act & Assert
      expect([...child.ancestors()]).toEqual([root]);
      expect([...root.ancestors()]).toEqual([]);
    });

    it("should expose the root of the chain", () => {
      // Arrange
      const root = RequestInfo.root({ serviceType: IService });
      const leaf = root.push({ serviceType: IRepository }).push({ serviceType: IConnection });

      // Act & Assert
      expect(leaf.root).toBe(root);
      expect(root.root).toBe(root);
    });

    it("should find the nearest matching request", () => {
      // Arrange
      const root = RequestInfo.root({ serviceType: IService, serviceKey: "a" });
      const mid = root.push({ serviceType: IRepository, serviceKey: "a" });
      const leaf = mid.push({ serviceType: IConnection });

      // Act
      const found = leaf.find((r) => r.serviceKey === "a");
      const missing = leaf.find((r) => r.serviceKey === "b");

      // Assert
      expect(found).toBe(mid);
      expect(missing).toBeUndefined();
    });
  });
});
