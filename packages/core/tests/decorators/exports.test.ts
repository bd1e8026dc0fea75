import "reflect-metadata";
import { describe, it, expect } from "vitest";
import {
  Export,
  ExportWithKey,
  ExportMany,
  AsFactory,
  AsWrapper,
  AsDecorator,
  OpenResolutionScope,
  AsResolutionRoot,
  Implements,
} from "../../src/decorators/exports";
import { getExports, getExportedMembers, isExported } from "../../src/metadata/readers";
import { EXPORT_METADATA } from "../../src/metadata/constants";
import { InvalidAnnotationError } from "../../src/errors/wirebind-error";

const IGreeter = Symbol("IGreeter");
const IDisposable = Symbol("IDisposable");

abstract class Repository {}

describe("@Export", () => {
  it("should default the contract type to the annotated class", () => {
    // Arrange & Act
    @Export()
    class Greeter {}

    // Assert
    expect(Reflect.getOwnMetadata(EXPORT_METADATA, Greeter)).toEqual([
      { kind: "export", contractType: Greeter, contractName: undefined },
    ]);
  });

  it("should store an explicit contract type and name", () => {
    // Arrange & Act
    @Export(IGreeter, { contractName: "english" })
    class EnglishGreeter {}

    // Assert
    expect(getExports(EnglishGreeter)).toEqual([
      { kind: "export", contractType: IGreeter, contractName: "english" },
    ]);
  });

  it("should accept abstract classes as contracts", () => {
    // Arrange & Act
    @Export(Repository)
    class SqlRepository extends Repository {}

    // Assert
    expect(getExports(SqlRepository)[0]).toMatchObject({ contractType: Repository });
  });

  it("should accumulate several exports in declaration order", () => {
    // Arrange & Act
    @Export(IGreeter)
    @ExportWithKey("fallback", IGreeter)
    @AsResolutionRoot()
    class Greeter {}

    // Assert
    expect(getExports(Greeter).map((e) => e.kind)).toEqual([
      "export",
      "exportWithKey",
      "asResolutionRoot",
    ]);
  });

  it("should report whether a class is exported", () => {
    // Arrange
    @Export()
    class Exported {}

    class NotExported {}

    // Act & Assert
    expect(isExported(Exported)).toBe(true);
    expect(isExported(NotExported)).toBe(false);
    expect(getExports(NotExported)).toEqual([]);
  });

  it("should freeze stored descriptors", () => {
    // Arrange & Act
    @Export()
    class Greeter {}

    // Assert
    expect(Object.isFrozen(getExports(Greeter)[0])).toBe(true);
  });
});

describe("member exports", () => {
  it("should store exports on instance and static members and track them on the class", () => {
    // Arrange & Act
    @AsFactory()
    class Factories {
      @Export(IGreeter)
      createGreeter() {
        return {};
      }

      @ExportWithKey("admin", IGreeter)
      static createAdminGreeter() {
        return {};
      }

      @Export(IDisposable)
      connection: unknown = null;
    }

    // Assert
    expect(getExports(Factories)).toEqual([{ kind: "asFactory" }]);
    expect(getExports(Factories.prototype, "createGreeter")).toEqual([
      { kind: "export", contractType: IGreeter, contractName: undefined },
    ]);
    expect(getExports(Factories, "createAdminGreeter")).toEqual([
      {
        kind: "exportWithKey",
        contractKey: "admin",
        contractType: IGreeter,
        contractName: undefined,
      },
    ]);
    const members = getExportedMembers(Factories);
    expect(members).toHaveLength(3);
    expect(members).toEqual(
      expect.arrayContaining([
        { key: "createGreeter", static: false },
        { key: "connection", static: false },
        { key: "createAdminGreeter", static: true },
      ]),
    );
  });

  it("should take the member contract type from emitted design metadata", () => {
    // Arrange
    class Client {}
    class Factories {
      createClient(): Client {
        return new Client();
      }
    }
    Reflect.defineMetadata("design:returntype", Client, Factories.prototype, "createClient");
    const descriptor = Object.getOwnPropertyDescriptor(Factories.prototype, "createClient");

    // Act
    Export()(Factories.prototype, "createClient", descriptor);

    // Assert
    expect(getExports(Factories.prototype, "createClient")[0]).toMatchObject({
      contractType: Client,
    });
  });

  it("should leave the member contract type unset when the design type is Object", () => {
    // Arrange
    class Factories {
      createAnything(): unknown {
        return {};
      }
    }
    Reflect.defineMetadata("design:returntype", Object, Factories.prototype, "createAnything");
    const descriptor = Object.getOwnPropertyDescriptor(Factories.prototype, "createAnything");

    // Act
    Export()(Factories.prototype, "createAnything", descriptor);

    // Assert
    expect(getExports(Factories.prototype, "createAnything")[0]).toMatchObject({
      kind: "export",
      contractType: undefined,
    });
  });
});

describe("@ExportWithKey", () => {
  it("should accept object keys and default the contract type to the class", () => {
    // Arrange
    const key = { region: "eu" };

    // Act
    @ExportWithKey(key)
    class RegionalGreeter {}

    // Assert
    const [exported] = getExports(RegionalGreeter);
    expect(exported).toEqual({
      kind: "exportWithKey",
      contractKey: key,
      contractType: RegionalGreeter,
      contractName: undefined,
    });
    expect(exported.kind === "exportWithKey" && exported.contractKey).toBe(key);
  });
});

describe("@ExportMany", () => {
  it("should default to no exclusions and public contracts only", () => {
    // Arrange & Act
    @ExportMany()
    class Service {}

    // Assert
    expect(getExports(Service)).toEqual([
      {
        kind: "exportMany",
        contractKey: undefined,
        contractName: undefined,
        except: [],
        includeNonPublic: false,
      },
    ]);
  });

  it("should store the exclusion set, key, name and visibility flag", () => {
    // Arrange & Act
    @ExportMany({
      except: [IDisposable],
      contractKey: 42,
      contractName: "main",
      includeNonPublic: true,
    })
    class Service {}

    // Assert
    expect(getExports(Service)[0]).toEqual({
      kind: "exportMany",
      contractKey: 42,
      contractName: "main",
      except: [IDisposable],
      includeNonPublic: true,
    });
  });

  it("should copy the exclusion list", () => {
    // Arrange
    const except = [IDisposable];

    // Act
    @ExportMany({ except })
    class Service {}
    except.push(IGreeter);

    // Assert
    const [exported] = getExports(Service);
    expect(exported.kind === "exportMany" && exported.except).toEqual([IDisposable]);
  });
});

describe("@AsWrapper", () => {
  it("should default to an unspecified type argument", () => {
    // Arrange & Act
    @AsWrapper()
    class Lazy {}

    // Assert
    expect(getExports(Lazy)).toEqual([
      { kind: "asWrapper", wrappedTypeArgIndex: -1, alwaysWrapsRequiredServiceType: false },
    ]);
  });

  it("should store the wrapped argument index and flag", () => {
    // Arrange & Act
    @AsWrapper(1, { alwaysWrapsRequiredServiceType: true })
    class Keyed {}

    // Assert
    expect(getExports(Keyed)).toEqual([
      { kind: "asWrapper", wrappedTypeArgIndex: 1, alwaysWrapsRequiredServiceType: true },
    ]);
  });

  it("should reject indexes below -1 and fractional indexes", () => {
    // Act & Assert
    expect(() => AsWrapper(-2)).toThrow(InvalidAnnotationError);
    expect(() => AsWrapper(0.5)).toThrow(
      "@AsWrapper: wrappedTypeArgIndex must be -1 or a non-negative integer, got 0.5",
    );
  });
});

describe("marker exports", () => {
  it("should store decorator name and key", () => {
    // Arrange & Act
    @AsDecorator({ contractName: "audited", contractKey: "k" })
    class Auditing {}

    // Assert
    expect(getExports(Auditing)).toEqual([
      { kind: "asDecorator", contractName: "audited", contractKey: "k" },
    ]);
  });

  it("should store scope and root markers", () => {
    // Arrange & Act
    @OpenResolutionScope()
    @AsResolutionRoot()
    class Job {}

    // Assert
    expect(getExports(Job)).toEqual([
      { kind: "openResolutionScope" },
      { kind: "asResolutionRoot" },
    ]);
  });
});

describe("@Implements", () => {
  it("should reject an empty contract list", () => {
    // Act & Assert
    expect(() => Implements()).toThrow("@Implements: at least one contract is required");
  });
});
