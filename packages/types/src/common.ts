// Constructor type for classes the container can instantiate. Uses `any[]` for
// constructor params because TypeScript's contravariance rejects typed
// constructors against `unknown[]`.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Type<T = unknown> = new (...args: any[]) => T;

// Abstract classes are valid contracts but cannot be constructed.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AbstractType<T = unknown> = abstract new (...args: any[]) => T;

// Contract a service is exported under — class, abstract class, or a string/symbol
// token standing in for an interface (interfaces have no runtime identity).
export type ContractType = string | symbol | AbstractType;

// Service key — any non-nullish value. Keys are compared with Object.is.
export type ContractKey = string | number | symbol | object;
