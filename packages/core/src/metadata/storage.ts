import "reflect-metadata";
import type { ContractType, Type } from "@wirebind/types";

export type MemberKey = string | symbol;

/**
 * Decorator usable on classes and on methods, properties and accessors
 * (static or instance). `propertyKey` is absent for classes.
 */
export type ClassOrMemberDecorator = (
  target: object,
  propertyKey?: MemberKey,
  descriptor?: PropertyDescriptor,
) => void;

export type ExportedMember = {
  key: MemberKey;
  static: boolean;
};

export function readOwn<T>(metadataKey: string, target: object, member?: MemberKey): T | undefined {
  return member === undefined
    ? Reflect.getOwnMetadata(metadataKey, target)
    : Reflect.getOwnMetadata(metadataKey, target, member);
}

export function writeOwn(
  metadataKey: string,
  value: unknown,
  target: object,
  member?: MemberKey,
): void {
  if (member === undefined) {
    Reflect.defineMetadata(metadataKey, value, target);
  } else {
    Reflect.defineMetadata(metadataKey, value, target, member);
  }
}

/**
 * Prepends to a metadata list. Decorators apply bottom-up, so prepending
 * keeps the list in declaration order.
 */
export function prependOwn<T>(
  metadataKey: string,
  value: T,
  target: object,
  member?: MemberKey,
): void {
  const existing = readOwn<T[]>(metadataKey, target, member) ?? [];
  writeOwn(metadataKey, [value, ...existing], target, member);
}

/** The class a decorator target belongs to: itself for classes and static members. */
export function ownerClass(target: object): object {
  return typeof target === "function" ? target : target.constructor;
}

export function memberHost(classTarget: object, member: ExportedMember): object {
  if (member.static || typeof classTarget !== "function") return classTarget;
  const proto: unknown = Reflect.get(classTarget, "prototype");
  return typeof proto === "object" && proto !== null ? proto : classTarget;
}

/** Records a member on its owning class so readers can enumerate annotated members. */
export function trackMember(
  metadataKey: string,
  target: object,
  member: MemberKey,
): void {
  const owner = ownerClass(target);
  const isStatic = typeof target === "function";
  const existing = readOwn<ExportedMember[]>(metadataKey, owner) ?? [];
  if (existing.some((m) => m.key === member && m.static === isStatic)) return;
  writeOwn(metadataKey, [...existing, { key: member, static: isStatic }], owner);
}

/**
 * The compiler's emitted type for a member, or undefined when none was emitted
 * or it erased to `Object` (interfaces, unions) or `Promise`.
 */
export function declaredMemberType(
  target: object,
  member: MemberKey,
  descriptor?: PropertyDescriptor,
): Type | undefined {
  const metadataKey =
    descriptor && typeof descriptor.value === "function" ? "design:returntype" : "design:type";
  return meaningfulType(Reflect.getMetadata(metadataKey, target, member));
}

export function declaredParameterType(
  target: object,
  member: MemberKey | undefined,
  index: number,
): Type | undefined {
  const paramTypes: unknown =
    member === undefined
      ? Reflect.getMetadata("design:paramtypes", target)
      : Reflect.getMetadata("design:paramtypes", target, member);
  return Array.isArray(paramTypes) ? meaningfulType(paramTypes[index]) : undefined;
}

function meaningfulType(value: unknown): Type | undefined {
  if (!isClassType(value)) return undefined;
  if (value === Object || value === Promise || value === Function) return undefined;
  return value;
}

/** Emitted design types are always class references. */
export function isClassType(value: unknown): value is Type {
  return typeof value === "function" && typeof Reflect.get(value, "prototype") === "object";
}

export function contractToString(contract: ContractType): string {
  if (typeof contract === "function") return contract.name;
  return String(contract);
}

export function describeTarget(target: object, member?: MemberKey): string {
  const owner = className(ownerClass(target));
  if (member === undefined) return owner;
  const memberName = String(member);
  return typeof target === "function" ? `${owner}.static ${memberName}` : `${owner}.${memberName}`;
}

function className(owner: object): string {
  const name: unknown = Reflect.get(owner, "name");
  return typeof name === "string" && name.length > 0 ? name : "<anonymous>";
}
