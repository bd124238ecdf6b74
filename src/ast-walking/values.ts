import type { FunctionStmt } from "../ast.ts";
import type { Environment } from "./environment.ts";

export type Value =
  | null
  | boolean
  | number
  | string
  | Callable
  | LoxInstance;

export type Callable =
  | LoxFunction
  | NativeFunction
  | LoxClass
  | BoundMethod;

/** A function declared in Lox code, with the scope it was declared in */
export type LoxFunction = {
  readonly type: "LoxFunction";
  readonly declaration: FunctionStmt;
  readonly closure: Environment;
  readonly isInitializer: boolean;
};

/** Host-implemented function */
export type NativeFunction = {
  readonly type: "NativeFunction";
  readonly name: string;
  readonly arity: number;
  readonly fn: (...args: Value[]) => Value;
};

export type LoxClass = {
  readonly type: "LoxClass";
  readonly name: string;
  readonly superclass: LoxClass | null;
  readonly methods: ReadonlyMap<string, LoxFunction>;
};

/** A method paired with the instance it was read from */
export type BoundMethod = {
  readonly type: "BoundMethod";
  readonly receiver: LoxInstance;
  readonly method: LoxFunction;
};

export type LoxInstance = {
  readonly type: "LoxInstance";
  readonly klass: LoxClass;
  readonly fields: Map<string, Value>;
};

export const isCallable = (value: Value): value is Callable =>
  value !== null && typeof value === "object" &&
  value.type !== "LoxInstance";

export const isInstance = (value: Value): value is LoxInstance =>
  value !== null && typeof value === "object" &&
  value.type === "LoxInstance";

export const isClass = (value: Value): value is LoxClass =>
  value !== null && typeof value === "object" && value.type === "LoxClass";

export const isTruthy = (value: Value): boolean => {
  if (value === null) return false;
  if (typeof value === "boolean") return value;
  return true;
};

// cross-type comparisons are false; objects compare by identity
export const isEqual = (a: Value, b: Value): boolean => a === b;

export const findMethod = (
  klass: LoxClass,
  name: string,
): LoxFunction | null => {
  for (
    let current: LoxClass | null = klass;
    current !== null;
    current = current.superclass
  ) {
    const method = current.methods.get(name);
    if (method) return method;
  }
  return null;
};

export const arity = (callee: Callable): number => {
  switch (callee.type) {
    case "LoxFunction":
      return callee.declaration.params.length;
    case "NativeFunction":
      return callee.arity;
    case "BoundMethod":
      return callee.method.declaration.params.length;
    case "LoxClass": {
      const initializer = findMethod(callee, "init");
      return initializer ? initializer.declaration.params.length : 0;
    }
  }
};

export const stringify = (value: Value): string => {
  if (value === null) return "nil";
  if (typeof value === "number") {
    return Object.is(value, -0) ? "-0" : String(value);
  }
  if (typeof value !== "object") return String(value);

  switch (value.type) {
    case "LoxFunction":
      return `<fn ${value.declaration.name.lexeme}>`;
    case "BoundMethod":
      return `<fn ${value.method.declaration.name.lexeme}>`;
    case "NativeFunction":
      return "<native fn>";
    case "LoxClass":
      return value.name;
    case "LoxInstance":
      return `${value.klass.name} instance`;
  }
};
