import { RuntimeError } from "../errors.ts";
import type { Token } from "../token.ts";
import type { Value } from "./values.ts";

/** One lexical scope; closures keep the whole chain alive */
export class Environment {
  private values = new Map<string, Value>();

  constructor(public readonly enclosing: Environment | null = null) {}

  // for `var`, parameters, and the `this`/`super` bindings
  public define = (name: string, value: Value): void => {
    this.values.set(name, value);
  };

  public has = (name: string): boolean =>
    this.values.has(name) || (this.enclosing?.has(name) ?? false);

  public get = (name: Token): Value => {
    for (
      let env: Environment | null = this;
      env !== null;
      env = env.enclosing
    ) {
      if (env.values.has(name.lexeme)) {
        return env.values.get(name.lexeme) ?? null;
      }
    }
    throw new RuntimeError(name, `Undefined variable '${name.lexeme}'.`);
  };

  // for modify the value of a variable after it was declared
  public assign = (name: Token, value: Value): void => {
    for (
      let env: Environment | null = this;
      env !== null;
      env = env.enclosing
    ) {
      if (env.values.has(name.lexeme)) {
        env.values.set(name.lexeme, value);
        return;
      }
    }
    throw new RuntimeError(name, `Undefined variable '${name.lexeme}'.`);
  };
}
