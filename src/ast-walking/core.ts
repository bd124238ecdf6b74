import type { NativeFunction } from "./values.ts";

export const nativeFuncs: Record<string, NativeFunction> = {
  clock: {
    type: "NativeFunction",
    name: "clock",
    arity: 0,
    fn: () => Date.now() / 1000,
  },
};
