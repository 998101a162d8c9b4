/**
 * Class module the dispatcher tests load through metareflect.json
 */

import {
  ManualObject,
  defineClass,
  method,
  param,
  staticMethod,
  type ClassRegistry,
} from "@metareflect/reflection";

export class Tally extends ManualObject {
  total = 0;

  static double(value: number): number {
    return value * 2;
  }

  add(amount: number): number {
    this.total += amount;
    return this.total;
  }
}

export const register = (registry: ClassRegistry): void => {
  defineClass(
    {
      name: "::Tally",
      type: Tally,
      parent: "::Meta::ManualObject",
      factory: () => new Tally(),
      methods: [
        staticMethod("Double", Tally.double, {
          returns: "Int32",
          parameters: [param("value", "Int32")],
        }),
        method("Add", Tally, Tally.prototype.add, {
          returns: "Int32",
          parameters: [param("amount", "Int32", 1n)],
        }),
      ],
    },
    registry
  );
};
