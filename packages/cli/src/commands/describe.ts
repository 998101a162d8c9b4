/**
 * describe command - print a class's members
 */

import type { ClassRegistry, Result } from "@metareflect/reflection";
import type { CommandFailure } from "../types.js";

export const describeClass = (
  registry: ClassRegistry,
  className: string
): Result<string, CommandFailure> => {
  const descriptor = registry.getClass(className);
  if (descriptor === undefined) {
    return {
      ok: false,
      error: { kind: "lookup", message: `Unknown class '${className}'` },
    };
  }

  const lines = [
    `class ${descriptor.name}`,
    `  parent: ${descriptor.parent?.name ?? "(none)"}`,
    `  instantiatable: ${descriptor.isInstantiatable() ? "yes" : "no"}`,
  ];

  const methods = descriptor.getMethods();
  if (methods.length === 0) {
    lines.push("  methods: (none)");
  } else {
    lines.push("  methods:");
    for (const method of methods) {
      lines.push(`    ${method.toSignatureString()}`);
    }
  }

  const properties = descriptor.getProperties();
  if (properties.length === 0) {
    lines.push("  properties: (none)");
  } else {
    lines.push("  properties:");
    for (const property of properties) {
      const access =
        property.isReadable() && property.isWritable()
          ? "read-write"
          : property.isReadable()
            ? "read-only"
            : "write-only";
      lines.push(`    ${property.name}: ${property.getKind()} (${access})`);
    }
  }

  return { ok: true, value: lines.join("\n") };
};
