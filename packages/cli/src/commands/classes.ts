/**
 * classes command - print the class hierarchy
 */

import type { ClassRegistry, ReflectionClass } from "@metareflect/reflection";

/**
 * One line per class, children indented under their parent, siblings by name.
 */
export const listClasses = (registry: ClassRegistry): string => {
  const classes = registry.getClasses();
  const lines: string[] = [];

  const visit = (descriptor: ReflectionClass, depth: number): void => {
    const marker = descriptor.isInstantiatable() ? "" : " (abstract)";
    lines.push(`${"  ".repeat(depth)}${descriptor.name}${marker}`);
    for (const child of classes) {
      if (child.parent === descriptor) {
        visit(child, depth + 1);
      }
    }
  };

  for (const descriptor of classes) {
    if (descriptor.parent === undefined || !classes.includes(descriptor.parent)) {
      visit(descriptor, 0);
    }
  }
  return lines.join("\n");
};
