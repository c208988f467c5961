/**
 * Fresh identifier allocation
 */

import * as t from '@babel/types';

export class NameAllocator {
  private readonly used = new Set<string>();

  /**
   * Reserve every identifier under `root` that can refer to a binding.
   * Static property keys (`{ state: x }`, `a.state`) never shadow anything.
   */
  constructor(root: t.Node, reserved: readonly string[] = []) {
    t.traverse(root, (node, ancestors) => {
      if (t.isIdentifier(node) && !isPropertyName(ancestors[ancestors.length - 1])) {
        this.used.add(node.name);
      }
    });
    for (const name of reserved) {
      this.used.add(name);
    }
  }

  /**
   * Return `base`, or `base2`, `base3`, ... when taken
   */
  allocate(base: string): string {
    const stem = t.toIdentifier(base);
    let name = stem;
    for (let i = 2; this.used.has(name); i++) {
      name = `${stem}${i}`;
    }
    this.used.add(name);
    return name;
  }
}

function isPropertyName(slot: t.TraversalAncestors[number] | undefined): boolean {
  if (!slot) {
    return false;
  }
  const { node, key } = slot;
  if (key === 'property') {
    return (t.isMemberExpression(node) || t.isOptionalMemberExpression(node)) && !node.computed;
  }
  if (key === 'key') {
    return (
      (t.isObjectProperty(node) ||
        t.isObjectMethod(node) ||
        t.isClassMethod(node) ||
        t.isClassProperty(node) ||
        t.isTSPropertySignature(node)) &&
      !node.computed
    );
  }
  return false;
}
