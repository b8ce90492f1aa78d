// Parse context: builds the element containment tree and the dependency graph

import {
  DslLogicError,
  ERROR_CODE_CYCLE,
  IllegalStateError,
} from "../errors.js";
import { hasKey, isRawMap, type RawValue } from "../model.js";
import {
  Element,
  UNKNOWN_ELEMENT,
  type ElementRegistry,
  type ElementTree,
  type ElementType,
} from "./element.js";
import { DirectedGraph } from "./graph.js";
import {
  INPUTS,
  SELF_TYPE,
  toRequirement,
  type Requirement,
} from "./requirements.js";
import type { SchemaDescriptor } from "./schema.js";

export class Context implements ElementTree {
  readonly inputs: Readonly<Record<string, unknown>>;
  private readonly elementsByType = new Map<string, Element[]>();
  private readonly tree = new DirectedGraph<Element>();
  private readonly elementGraph: DirectedGraph<Element>;
  private rootElement: Element | undefined;

  constructor(
    readonly registry: ElementRegistry,
    value: RawValue | undefined,
    rootType: string,
    rootName: string,
    inputs: Readonly<Record<string, unknown>> = {}
  ) {
    this.inputs = inputs;
    const type = registry.get(rootType);
    this.traverseElementType(type, rootName, value, undefined);
    this.elementGraph = this.calculateElementGraph();
  }

  get root(): Element | undefined {
    return this.rootElement;
  }

  get parsedValue(): unknown {
    return this.rootElement?.value;
  }

  elementsOfType(typeName: string): readonly Element[] {
    return this.elementsByType.get(typeName) ?? [];
  }

  parentOf(element: Element): Element | undefined {
    const parents = this.tree.predecessors(element);
    if (parents.length > 1) {
      throw new IllegalStateError(
        `More than 1 parent found for ${String(element.name)}`
      );
    }
    return parents[0];
  }

  childrenOf(element: Element): Element[] {
    return this.tree.successors(element);
  }

  descendantsOf(element: Element): Element[] {
    return this.tree.descendants(element);
  }

  /**
   * Elements ordered so that every element follows its children and its
   * dependencies. Fails with a cycle error when no such order exists.
   */
  processingOrder(): Element[] {
    const order = this.elementGraph.topologicalSort();
    if (order) return order;

    const cycle = this.elementGraph.findCycle() ?? [];
    const names = cycle.map((e) => String(e.name));
    if (names.length > 0) names.push(names[0]);
    const error = new DslLogicError(
      ERROR_CODE_CYCLE,
      `Parsing failed. Circular dependency detected: ${names.join(" --> ")}`
    );
    error.circularDependency = names;
    throw error;
  }

  // --- tree construction ---

  private addElement(element: Element, parent: Element | undefined): void {
    const sameType = this.elementsByType.get(element.type.name);
    if (sameType) sameType.push(element);
    else this.elementsByType.set(element.type.name, [element]);

    this.tree.addNode(element);
    if (parent) this.tree.addEdge(parent, element);
    else this.rootElement = element;
  }

  private traverseElementType(
    type: ElementType,
    name: string | number,
    value: RawValue | undefined,
    parent: Element | undefined
  ): void {
    const element = new Element(this, type, name, value);
    this.addElement(element, parent);
    this.traverseSchema(type.schema, element);
  }

  private traverseSchema(schema: SchemaDescriptor, parent: Element): void {
    const value = parent.initialValue;
    switch (schema.kind) {
      case "leaf":
      case "unknown":
        return;
      case "record": {
        if (!isRawMap(value)) return;
        for (const [key, typeName] of Object.entries(schema.fields)) {
          const child = hasKey(value, key) ? value[key] : undefined;
          const type = this.registry.get(typeName);
          this.traverseElementType(type, key, child, parent);
        }
        for (const [key, child] of Object.entries(value)) {
          if (hasKey(schema.fields, key)) continue;
          this.traverseElementType(UNKNOWN_ELEMENT, key, child, parent);
        }
        return;
      }
      case "dict": {
        if (!isRawMap(value)) return;
        const type = this.registry.get(schema.elementType);
        for (const [key, child] of Object.entries(value)) {
          this.traverseElementType(type, key, child, parent);
        }
        return;
      }
      case "list": {
        if (!Array.isArray(value)) return;
        const type = this.registry.get(schema.elementType);
        value.forEach((child, index) =>
          this.traverseElementType(type, index, child, parent)
        );
        return;
      }
      case "alternatives":
        for (const option of schema.options) {
          this.traverseSchema(option, parent);
        }
        return;
    }
  }

  // --- dependency graph ---

  private calculateElementGraph(): DirectedGraph<Element> {
    const graph = this.tree.copy();
    for (const [typeName, elements] of this.elementsByType) {
      const type = this.registry.get(typeName);
      const requires = type.requires ?? {};
      for (const [requiredKey, entries] of Object.entries(requires)) {
        if (requiredKey === INPUTS) continue;
        const requiredType = resolveRequiredType(requiredKey, type);
        const predicates = entries
          .map(toRequirement)
          .flatMap((r: Requirement) => (r.predicate ? [r.predicate] : []));
        for (const dependency of this.elementsOfType(requiredType)) {
          for (const element of elements) {
            const related = predicates.every((predicate) =>
              predicate(element, dependency)
            );
            if (related) {
              graph.addEdge(element, dependency);
            }
          }
        }
      }
    }
    // Flip so a topological order puts producers before their consumers.
    return graph.reverse();
  }
}

export function resolveRequiredType(
  requiredKey: string,
  type: ElementType
): string {
  return requiredKey === SELF_TYPE ? type.name : requiredKey;
}
