// Element: one typed node of a parsed document, plus the element type registry

import { DslSchemaApiError, IllegalStateError } from "../errors.js";
import type { DslVersion, RawValue } from "../model.js";
import type { Requirement } from "./requirements.js";
import type { SchemaDescriptor } from "./schema.js";

/** Values extracted for an element's requirements, keyed by name. */
export type RequirementValues = Readonly<Record<string, unknown>>;

export interface ElementType {
  readonly name: string;
  readonly schema: SchemaDescriptor;
  readonly required?: boolean;
  /**
   * Requirements keyed by the required element type's name, or by the
   * special keys "self" and "inputs". An empty list declares an ordering
   * dependency only.
   */
  readonly requires?: Readonly<
    Record<string, readonly (string | Requirement)[]>
  >;
  /** DSL version that introduced this element. */
  readonly supportedVersion?: DslVersion;
  validate?(element: Element, args: RequirementValues): void;
  parse?(element: Element, args: RequirementValues): unknown;
  calculateProvided?(
    element: Element,
    args: RequirementValues
  ): Record<string, unknown>;
}

export interface ElementTree {
  parentOf(element: Element): Element | undefined;
  childrenOf(element: Element): Element[];
  descendantsOf(element: Element): Element[];
}

export const UNKNOWN_ELEMENT: ElementType = {
  name: "UnknownElement",
  schema: { kind: "unknown" },
};

export class Element {
  value: unknown = undefined;
  provided: Readonly<Record<string, unknown>> = {};

  constructor(
    readonly tree: ElementTree,
    readonly type: ElementType,
    readonly name: string | number,
    readonly initialValue: RawValue | undefined
  ) {}

  get schema(): SchemaDescriptor {
    return this.type.schema;
  }

  get required(): boolean {
    return this.type.required ?? false;
  }

  get parent(): Element | undefined {
    return this.tree.parentOf(this);
  }

  children(): Element[] {
    return this.tree.childrenOf(this);
  }

  child(name: string | number): Element | undefined {
    return this.children().find((c) => c.name === name);
  }

  descendants(): Element[] {
    return this.tree.descendantsOf(this);
  }

  ancestor(typeName: string): Element {
    for (let current = this.parent; current; current = current.parent) {
      if (current.type.name === typeName) return current;
    }
    throw new IllegalStateError(
      `No ancestor of type '${typeName}' found for '${this.path}'`
    );
  }

  /** Dotted containment path from the root, indices in brackets. */
  get path(): string {
    const parent = this.parent;
    if (!parent) return String(this.name);
    return typeof this.name === "number"
      ? `${parent.path}[${this.name}]`
      : `${parent.path}.${this.name}`;
  }

  /** Child name to child value for every declared (non-unknown) child. */
  buildDictResult(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const child of this.children()) {
      if (child.type === UNKNOWN_ELEMENT) continue;
      result[String(child.name)] =
        child.value === undefined ? null : child.value;
    }
    return result;
  }

  toString(): string {
    return `${this.type.name}(${this.path})`;
  }
}

/** Dispatch table from element type name to its schema and hooks. */
export class ElementRegistry {
  private readonly types = new Map<string, ElementType>();

  constructor(types: Iterable<ElementType> = []) {
    this.types.set(UNKNOWN_ELEMENT.name, UNKNOWN_ELEMENT);
    for (const type of types) this.define(type);
  }

  define(...types: ElementType[]): this {
    for (const type of types) {
      if (this.types.has(type.name)) {
        throw new DslSchemaApiError(
          `Element type '${type.name}' is already defined`
        );
      }
      this.types.set(type.name, type);
    }
    return this;
  }

  has(name: string): boolean {
    return this.types.has(name);
  }

  get(name: string): ElementType {
    const type = this.types.get(name);
    if (!type) {
      throw new DslSchemaApiError(`Element type '${name}' is not defined`);
    }
    return type;
  }
}
