// src/core/patterns/registry.ts
// Pattern tables for pure rewrites and drawing commands
//
// Tables are assembled once by a PatternRegistryBuilder at startup and are
// read-only afterwards. Lookup is a linear scan in registration order and the
// first structural match wins.

import type { ASTNode, FunctionNode } from "../ast/ast";
import { astEq, walkAst } from "../ast/ast";
import { parseTemplate } from "../reader/parse";
import { RegistrationError, type MatchError } from "../errors";
import { matchAst } from "../match/matchAst";
import type { VariablePayload } from "../match/payload";
import type { Drawable } from "../figures/drawable";

/** Rewrites a matched pure call into its replacement node. */
export type PureBehavior = (args: VariablePayload[]) => ASTNode;

/** Produces the drawable object for a matched drawing call. */
export type DrawingBehavior = (args: VariablePayload[]) => Drawable;

export type PatternKind = "pure" | "drawing";

export interface Pattern<B> {
  readonly source: string;
  readonly name: string;
  readonly template: FunctionNode;
  /** Number of wildcards in the template. */
  readonly arity: number;
  readonly behavior: B;
}

export type PatternLookup<B> =
  | { readonly tag: "Match"; readonly pattern: Pattern<B>; readonly captures: VariablePayload[] }
  | { readonly tag: "NoMatch" }
  | { readonly tag: "Error"; readonly error: MatchError };

export interface PatternInfo {
  kind: PatternKind;
  name: string;
  template: string;
  arity: number;
}

export class PatternTable<B> {
  private readonly patterns: readonly Pattern<B>[];
  private readonly names: ReadonlySet<string>;

  constructor(readonly kind: PatternKind, patterns: readonly Pattern<B>[]) {
    this.patterns = Object.freeze([...patterns]);
    this.names = new Set(patterns.map(p => p.name));
  }

  get size(): number {
    return this.patterns.length;
  }

  /** True when at least one template has this function name. */
  isRegistered(name: string): boolean {
    return this.names.has(name);
  }

  lookup(node: FunctionNode): PatternLookup<B> {
    for (const pattern of this.patterns) {
      const r = matchAst(node, pattern.template);
      if (r.tag === "Error") return r;
      if (r.tag === "Match") return { tag: "Match", pattern, captures: r.captures };
    }
    return { tag: "NoMatch" };
  }

  describe(): PatternInfo[] {
    return this.patterns.map(p => ({ kind: this.kind, name: p.name, template: p.source, arity: p.arity }));
  }
}

export interface PatternRegistries {
  readonly pure: PatternTable<PureBehavior>;
  readonly drawing: PatternTable<DrawingBehavior>;
}

export class PatternRegistryBuilder {
  private readonly pureList: Pattern<PureBehavior>[] = [];
  private readonly drawingList: Pattern<DrawingBehavior>[] = [];
  private built = false;

  /** Register a rewrite rule, e.g. `add({}, {})`. Throws on a malformed template. */
  pure(source: string, behavior: PureBehavior): this {
    this.pureList.push(this.compile("pure", source, behavior));
    return this;
  }

  /** Register a drawing command, e.g. `point({}, {})`. Throws on a malformed template. */
  drawing(source: string, behavior: DrawingBehavior): this {
    this.drawingList.push(this.compile("drawing", source, behavior));
    return this;
  }

  build(): PatternRegistries {
    this.built = true;
    return Object.freeze({
      pure: new PatternTable("pure", this.pureList),
      drawing: new PatternTable("drawing", this.drawingList),
    });
  }

  private compile<B>(kind: PatternKind, source: string, behavior: B): Pattern<B> {
    if (this.built) {
      throw new RegistrationError(`Cannot register ${kind} pattern after build: ${source}`);
    }

    const r = parseTemplate(source);
    if (!r.ok) {
      throw new RegistrationError(
        `Failed to compile ${kind} pattern "${source}": ${r.error.kind} at char ${r.error.position}`
      );
    }
    const template = r.value;
    if (template.tag !== "Function") {
      throw new RegistrationError(`${kind} pattern "${source}" is not a function call`);
    }

    const own = kind === "pure" ? this.pureList : this.drawingList;
    if (own.some(p => p.source === source || astEq(p.template, template))) {
      throw new RegistrationError(`${kind} pattern "${source}" is already registered`);
    }

    // A name may be overloaded within one table but never shared across tables.
    const other = kind === "pure" ? this.drawingList : this.pureList;
    if (other.some(p => p.name === template.name)) {
      const otherKind = kind === "pure" ? "drawing" : "pure";
      throw new RegistrationError(
        `Function name "${template.name}" is already registered as a ${otherKind} pattern`
      );
    }

    let arity = 0;
    walkAst(template, n => {
      if (n.tag === "Variable") arity++;
    });

    return { source, name: template.name, template, arity, behavior };
  }
}
