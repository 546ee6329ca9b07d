// src/core/ast/ast.ts
// Command syntax tree: constructors, structural equality, printer

export type VariableKind = "number" | "tuple";

export type NumberNode = { readonly tag: "Number"; readonly value: number };
export type IdentifierNode = { readonly tag: "Identifier"; readonly name: string };
export type ExpressionNode = { readonly tag: "Expression"; readonly items: readonly ASTNode[] };
export type FunctionNode = { readonly tag: "Function"; readonly name: string; readonly args: readonly ASTNode[] };
export type VariableNode = { readonly tag: "Variable"; readonly kind: VariableKind };

export type ASTNode =
  | NumberNode
  | IdentifierNode
  | ExpressionNode
  | FunctionNode
  | VariableNode;

/** A parsed command or template. Built once, never mutated. */
export type AST = { readonly root: ASTNode };

export function num(value: number): NumberNode { return { tag: "Number", value }; }
export function ident(name: string): IdentifierNode { return { tag: "Identifier", name }; }
export function expr(items: readonly ASTNode[]): ExpressionNode { return { tag: "Expression", items }; }
export function fn(name: string, args: readonly ASTNode[]): FunctionNode { return { tag: "Function", name, args }; }
export function variable(kind: VariableKind = "number"): VariableNode { return { tag: "Variable", kind }; }

export function isFunction(n: ASTNode): n is FunctionNode { return n.tag === "Function"; }

export function astEq(a: ASTNode, b: ASTNode): boolean {
  switch (a.tag) {
    case "Number": return b.tag === "Number" && a.value === b.value;
    case "Identifier": return b.tag === "Identifier" && a.name === b.name;
    case "Variable": return b.tag === "Variable" && a.kind === b.kind;
    case "Expression": return b.tag === "Expression" && listEq(a.items, b.items);
    case "Function": return b.tag === "Function" && a.name === b.name && listEq(a.args, b.args);
  }
}

function listEq(xs: readonly ASTNode[], ys: readonly ASTNode[]): boolean {
  if (xs.length !== ys.length) return false;
  for (let i = 0; i < xs.length; i++) if (!astEq(xs[i], ys[i])) return false;
  return true;
}

/**
 * Canonical text form. Function arguments are printed one group per argument,
 * so `F(f)(x)` and `point(3, 5)` both come back in the shape they were typed.
 */
export function astToString(n: ASTNode): string {
  switch (n.tag) {
    case "Number": return String(n.value);
    case "Identifier": return n.name;
    case "Variable": return n.kind === "tuple" ? "{..}" : "{}";
    case "Expression": return n.items.map(nestedToString).join(", ");
    case "Function": return n.name + n.args.map(a => `(${astToString(a)})`).join("");
  }
}

function nestedToString(n: ASTNode): string {
  return n.tag === "Expression" ? `(${astToString(n)})` : astToString(n);
}

/** Pre-order walk; stops descending when `visit` returns false. */
export function walkAst(n: ASTNode, visit: (node: ASTNode) => boolean | void): void {
  if (visit(n) === false) return;
  if (n.tag === "Expression") for (const item of n.items) walkAst(item, visit);
  else if (n.tag === "Function") for (const arg of n.args) walkAst(arg, visit);
}
