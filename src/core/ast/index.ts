// src/core/ast/index.ts
// Command syntax tree

export {
  type AST,
  type ASTNode,
  type NumberNode,
  type IdentifierNode,
  type ExpressionNode,
  type FunctionNode,
  type VariableNode,
  type VariableKind,
  num,
  ident,
  expr,
  fn,
  variable,
  isFunction,
  astEq,
  astToString,
  walkAst,
} from "./ast";
