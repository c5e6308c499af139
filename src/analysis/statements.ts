/**
 * Statement Execution
 *
 * Walks statements in order, threading binding state through the scope
 * stack. Control flow that may skip or repeat code runs in indeterminate or
 * loop frames, whose writes are joined with the state before them on pop.
 */

import * as t from '@babel/types';
import type { Ty } from '../types/index.js';
import { Types } from '../utils/type-factory.js';
import type { Analyzer } from './analyzer.js';
import { execExpression, assignPattern } from './expressions.js';
import {
  resolveAnnotation,
  resolveFunctionType,
  declareInterface,
  declareTypeAlias,
} from './annotations.js';

export function execProgram(program: t.Program, analyzer: Analyzer): void {
  execStatements(program.body, analyzer);
}

/**
 * Execute a statement list; function declarations are hoisted to its start
 */
export function execStatements(statements: readonly t.Statement[], analyzer: Analyzer): void {
  for (const statement of statements) {
    const declaration = unwrapExport(statement);
    if (t.isFunctionDeclaration(declaration) || t.isTSDeclareFunction(declaration)) {
      declareFunction(declaration, analyzer);
    }
  }
  for (const statement of statements) {
    execStatement(statement, analyzer);
  }
}

function unwrapExport(statement: t.Statement): t.Node {
  if (t.isExportNamedDeclaration(statement) && statement.declaration) {
    return statement.declaration;
  }
  return statement;
}

export function execStatement(node: t.Statement, analyzer: Analyzer): void {
  switch (node.type) {
    case 'ExpressionStatement':
      execExpression(node.expression, analyzer);
      return;

    case 'VariableDeclaration':
      execVariableDeclaration(node, analyzer);
      return;

    case 'BlockStatement':
      analyzer.inScope('normal', () => execStatements(node.body, analyzer));
      return;

    case 'EmptyStatement':
      return;

    case 'WhileStatement':
      execWhileStatement(node, analyzer);
      return;

    case 'DoWhileStatement':
      execDoWhileStatement(node, analyzer);
      return;

    case 'ForStatement':
      execForStatement(node, analyzer);
      return;

    case 'IfStatement':
      execIfStatement(node, analyzer);
      return;

    case 'ReturnStatement':
      if (node.argument) execExpression(node.argument, analyzer);
      return;

    case 'ThrowStatement':
      execExpression(node.argument, analyzer);
      return;

    // Hoisted by execStatements
    case 'FunctionDeclaration':
    case 'TSDeclareFunction':
      return;

    case 'TSInterfaceDeclaration':
      declareInterface(node, analyzer);
      return;

    case 'TSTypeAliasDeclaration':
      declareTypeAlias(node, analyzer);
      return;

    case 'TSModuleDeclaration':
      execNamespace(node, analyzer);
      return;

    case 'ExportNamedDeclaration':
      if (node.declaration) execStatement(node.declaration, analyzer);
      return;

    default:
      analyzer.logger.debug('skipped statement', { type: node.type, line: node.loc?.start.line });
  }
}

// ============================================================================
// Declarations
// ============================================================================

function execVariableDeclaration(node: t.VariableDeclaration, analyzer: Analyzer): void {
  const kind = node.kind === 'var' ? 'var' : node.kind === 'const' ? 'const' : 'let';

  for (const declarator of node.declarations) {
    const { id, init } = declarator;
    let value: Ty;
    if (init) {
      value = execExpression(init, analyzer);
    } else if (t.isIdentifier(id)) {
      value = resolveAnnotation(id, analyzer, undefined, id.name) ?? Types.undefined;
    } else if (t.isObjectPattern(id) || t.isArrayPattern(id)) {
      value = resolveAnnotation(id, analyzer) ?? Types.undefined;
    } else {
      value = Types.undefined;
    }

    assignPattern(id, value, analyzer, (name, ty, target) => {
      if (kind === 'var') {
        analyzer.declareVar(name);
        analyzer.assign(name, ty);
      } else {
        analyzer.declare(name, ty);
      }
      analyzer.annotate(target, name, kind, ty);
    });
  }
}

function declareFunction(node: t.FunctionDeclaration | t.TSDeclareFunction, analyzer: Analyzer): void {
  if (!node.id) return;
  const ty = resolveFunctionType(node, analyzer);
  analyzer.declare(node.id.name, ty);
  analyzer.annotate(node.id, node.id.name, 'function', ty);
}

/**
 * `namespace N { export const x = ... }` binds `N` to its exports
 */
function execNamespace(node: t.TSModuleDeclaration, analyzer: Analyzer): void {
  if (!t.isIdentifier(node.id) || !t.isTSModuleBlock(node.body)) {
    analyzer.logger.debug('skipped module declaration', { line: node.loc?.start.line });
    return;
  }
  const { body } = node;

  const exports = analyzer.inScope('normal', () => {
    execStatements(body.body, analyzer);
    const exported = new Map<string, Ty>();
    for (const statement of body.body) {
      for (const name of exportedNames(statement)) {
        exported.set(name, analyzer.lookup(name) ?? Types.undefined);
      }
    }
    return exported;
  });

  const ty = Types.namespace(node.id.name, exports);
  analyzer.declare(node.id.name, ty);
}

function exportedNames(statement: t.Statement): string[] {
  if (!t.isExportNamedDeclaration(statement) || !statement.declaration) return [];
  const { declaration } = statement;
  if (t.isVariableDeclaration(declaration)) {
    return declaration.declarations.flatMap((d) => Object.keys(t.getBindingIdentifiers(d.id)));
  }
  if (t.isFunctionDeclaration(declaration) && declaration.id) {
    return [declaration.id.name];
  }
  return [];
}

// ============================================================================
// Control flow
// ============================================================================

/**
 * The test may or may not run to completion; the body runs any number of
 * times.
 */
export function execWhileStatement(node: t.WhileStatement, analyzer: Analyzer): void {
  analyzer.pushIndeterminateScope();
  try {
    execExpression(node.test, analyzer);
  } finally {
    analyzer.popScope();
  }

  // TODO: enter the body with the test's truthy narrowing applied
  analyzer.pushLoopScope();
  try {
    execStatement(node.body, analyzer);
  } finally {
    analyzer.popScope();
  }
}

function execDoWhileStatement(node: t.DoWhileStatement, analyzer: Analyzer): void {
  analyzer.inScope('normal', () => execStatement(node.body, analyzer));
  analyzer.inScope('indeterminate', () => execExpression(node.test, analyzer));
  analyzer.inScope('loop', () => {
    execStatement(node.body, analyzer);
    execExpression(node.test, analyzer);
  });
}

function execForStatement(node: t.ForStatement, analyzer: Analyzer): void {
  const { init, test, update, body } = node;

  analyzer.inScope('normal', () => {
    if (t.isVariableDeclaration(init)) {
      execVariableDeclaration(init, analyzer);
    } else if (init) {
      execExpression(init, analyzer);
    }

    if (test) {
      analyzer.inScope('indeterminate', () => execExpression(test, analyzer));
    }

    analyzer.inScope('loop', () => {
      execStatement(body, analyzer);
      if (update) execExpression(update, analyzer);
    });
  });
}

function execIfStatement(node: t.IfStatement, analyzer: Analyzer): void {
  execExpression(node.test, analyzer);
  analyzer.inScope('indeterminate', () => execStatement(node.consequent, analyzer));

  const { alternate } = node;
  if (alternate) {
    analyzer.inScope('indeterminate', () => execStatement(alternate, analyzer));
  }
}
