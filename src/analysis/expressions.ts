/**
 * Expression Evaluation
 *
 * Evaluates an expression to the type of its value, applying its effects on
 * bindings to the current scope. Sub-expressions that may not run (the right
 * side of `&&`, the branches of `?:`) run inside indeterminate frames.
 */

import * as t from '@babel/types';
import type { Ty, PropertyKeyType, PropertyTy } from '../types/index.js';
import { Types } from '../utils/type-factory.js';
import {
  isStringLike,
  isNumberLike,
  isBigIntLike,
  isPossiblyUndefined,
  removeNullable,
  removeUndefined,
} from '../utils/type-utils.js';
import type { Analyzer } from './analyzer.js';
import {
  resolveTypeAnnotation,
  resolveFunctionType,
  propertyName,
  parseBigInt,
} from './annotations.js';

export function execExpression(node: t.Expression, analyzer: Analyzer): Ty {
  switch (node.type) {
    case 'StringLiteral':
      return Types.stringLiteral(node.value);
    case 'NumericLiteral':
      return Types.numberLiteral(node.value);
    case 'BigIntLiteral':
      return Types.bigintLiteral(parseBigInt(node.value));
    case 'BooleanLiteral':
      return Types.booleanLiteral(node.value);
    case 'NullLiteral':
      return Types.null;
    case 'RegExpLiteral':
      return Types.object;
    case 'TemplateLiteral':
      return execTemplateLiteral(node, analyzer);

    case 'Identifier':
      return execIdentifier(node, analyzer);

    case 'AssignmentExpression':
      return execAssignment(node, analyzer);

    case 'BinaryExpression': {
      const left = t.isPrivateName(node.left) ? Types.string : execExpression(node.left, analyzer);
      const right = execExpression(node.right, analyzer);
      return binaryType(node.operator, left, right, analyzer);
    }

    case 'LogicalExpression': {
      const left = execExpression(node.left, analyzer);
      const right = analyzer.inScope('indeterminate', () => execExpression(node.right, analyzer));
      return analyzer.intoUnion([left, right]);
    }

    case 'ConditionalExpression': {
      execExpression(node.test, analyzer);
      const consequent = analyzer.inScope('indeterminate', () => execExpression(node.consequent, analyzer));
      const alternate = analyzer.inScope('indeterminate', () => execExpression(node.alternate, analyzer));
      return analyzer.intoUnion([consequent, alternate]);
    }

    case 'UnaryExpression':
      return execUnary(node, analyzer);

    case 'UpdateExpression':
      return execUpdate(node, analyzer);

    case 'MemberExpression':
    case 'OptionalMemberExpression':
      return execMember(node, analyzer);

    case 'ObjectExpression':
      return execObject(node, analyzer);

    case 'ArrayExpression':
      for (const element of node.elements) {
        if (t.isSpreadElement(element)) {
          execExpression(element.argument, analyzer);
        } else if (element) {
          execExpression(element, analyzer);
        }
      }
      return Types.object;

    case 'ArrowFunctionExpression':
    case 'FunctionExpression':
      return resolveFunctionType(node, analyzer);

    case 'CallExpression':
    case 'OptionalCallExpression':
    case 'NewExpression':
      return execCall(node, analyzer);

    case 'SequenceExpression': {
      let last: Ty = Types.undefined;
      for (const expression of node.expressions) {
        last = execExpression(expression, analyzer);
      }
      return last;
    }

    case 'ParenthesizedExpression':
      return execExpression(node.expression, analyzer);

    case 'TSAsExpression':
    case 'TSTypeAssertion':
      execExpression(node.expression, analyzer);
      return resolveTypeAnnotation(node.typeAnnotation, analyzer);

    case 'TSSatisfiesExpression':
      return execExpression(node.expression, analyzer);

    case 'TSNonNullExpression':
      return removeNullable(execExpression(node.expression, analyzer), analyzer);

    case 'AwaitExpression':
      execExpression(node.argument, analyzer);
      return Types.unknown;

    default:
      analyzer.logger.debug('unsupported expression', { type: node.type });
      return Types.unknown;
  }
}

function execTemplateLiteral(node: t.TemplateLiteral, analyzer: Analyzer): Ty {
  const [quasi] = node.quasis;
  if (node.expressions.length === 0 && quasi) {
    return Types.stringLiteral(quasi.value.cooked ?? quasi.value.raw);
  }
  for (const expression of node.expressions) {
    if (t.isExpression(expression)) execExpression(expression, analyzer);
  }
  return Types.string;
}

function execIdentifier(node: t.Identifier, analyzer: Analyzer): Ty {
  const ty = analyzer.lookup(node.name);
  if (ty) return ty;

  switch (node.name) {
    case 'undefined':
      return Types.undefined;
    case 'NaN':
    case 'Infinity':
      return Types.number;
    default:
      analyzer.logger.debug('unbound identifier', { name: node.name });
      return Types.unknown;
  }
}

// ============================================================================
// Operators
// ============================================================================

export function binaryType(operator: string, left: Ty, right: Ty, analyzer: Analyzer): Ty {
  switch (operator) {
    case '+':
      return plusType(left, right, analyzer);
    case '-':
    case '*':
    case '/':
    case '%':
    case '**':
    case '|':
    case '&':
    case '^':
    case '<<':
    case '>>':
    case '>>>':
      return arithmeticType(operator, left, right);
    case '==':
    case '!=':
    case '===':
    case '!==':
    case '<':
    case '<=':
    case '>':
    case '>=':
    case 'in':
    case 'instanceof':
      return Types.boolean;
    default:
      return Types.unknown;
  }
}

function plusType(left: Ty, right: Ty, analyzer: Analyzer): Ty {
  if (left.kind === 'any' || right.kind === 'any') return Types.any;

  if (left.kind === 'numeric-literal' && right.kind === 'numeric-literal') {
    return Types.numberLiteral(left.value + right.value);
  }
  const leftText = literalText(left);
  const rightText = literalText(right);
  if (
    leftText !== null &&
    rightText !== null &&
    (left.kind === 'string-literal' || right.kind === 'string-literal')
  ) {
    return Types.stringLiteral(leftText + rightText);
  }

  if (isStringLike(left) || isStringLike(right)) return Types.string;
  if (isBigIntLike(left) && isBigIntLike(right)) return Types.bigint;
  if (isNumberLike(left) && isNumberLike(right)) return Types.number;
  return analyzer.intoUnion([Types.string, Types.number]);
}

function literalText(ty: Ty): string | null {
  switch (ty.kind) {
    case 'string-literal':
      return ty.value;
    case 'numeric-literal':
    case 'boolean-literal':
      return String(ty.value);
    default:
      return null;
  }
}

function arithmeticType(operator: string, left: Ty, right: Ty): Ty {
  if (left.kind === 'numeric-literal' && right.kind === 'numeric-literal') {
    const folded = foldNumeric(operator, left.value, right.value);
    if (folded !== null) return Types.numberLiteral(folded);
  }
  if (isBigIntLike(left) && isBigIntLike(right)) return Types.bigint;
  return Types.number;
}

function foldNumeric(operator: string, a: number, b: number): number | null {
  switch (operator) {
    case '-':
      return a - b;
    case '*':
      return a * b;
    case '/':
      return a / b;
    case '%':
      return a % b;
    case '**':
      return a ** b;
    case '|':
      return a | b;
    case '&':
      return a & b;
    case '^':
      return a ^ b;
    case '<<':
      return a << b;
    case '>>':
      return a >> b;
    case '>>>':
      return a >>> b;
    default:
      return null;
  }
}

function execUnary(node: t.UnaryExpression, analyzer: Analyzer): Ty {
  const argument = execExpression(node.argument, analyzer);

  switch (node.operator) {
    case 'typeof':
      return Types.string;
    case '!':
    case 'delete':
      return Types.boolean;
    case 'void':
      return Types.undefined;
    case 'throw':
      return Types.never;
    case '-':
      if (argument.kind === 'numeric-literal') return Types.numberLiteral(-argument.value);
      if (argument.kind === 'bigint-literal') return Types.bigintLiteral(-argument.value);
      return isBigIntLike(argument) ? Types.bigint : Types.number;
    case '~':
      return isBigIntLike(argument) ? Types.bigint : Types.number;
    case '+':
      return Types.number;
    default:
      return Types.unknown;
  }
}

function execUpdate(node: t.UpdateExpression, analyzer: Analyzer): Ty {
  if (!t.isIdentifier(node.argument)) {
    execExpression(node.argument, analyzer);
    return Types.number;
  }
  const current = analyzer.lookup(node.argument.name) ?? Types.undefined;
  const next = isBigIntLike(current) ? Types.bigint : Types.number;
  analyzer.assign(node.argument.name, next);
  return next;
}

// ============================================================================
// Assignment
// ============================================================================

function execAssignment(node: t.AssignmentExpression, analyzer: Analyzer): Ty {
  const { operator, left } = node;

  if (operator === '=') {
    const value = execExpression(node.right, analyzer);
    assignPattern(left, value, analyzer);
    return value;
  }

  const target = resolveTarget(left, analyzer);

  if (operator === '&&=' || operator === '||=' || operator === '??=') {
    const value = analyzer.inScope('indeterminate', () => {
      const assigned = execExpression(node.right, analyzer);
      target.write(assigned);
      return assigned;
    });
    return analyzer.intoUnion([target.current, value]);
  }

  const right = execExpression(node.right, analyzer);
  const value = binaryType(operator.slice(0, -1), target.current, right, analyzer);
  target.write(value);
  return value;
}

interface AssignmentTarget {
  readonly current: Ty;
  write(value: Ty): void;
}

/**
 * Read the target of an update-in-place assignment, evaluating its object
 * and key once
 */
function resolveTarget(target: t.Node, analyzer: Analyzer): AssignmentTarget {
  if (t.isIdentifier(target)) {
    const { name } = target;
    return {
      current: analyzer.lookup(name) ?? Types.undefined,
      write: (value) => analyzer.assign(name, value),
    };
  }
  if (t.isMemberExpression(target)) {
    // Property writes are not tracked
    return { current: execMember(target, analyzer), write: () => {} };
  }
  return { current: Types.unknown, write: (value) => assignPattern(target, value, analyzer) };
}

/**
 * Write `value` through an assignment target or binding pattern
 */
export function assignPattern(
  target: t.Node,
  value: Ty,
  analyzer: Analyzer,
  bind: (name: string, ty: Ty, node: t.Identifier) => void = (name, ty) => analyzer.assign(name, ty)
): void {
  if (t.isIdentifier(target)) {
    bind(target.name, value, target);
    return;
  }

  if (t.isMemberExpression(target)) {
    execExpression(target.object, analyzer);
    if (target.computed && t.isExpression(target.property)) {
      execExpression(target.property, analyzer);
    }
    return;
  }

  if (t.isAssignmentPattern(target)) {
    const fallback = analyzer.inScope('indeterminate', () => execExpression(target.right, analyzer));
    // Only undefined triggers the default; null passes through
    let withDefault: Ty;
    if (value.kind === 'undefined' || value.kind === 'void') {
      withDefault = fallback;
    } else if (isPossiblyUndefined(value)) {
      withDefault = analyzer.intoUnion([removeUndefined(value, analyzer), fallback]);
    } else {
      withDefault = value;
    }
    assignPattern(target.left, withDefault, analyzer, bind);
    return;
  }

  if (t.isObjectPattern(target)) {
    for (const prop of target.properties) {
      if (t.isRestElement(prop)) {
        assignPattern(prop.argument, Types.object, analyzer, bind);
        continue;
      }
      const name = propertyName(prop.key, prop.computed);
      const key: PropertyKeyType = name === null ? { kind: 'any' } : { kind: 'string', value: name };
      assignPattern(prop.value, analyzer.getProperty(value, key), analyzer, bind);
    }
    return;
  }

  if (t.isArrayPattern(target)) {
    target.elements.forEach((element, index) => {
      if (!element) return;
      if (t.isRestElement(element)) {
        assignPattern(element.argument, Types.object, analyzer, bind);
        return;
      }
      assignPattern(element, analyzer.getProperty(value, { kind: 'string', value: String(index) }), analyzer, bind);
    });
  }
}

// ============================================================================
// Members, objects and calls
// ============================================================================

function execMember(node: t.MemberExpression | t.OptionalMemberExpression, analyzer: Analyzer): Ty {
  const object = t.isSuper(node.object) ? Types.unknown : execExpression(node.object, analyzer);
  const key = memberKey(node, analyzer);
  const prop = analyzer.getProperty(object, key);
  return analyzer.getOptionalType(shortCircuits(node), prop);
}

/**
 * Whether this link of an optional chain may evaluate to `undefined`:
 * it, or a link nearer the chain's root, is `?.`
 */
function shortCircuits(node: t.Expression): boolean {
  let link: t.Node = node;
  for (;;) {
    if (t.isOptionalMemberExpression(link)) {
      if (link.optional) return true;
      link = link.object;
    } else if (t.isOptionalCallExpression(link)) {
      if (link.optional) return true;
      link = link.callee;
    } else {
      return false;
    }
  }
}

function memberKey(node: t.MemberExpression | t.OptionalMemberExpression, analyzer: Analyzer): PropertyKeyType {
  const { property } = node;
  if (t.isPrivateName(property)) {
    return { kind: 'string', value: `#${property.id.name}` };
  }
  if (!node.computed && t.isIdentifier(property)) {
    return { kind: 'string', value: property.name };
  }

  const keyType = execExpression(property, analyzer);
  switch (keyType.kind) {
    case 'string-literal':
      return { kind: 'string', value: keyType.value };
    case 'numeric-literal':
      return { kind: 'string', value: String(keyType.value) };
    case 'unique-symbol':
      return { kind: 'symbol', symbol: keyType.symbol };
    default:
      return { kind: 'any' };
  }
}

function execObject(node: t.ObjectExpression, analyzer: Analyzer): Ty {
  const properties = new Map<string, PropertyTy>();

  for (const prop of node.properties) {
    if (t.isSpreadElement(prop)) {
      const spread = execExpression(prop.argument, analyzer);
      if (spread.kind === 'record') {
        for (const [name, member] of spread.properties) properties.set(name, member);
      }
      continue;
    }

    if (prop.computed && t.isExpression(prop.key)) {
      execExpression(prop.key, analyzer);
    }
    const name = propertyName(prop.key, prop.computed);

    if (t.isObjectMethod(prop)) {
      if (name !== null && prop.kind === 'method') {
        properties.set(name, Types.property(resolveFunctionType(prop, analyzer)));
      }
      continue;
    }

    const value = t.isExpression(prop.value) ? execExpression(prop.value, analyzer) : Types.unknown;
    if (name !== null) {
      properties.set(name, Types.property(value));
    }
  }

  return Types.recordOf(properties);
}

function execCall(
  node: t.CallExpression | t.OptionalCallExpression | t.NewExpression,
  analyzer: Analyzer
): Ty {
  const callee = t.isExpression(node.callee) ? execExpression(node.callee, analyzer) : Types.unknown;
  for (const arg of node.arguments) {
    if (t.isSpreadElement(arg)) {
      execExpression(arg.argument, analyzer);
    } else if (t.isExpression(arg)) {
      execExpression(arg, analyzer);
    }
  }

  const result = callResult(callee, t.isNewExpression(node), analyzer);
  return analyzer.getOptionalType(shortCircuits(node), result);
}

/**
 * Result of calling (or constructing) a value of type `callee`
 */
function callResult(callee: Ty, construct: boolean, analyzer: Analyzer): Ty {
  switch (callee.kind) {
    case 'function':
      return construct ? Types.object : callee.returnType;
    case 'constructor':
      return construct ? callee.instanceType : Types.never;
    case 'union':
      return analyzer.intoUnion([...callee.union.members()].map((member) => callResult(member, construct, analyzer)));
    case 'instance':
      return callResult(analyzer.unwrapGenericInstance(callee), construct, analyzer);
    case 'never':
    case 'error':
    case 'any':
    case 'unknown':
      return callee;
    case 'generic':
    case 'intrinsic':
      return Types.error;
    case 'record':
    case 'interface':
    case 'intersection':
    case 'object':
    case 'unresolved':
      return Types.unknown;
    default:
      // Primitives and namespaces are not callable; the call throws
      return Types.never;
  }
}
