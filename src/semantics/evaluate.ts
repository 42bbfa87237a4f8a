import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { diagAt } from '../diagnostics/report.js';
import type { ExprNode, SourceSpan } from '../frontend/ast.js';
import type { StructTable } from './types.js';
import { coerceValue, typeOfValue, typesEqual } from './types.js';
import type { Value, ValueType } from './values.js';
import {
  arrayValue,
  boolValue,
  builtinEnumMembers,
  enumValue,
  formatType,
  intValue,
  isBuiltinEnumType,
  refValue,
  stringValue,
  structValue,
  valueKey,
} from './values.js';

/**
 * Flat, self-contained mapping from parameter name to resolved value.
 */
export type ParameterEnvironment = ReadonlyMap<string, Value>;

/**
 * Everything an expression may observe.
 */
export interface EvalScope {
  structs: StructTable;
  params: ParameterEnvironment;
  /**
   * Reports whether `path` names an instance declared so far in the body being specialized.
   * Absent outside component bodies.
   */
  hasInstance?: (path: readonly string[]) => boolean;
}

const MAX_WIDTH = 64;

type BinaryExprNode = Extract<ExprNode, { kind: 'Binary' }>;

function trunc(value: bigint, width: number): bigint {
  return BigInt.asUintN(width, value);
}

function describe(value: Value): string {
  return formatType(typeOfValue(value));
}

/**
 * Evaluate an expression to a concrete value.
 *
 * Integral arithmetic is unsigned. Operands are evaluated at the width of their expression
 * context, which is the widest operand taking part in it (64 bits for unsized literals and
 * parameters). `expected` is a typing hint only: it lets array literals (including the empty
 * literal) take the element type of the slot they are evaluated for. Callers still check the
 * result against the slot type.
 *
 * @returns `undefined` after pushing exactly one diagnostic.
 */
export function evaluate(
  expr: ExprNode,
  scope: EvalScope,
  diagnostics?: Diagnostic[],
  expected?: ValueType,
): Value | undefined {
  return evalAt(expr, scope, diagnostics, selfWidth(expr, scope), expected);
}

/**
 * Minimum width an expression contributes to its enclosing context.
 *
 * Relational, logical and reduction operators and casts start a context of their own, so they
 * contribute their result width only. Shifts and `**` are sized by the left operand.
 */
export function selfWidth(expr: ExprNode, scope: EvalScope): number {
  switch (expr.kind) {
    case 'IntLiteral': {
      const width = expr.width ?? MAX_WIDTH;
      return Number.isInteger(width) && width >= 1 && width <= MAX_WIDTH ? width : MAX_WIDTH;
    }
    case 'BoolLiteral':
    case 'BoolCast':
      return 1;
    case 'Name':
      return scope.params.get(expr.name)?.kind === 'Bool' ? 1 : MAX_WIDTH;
    case 'Unary':
      return expr.op === '+' || expr.op === '-' || expr.op === '~' ? selfWidth(expr.expr, scope) : 1;
    case 'Binary':
      switch (expr.op) {
        case '**':
        case '<<':
        case '>>':
          return selfWidth(expr.left, scope);
        case '==':
        case '!=':
        case '<':
        case '>':
        case '<=':
        case '>=':
        case '&&':
        case '||':
          return 1;
        default:
          return Math.max(selfWidth(expr.left, scope), selfWidth(expr.right, scope));
      }
    case 'Ternary':
      return Math.max(selfWidth(expr.whenTrue, scope), selfWidth(expr.whenFalse, scope));
    case 'WidthCast': {
      const w = evaluate(expr.width, scope);
      return w?.kind === 'Int' && w.value >= 1n && w.value <= BigInt(MAX_WIDTH)
        ? Number(w.value)
        : MAX_WIDTH;
    }
    default:
      return MAX_WIDTH;
  }
}

/**
 * Evaluate `expr` inside an expression context of `width` bits.
 */
function evalAt(
  expr: ExprNode,
  scope: EvalScope,
  diagnostics: Diagnostic[] | undefined,
  width: number,
  expected?: ValueType,
): Value | undefined {
  const fail = (id: DiagnosticId, message: string) => {
    diagAt(diagnostics, id, expr.span, message);
    return undefined;
  };
  const sub = (e: ExprNode, w: number, hint?: ValueType) =>
    evalAt(e, scope, diagnostics, w, hint);
  // A new context sized by the subexpression alone.
  const own = (e: ExprNode, hint?: ValueType) => sub(e, selfWidth(e, scope), hint);

  switch (expr.kind) {
    case 'IntLiteral': {
      const w = expr.width ?? MAX_WIDTH;
      if (!Number.isInteger(w) || w < 1 || w > MAX_WIDTH) {
        return fail(DiagnosticIds.TypeMismatch, `Literal width ${w} is outside 1..${MAX_WIDTH}.`);
      }
      return intValue(trunc(expr.value, w));
    }
    case 'BoolLiteral':
      return boolValue(expr.value);
    case 'StringLiteral':
      return stringValue(expr.value);
    case 'EnumLiteral': {
      if (!isBuiltinEnumType(expr.enumType)) {
        return fail(DiagnosticIds.UndefinedReference, `Unknown enumeration "${expr.enumType}".`);
      }
      const members: readonly string[] = builtinEnumMembers[expr.enumType];
      if (!members.includes(expr.member)) {
        return fail(
          DiagnosticIds.UndefinedReference,
          `"${expr.member}" is not a member of ${expr.enumType}.`,
        );
      }
      return enumValue(expr.enumType, expr.member);
    }
    case 'Name': {
      const param = scope.params.get(expr.name);
      if (param) return param;
      if (scope.hasInstance?.([expr.name])) return refValue([expr.name]);
      return fail(DiagnosticIds.UndefinedReference, `Undefined reference "${expr.name}".`);
    }
    case 'Member': {
      const v = own(expr.base);
      if (!v) return undefined;
      if (v.kind === 'Struct') {
        const field = v.fields.get(expr.field);
        if (!field) {
          return fail(
            DiagnosticIds.UndefinedReference,
            `Struct "${v.typeName}" has no field "${expr.field}".`,
          );
        }
        return field;
      }
      if (v.kind === 'ComponentRef') {
        const path = [...v.path, expr.field];
        // Instances above the current body are only known once the tree is placed.
        if (v.up === 0 && !scope.hasInstance?.(path)) {
          return fail(
            DiagnosticIds.UndefinedReference,
            `Instance "${v.path.join('.')}" has no child "${expr.field}".`,
          );
        }
        return refValue(path, v.up);
      }
      return fail(
        DiagnosticIds.TypeMismatch,
        `Cannot select field "${expr.field}" from a value of type ${describe(v)}.`,
      );
    }
    case 'Index': {
      const base = own(expr.base);
      if (!base) return undefined;
      if (base.kind !== 'Array') {
        return fail(DiagnosticIds.TypeMismatch, `Cannot index into a value of type ${describe(base)}.`);
      }
      const index = own(expr.index);
      if (!index) return undefined;
      if (index.kind !== 'Int') {
        return fail(
          DiagnosticIds.TypeMismatch,
          `Array index must be an integer, got ${describe(index)}.`,
        );
      }
      const elements = base.elements;
      const i = index.value;
      const element = i < BigInt(elements.length) ? elements[Number(i)] : undefined;
      if (!element) {
        return fail(
          DiagnosticIds.IndexOutOfBounds,
          `Index ${i} out of bounds for array of length ${elements.length}.`,
        );
      }
      return element;
    }
    case 'StructLiteral': {
      const struct = scope.structs.get(expr.typeName);
      if (!struct) {
        return fail(DiagnosticIds.UndefinedReference, `Unknown struct type "${expr.typeName}".`);
      }
      const given = new Map<string, ExprNode>();
      for (const f of expr.fields) {
        if (!struct.fields.some((decl) => decl.name === f.name)) {
          diagAt(
            diagnostics,
            DiagnosticIds.StructLiteralError,
            f.span,
            `Struct "${struct.name}" has no field "${f.name}".`,
          );
          return undefined;
        }
        if (given.has(f.name)) {
          diagAt(
            diagnostics,
            DiagnosticIds.StructLiteralError,
            f.span,
            `Field "${f.name}" is given more than once.`,
          );
          return undefined;
        }
        given.set(f.name, f.value);
      }
      const missing = struct.fields.filter((decl) => !given.has(decl.name)).map((d) => d.name);
      if (missing.length > 0) {
        return fail(
          DiagnosticIds.StructLiteralError,
          `Struct literal of "${struct.name}" is missing field${missing.length === 1 ? '' : 's'}: ${missing.join(', ')}.`,
        );
      }
      const fields: [string, Value][] = [];
      for (const decl of struct.fields) {
        const fieldExpr = given.get(decl.name);
        if (!fieldExpr) return undefined;
        const raw = own(fieldExpr, decl.type);
        if (!raw) return undefined;
        const converted = coerceValue(raw, decl.type, scope.structs);
        if (!converted) {
          diagAt(
            diagnostics,
            DiagnosticIds.TypeMismatch,
            fieldExpr.span,
            `Field "${decl.name}" of "${struct.name}" expects ${formatType(decl.type)}, got ${describe(raw)}.`,
          );
          return undefined;
        }
        fields.push([decl.name, converted]);
      }
      return structValue(struct.name, fields);
    }
    case 'ArrayLiteral': {
      const hint = expected?.kind === 'Array' ? expected.element : undefined;
      const elements: Value[] = [];
      let elementType = hint;
      for (const e of expr.elements) {
        const raw = own(e, elementType);
        if (!raw) return undefined;
        if (!elementType) {
          elementType = typeOfValue(raw);
          elements.push(raw);
          continue;
        }
        const converted = hint
          ? coerceValue(raw, elementType, scope.structs)
          : typesEqual(typeOfValue(raw), elementType)
            ? raw
            : undefined;
        if (!converted) {
          diagAt(
            diagnostics,
            DiagnosticIds.TypeMismatch,
            e.span,
            `Array element of type ${describe(raw)} does not match element type ${formatType(elementType)}.`,
          );
          return undefined;
        }
        elements.push(converted);
      }
      if (!elementType) {
        return fail(
          DiagnosticIds.TypeMismatch,
          'Cannot infer the element type of an empty array literal; it needs a declared array type.',
        );
      }
      return arrayValue(elementType, elements);
    }
    case 'Unary': {
      const inContext = expr.op === '+' || expr.op === '-' || expr.op === '~';
      const w = inContext ? width : selfWidth(expr.expr, scope);
      const operand = sub(expr.expr, w);
      if (!operand) return undefined;
      const n = toInteger(operand, `Operand of "${expr.op}"`, expr.span, diagnostics);
      if (n === undefined) return undefined;
      switch (expr.op) {
        case '+':
          return intValue(trunc(n, w));
        case '-':
          return intValue(trunc(-n, w));
        case '~':
          return intValue(trunc(~n, w));
        case '!':
          return boolValue(n === 0n);
        case '&':
          return bit(n === trunc(-1n, w));
        case '~&':
          return bit(n !== trunc(-1n, w));
        case '|':
          return bit(n !== 0n);
        case '~|':
          return bit(n === 0n);
        case '^':
          return bit(parity(n) === 1);
        case '~^':
        case '^~':
          return bit(parity(n) === 0);
      }
      return undefined;
    }
    case 'Binary':
      return evalBinary(expr, scope, diagnostics, width);
    case 'Ternary': {
      const cond = own(expr.cond);
      if (cond === undefined) return undefined;
      const c = toInteger(cond, 'Condition of "?:"', expr.span, diagnostics);
      if (c === undefined) return undefined;
      const whenTrue = sub(expr.whenTrue, width, expected);
      if (!whenTrue) return undefined;
      const whenFalse = sub(expr.whenFalse, width, expected);
      if (!whenFalse) return undefined;
      const chosen = c !== 0n ? whenTrue : whenFalse;
      if (isNumeric(whenTrue) && isNumeric(whenFalse)) {
        if (whenTrue.kind === 'Bool' && whenFalse.kind === 'Bool') return chosen;
        const n = toInteger(chosen, 'Result of "?:"', expr.span, diagnostics);
        return n === undefined ? undefined : intValue(trunc(n, width));
      }
      if (!typesEqual(typeOfValue(whenTrue), typeOfValue(whenFalse))) {
        return fail(
          DiagnosticIds.TypeMismatch,
          `Branches of "?:" have incompatible types ${describe(whenTrue)} and ${describe(whenFalse)}.`,
        );
      }
      return chosen;
    }
    case 'WidthCast': {
      const widthOperand = own(expr.width);
      if (!widthOperand) return undefined;
      const w = toInteger(widthOperand, 'Width of cast', expr.span, diagnostics);
      if (w === undefined) return undefined;
      if (w < 1n || w > BigInt(MAX_WIDTH)) {
        return fail(DiagnosticIds.TypeMismatch, `Cast width ${w} is outside 1..${MAX_WIDTH}.`);
      }
      const castWidth = Number(w);
      const operand = sub(expr.expr, Math.max(castWidth, selfWidth(expr.expr, scope)));
      if (!operand) return undefined;
      const n = toInteger(operand, 'Operand of width cast', expr.span, diagnostics);
      if (n === undefined) return undefined;
      return intValue(trunc(n, castWidth));
    }
    case 'BoolCast': {
      const operand = own(expr.expr);
      if (!operand) return undefined;
      const n = toInteger(operand, 'Operand of boolean cast', expr.span, diagnostics);
      if (n === undefined) return undefined;
      return boolValue(n !== 0n);
    }
  }
}

function bit(set: boolean): Value {
  return intValue(set ? 1n : 0n);
}

function parity(n: bigint): number {
  let p = 0;
  for (let v = n; v > 0n; v >>= 1n) {
    if ((v & 1n) === 1n) p ^= 1;
  }
  return p;
}

function isNumeric(value: Value): boolean {
  return value.kind === 'Int' || value.kind === 'Bool';
}

function toInteger(
  v: Value,
  what: string,
  span: SourceSpan,
  diagnostics: Diagnostic[] | undefined,
): bigint | undefined {
  if (v.kind === 'Int') return v.value;
  if (v.kind === 'Bool') return v.value ? 1n : 0n;
  diagAt(
    diagnostics,
    DiagnosticIds.TypeMismatch,
    span,
    `${what} is not a numeric type (got ${describe(v)}).`,
  );
  return undefined;
}

/**
 * `base ** exp` modulo `2^width`, by square-and-multiply.
 */
function powTrunc(base: bigint, exp: bigint, width: number): bigint {
  let result = 1n;
  let b = trunc(base, width);
  for (let e = exp; e > 0n; e >>= 1n) {
    if ((e & 1n) === 1n) result = trunc(result * b, width);
    b = trunc(b * b, width);
  }
  return trunc(result, width);
}

function operandWidths(expr: BinaryExprNode, scope: EvalScope, width: number): [number, number] {
  switch (expr.op) {
    case '**':
    case '<<':
    case '>>':
      return [width, selfWidth(expr.right, scope)];
    case '==':
    case '!=':
    case '<':
    case '>':
    case '<=':
    case '>=': {
      const shared = Math.max(selfWidth(expr.left, scope), selfWidth(expr.right, scope));
      return [shared, shared];
    }
    case '&&':
    case '||':
      return [selfWidth(expr.left, scope), selfWidth(expr.right, scope)];
    default:
      return [width, width];
  }
}

function evalBinary(
  expr: BinaryExprNode,
  scope: EvalScope,
  diagnostics: Diagnostic[] | undefined,
  width: number,
): Value | undefined {
  const { op, span } = expr;
  const [lw, rw] = operandWidths(expr, scope, width);
  const left = evalAt(expr.left, scope, diagnostics, lw);
  if (!left) return undefined;
  const right = evalAt(expr.right, scope, diagnostics, rw);
  if (!right) return undefined;

  if ((op === '==' || op === '!=') && !(isNumeric(left) && isNumeric(right))) {
    if (!typesEqual(typeOfValue(left), typeOfValue(right))) {
      diagAt(
        diagnostics,
        DiagnosticIds.TypeMismatch,
        span,
        `Cannot compare ${describe(left)} with ${describe(right)}.`,
      );
      return undefined;
    }
    const same = valueKey(left) === valueKey(right);
    return boolValue(op === '==' ? same : !same);
  }

  const l = toInteger(left, `Left operand of "${op}"`, span, diagnostics);
  if (l === undefined) return undefined;
  const r = toInteger(right, `Right operand of "${op}"`, span, diagnostics);
  if (r === undefined) return undefined;

  const int = (v: bigint): Value => intValue(trunc(v, width));

  switch (op) {
    case '+':
      return int(l + r);
    case '-':
      return int(l - r);
    case '*':
      return int(l * r);
    case '/':
    case '%':
      if (r === 0n) {
        diagAt(
          diagnostics,
          DiagnosticIds.DivideByZero,
          span,
          `${op === '/' ? 'Divide' : 'Modulo'} by zero.`,
        );
        return undefined;
      }
      return int(op === '/' ? l / r : l % r);
    case '&':
      return int(l & r);
    case '|':
      return int(l | r);
    case '^':
      return int(l ^ r);
    case '~^':
    case '^~':
      return int(~(l ^ r));
    case '**':
      return intValue(powTrunc(l, r, width));
    case '<<':
      return int(r >= BigInt(width) ? 0n : l << r);
    case '>>':
      return int(l >> r);
    case '==':
      return boolValue(l === r);
    case '!=':
      return boolValue(l !== r);
    case '<':
      return boolValue(l < r);
    case '>':
      return boolValue(l > r);
    case '<=':
      return boolValue(l <= r);
    case '>=':
      return boolValue(l >= r);
    case '&&':
      return boolValue(l !== 0n && r !== 0n);
    case '||':
      return boolValue(l !== 0n || r !== 0n);
  }
}

/**
 * Names an expression reads as parameters or instances (struct type names are not included).
 */
export function referencedNames(expr: ExprNode): Set<string> {
  const names = new Set<string>();
  const visit = (e: ExprNode): void => {
    switch (e.kind) {
      case 'IntLiteral':
      case 'BoolLiteral':
      case 'StringLiteral':
      case 'EnumLiteral':
        return;
      case 'Name':
        names.add(e.name);
        return;
      case 'Member':
        visit(e.base);
        return;
      case 'Index':
        visit(e.base);
        visit(e.index);
        return;
      case 'StructLiteral':
        for (const f of e.fields) visit(f.value);
        return;
      case 'ArrayLiteral':
        for (const el of e.elements) visit(el);
        return;
      case 'Unary':
      case 'BoolCast':
        visit(e.expr);
        return;
      case 'Binary':
        visit(e.left);
        visit(e.right);
        return;
      case 'Ternary':
        visit(e.cond);
        visit(e.whenTrue);
        visit(e.whenFalse);
        return;
      case 'WidthCast':
        visit(e.width);
        visit(e.expr);
        return;
    }
  };
  visit(expr);
  return names;
}
