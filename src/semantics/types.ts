import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { diagAt } from '../diagnostics/report.js';
import type { StructDeclNode, TypeExprNode } from '../frontend/ast.js';
import type { Value, ValueType } from './values.js';
import { arrayValue, boolValue, intValue, isBuiltinEnumType } from './values.js';

export interface StructField {
  name: string;
  type: ValueType;
}

/**
 * Resolved struct type: base fields first, then the struct's own fields.
 */
export interface StructType {
  name: string;
  base?: string;
  fields: StructField[];
}

export type StructTable = ReadonlyMap<string, StructType>;

/**
 * Resolve a built-in type name (`longint`, `boolean`, `accesstype`, ...). Struct names are not
 * built-in and yield `undefined`.
 */
export function builtinType(name: string): ValueType | undefined {
  switch (name) {
    case 'longint':
    case 'bit':
      return { kind: 'Integer', name };
    case 'boolean':
      return { kind: 'Boolean' };
    case 'string':
      return { kind: 'String' };
    case 'ref':
      return { kind: 'Ref' };
    default:
      return isBuiltinEnumType(name) ? { kind: 'Enum', enumType: name } : undefined;
  }
}

/**
 * Resolve a type expression against the built-in types and the given struct names.
 */
export function resolveTypeExpr(
  typeExpr: TypeExprNode,
  isStruct: (name: string) => boolean,
  diagnostics?: Diagnostic[],
): ValueType | undefined {
  switch (typeExpr.kind) {
    case 'TypeName': {
      const builtin = builtinType(typeExpr.name);
      if (builtin) return builtin;
      if (isStruct(typeExpr.name)) return { kind: 'Struct', name: typeExpr.name };
      diagAt(
        diagnostics,
        DiagnosticIds.UndefinedReference,
        typeExpr.span,
        `Unknown type "${typeExpr.name}".`,
      );
      return undefined;
    }
    case 'ArrayType': {
      const element = resolveTypeExpr(typeExpr.element, isStruct, diagnostics);
      return element ? { kind: 'Array', element } : undefined;
    }
  }
}

/**
 * Resolve every struct declaration into a {@link StructType}.
 *
 * Rules:
 * - A base struct contributes its fields ahead of the derived struct's own.
 * - Field names must be unique across the whole inheritance chain.
 * - A struct may not contain itself, through fields, array elements or its base chain.
 *
 * Structs that fail to resolve are left out of the result.
 */
export function resolveStructTypes(
  decls: ReadonlyMap<string, StructDeclNode>,
  diagnostics: Diagnostic[],
): Map<string, StructType> {
  const resolved = new Map<string, StructType>();
  const failed = new Set<string>();
  const visiting = new Set<string>();

  const containedStructs = (type: ValueType): string[] => {
    if (type.kind === 'Struct') return [type.name];
    if (type.kind === 'Array') return containedStructs(type.element);
    return [];
  };

  const resolve = (name: string): StructType | undefined => {
    const cached = resolved.get(name);
    if (cached) return cached;
    if (failed.has(name)) return undefined;
    const decl = decls.get(name);
    if (!decl) return undefined;

    if (visiting.has(name)) {
      diagAt(
        diagnostics,
        DiagnosticIds.RecursiveType,
        decl.span,
        `Recursive type definition detected for "${name}".`,
      );
      failed.add(name);
      return undefined;
    }
    visiting.add(name);
    try {
      const fields: StructField[] = [];
      if (decl.base !== undefined) {
        if (!decls.has(decl.base)) {
          diagAt(
            diagnostics,
            DiagnosticIds.DeclarationError,
            decl.span,
            `Struct "${name}" extends unknown struct "${decl.base}".`,
          );
          failed.add(name);
          return undefined;
        }
        const base = resolve(decl.base);
        if (!base) {
          failed.add(name);
          return undefined;
        }
        fields.push(...base.fields);
      }

      for (const f of decl.fields) {
        if (fields.some((existing) => existing.name === f.name)) {
          diagAt(
            diagnostics,
            DiagnosticIds.DuplicateName,
            f.span,
            `Struct "${name}" declares field "${f.name}" more than once.`,
          );
          failed.add(name);
          return undefined;
        }
        const type = resolveTypeExpr(f.typeExpr, (n) => decls.has(n), diagnostics);
        if (!type) {
          failed.add(name);
          return undefined;
        }
        for (const inner of containedStructs(type)) {
          if (!resolve(inner)) {
            failed.add(name);
            return undefined;
          }
        }
        fields.push({ name: f.name, type });
      }

      const struct: StructType =
        decl.base !== undefined ? { name, base: decl.base, fields } : { name, fields };
      resolved.set(name, struct);
      return struct;
    } finally {
      visiting.delete(name);
    }
  };

  for (const name of decls.keys()) resolve(name);
  return resolved;
}

/**
 * True when struct `name` is `ancestor` or derives from it.
 */
export function isStructOrDerived(name: string, ancestor: string, structs: StructTable): boolean {
  let cur: string | undefined = name;
  while (cur !== undefined) {
    if (cur === ancestor) return true;
    cur = structs.get(cur)?.base;
  }
  return false;
}

/**
 * Type a value carries on its own.
 */
export function typeOfValue(value: Value): ValueType {
  switch (value.kind) {
    case 'Int':
      return { kind: 'Integer', name: 'longint' };
    case 'Bool':
      return { kind: 'Boolean' };
    case 'String':
      return { kind: 'String' };
    case 'Enum':
      return { kind: 'Enum', enumType: value.enumType };
    case 'Struct':
      return { kind: 'Struct', name: value.typeName };
    case 'Array':
      return { kind: 'Array', element: value.elementType };
    case 'ComponentRef':
      return { kind: 'Ref' };
  }
}

export function typesEqual(a: ValueType, b: ValueType): boolean {
  switch (a.kind) {
    case 'Integer':
    case 'Boolean':
    case 'String':
    case 'Ref':
      return a.kind === b.kind;
    case 'Enum':
      return b.kind === 'Enum' && a.enumType === b.enumType;
    case 'Struct':
      return b.kind === 'Struct' && a.name === b.name;
    case 'Array':
      return b.kind === 'Array' && typesEqual(a.element, b.element);
  }
}

/**
 * Convert a value for storage in a slot of the given type.
 *
 * Integral and boolean values interconvert (`boolean` takes `value != 0`, integral takes 0/1).
 * Arrays convert element-wise and take on the slot's element type. Struct values conform to their
 * own type and to any base struct. Everything else must match exactly.
 *
 * @returns the converted value, or `undefined` when the value does not conform.
 */
export function coerceValue(value: Value, type: ValueType, structs: StructTable): Value | undefined {
  switch (type.kind) {
    case 'Integer':
      if (value.kind === 'Int') return value;
      if (value.kind === 'Bool') return intValue(value.value ? 1n : 0n);
      return undefined;
    case 'Boolean':
      if (value.kind === 'Bool') return value;
      if (value.kind === 'Int') return boolValue(value.value !== 0n);
      return undefined;
    case 'String':
      return value.kind === 'String' ? value : undefined;
    case 'Ref':
      return value.kind === 'ComponentRef' ? value : undefined;
    case 'Enum':
      return value.kind === 'Enum' && value.enumType === type.enumType ? value : undefined;
    case 'Struct':
      return value.kind === 'Struct' && isStructOrDerived(value.typeName, type.name, structs)
        ? value
        : undefined;
    case 'Array': {
      if (value.kind !== 'Array') return undefined;
      const elements: Value[] = [];
      for (const element of value.elements) {
        const converted = coerceValue(element, type.element, structs);
        if (!converted) return undefined;
        elements.push(converted);
      }
      if (
        elements.length === 0 &&
        !arrayElementsCompatible(value.elementType, type.element, structs)
      ) {
        return undefined;
      }
      return arrayValue(type.element, elements);
    }
  }
}

function arrayElementsCompatible(from: ValueType, to: ValueType, structs: StructTable): boolean {
  const numeric = (t: ValueType) => t.kind === 'Integer' || t.kind === 'Boolean';
  if (numeric(from) && numeric(to)) return true;
  if (from.kind === 'Array' && to.kind === 'Array') {
    return arrayElementsCompatible(from.element, to.element, structs);
  }
  if (from.kind === 'Struct' && to.kind === 'Struct') {
    return isStructOrDerived(from.name, to.name, structs);
  }
  return typesEqual(from, to);
}
