/**
 * Built-in enumeration types and their members.
 */
export const builtinEnumMembers = {
  accesstype: ['na', 'rw', 'wr', 'r', 'w', 'rw1', 'w1'],
  onreadtype: ['rclr', 'rset', 'ruser'],
  onwritetype: ['woset', 'woclr', 'wot', 'wzs', 'wzc', 'wzt', 'wclr', 'wset', 'wuser'],
  addressingtype: ['compact', 'regalign', 'fullalign'],
  precedencetype: ['hw', 'sw'],
} as const;

export type BuiltinEnumType = keyof typeof builtinEnumMembers;

export function isBuiltinEnumType(name: string): name is BuiltinEnumType {
  return Object.prototype.hasOwnProperty.call(builtinEnumMembers, name);
}

/**
 * Declared type of a parameter, struct field or property.
 *
 * `longint` and `bit` are both integral; they differ only in how they print.
 */
export type ValueType =
  | { kind: 'Integer'; name: 'longint' | 'bit' }
  | { kind: 'Boolean' }
  | { kind: 'String' }
  | { kind: 'Enum'; enumType: BuiltinEnumType }
  | { kind: 'Ref' }
  | { kind: 'Struct'; name: string }
  | { kind: 'Array'; element: ValueType };

export interface IntValue {
  readonly kind: 'Int';
  /** Unsigned, at most 64 bits wide. */
  readonly value: bigint;
}

export interface BoolValue {
  readonly kind: 'Bool';
  readonly value: boolean;
}

export interface StringValue {
  readonly kind: 'String';
  readonly value: string;
}

export interface EnumValue {
  readonly kind: 'Enum';
  readonly enumType: BuiltinEnumType;
  readonly member: string;
}

export interface StructValue {
  readonly kind: 'Struct';
  readonly typeName: string;
  /** Field values in the struct type's declaration order. */
  readonly fields: ReadonlyMap<string, Value>;
}

export interface ArrayValue {
  readonly kind: 'Array';
  readonly elementType: ValueType;
  readonly elements: readonly Value[];
}

/**
 * Reference to an instance.
 *
 * Inside a specialized component the reference is relative to that component: climb `up` levels,
 * then follow `path`. In an elaborated tree every reference has `up` 0 and a path from the root
 * whose segments are written as in `findInstance` (`regs[1]`).
 */
export interface ComponentRefValue {
  readonly kind: 'ComponentRef';
  readonly up: number;
  readonly path: readonly string[];
}

/**
 * Elaboration-time value: the currency of parameters and properties.
 */
export type Value =
  | IntValue
  | BoolValue
  | StringValue
  | EnumValue
  | StructValue
  | ArrayValue
  | ComponentRefValue;

export const LONGINT: ValueType = { kind: 'Integer', name: 'longint' };
export const BOOLEAN: ValueType = { kind: 'Boolean' };
export const STRING: ValueType = { kind: 'String' };

export function intValue(value: bigint | number): IntValue {
  return { kind: 'Int', value: BigInt.asUintN(64, BigInt(value)) };
}

export function boolValue(value: boolean): BoolValue {
  return { kind: 'Bool', value };
}

export function stringValue(value: string): StringValue {
  return { kind: 'String', value };
}

export function enumValue(enumType: BuiltinEnumType, member: string): EnumValue {
  return { kind: 'Enum', enumType, member };
}

export function structValue(typeName: string, fields: Iterable<[string, Value]>): StructValue {
  return { kind: 'Struct', typeName, fields: new Map(fields) };
}

export function arrayValue(elementType: ValueType, elements: readonly Value[]): ArrayValue {
  return { kind: 'Array', elementType, elements: [...elements] };
}

export function refValue(path: readonly string[], up = 0): ComponentRefValue {
  return { kind: 'ComponentRef', up, path: [...path] };
}

/**
 * Rewrite every reference inside `value`, including struct fields and array elements.
 */
export function mapRefs(value: Value, fn: (ref: ComponentRefValue) => ComponentRefValue): Value {
  switch (value.kind) {
    case 'ComponentRef':
      return fn(value);
    case 'Struct':
      return structValue(
        value.typeName,
        Array.from(value.fields, ([name, v]): [string, Value] => [name, mapRefs(v, fn)]),
      );
    case 'Array':
      return arrayValue(value.elementType, value.elements.map((v) => mapRefs(v, fn)));
    default:
      return value;
  }
}

export function formatType(type: ValueType): string {
  switch (type.kind) {
    case 'Integer':
      return type.name;
    case 'Boolean':
      return 'boolean';
    case 'String':
      return 'string';
    case 'Enum':
      return type.enumType;
    case 'Ref':
      return 'ref';
    case 'Struct':
      return type.name;
    case 'Array':
      return `${formatType(type.element)}[]`;
  }
}

/**
 * Canonical string form of a value.
 *
 * Two values have the same key exactly when they are structurally equal, so keys are usable for
 * memoization. Integer width types are not part of the key: `longint` and `bit` arrays holding the
 * same numbers are equal.
 */
export function valueKey(value: Value): string {
  switch (value.kind) {
    case 'Int':
      return `i${value.value.toString()}`;
    case 'Bool':
      return value.value ? 'T' : 'F';
    case 'String':
      return `s${JSON.stringify(value.value)}`;
    case 'Enum':
      return `e${value.enumType}.${value.member}`;
    case 'Struct': {
      const parts = Array.from(value.fields, ([name, v]) => `${name}=${valueKey(v)}`);
      return `S${value.typeName}{${parts.join(',')}}`;
    }
    case 'Array': {
      const element = formatType(value.elementType).replace(/\bbit\b/g, 'longint');
      return `A<${element}>[${value.elements.map(valueKey).join(',')}]`;
    }
    case 'ComponentRef':
      return `r${value.up}:${value.path.join('.')}`;
  }
}

export function valuesEqual(a: Value, b: Value): boolean {
  return valueKey(a) === valueKey(b);
}

/**
 * Render a value the way it would be written in source, for messages.
 */
export function formatValue(value: Value): string {
  switch (value.kind) {
    case 'Int':
      return value.value.toString();
    case 'Bool':
      return value.value ? 'true' : 'false';
    case 'String':
      return JSON.stringify(value.value);
    case 'Enum':
      return value.member;
    case 'Struct': {
      const parts = Array.from(value.fields, ([name, v]) => `${name}:${formatValue(v)}`);
      return `${value.typeName}'{${parts.join(', ')}}`;
    }
    case 'Array':
      return `'{${value.elements.map(formatValue).join(', ')}}`;
    case 'ComponentRef':
      return [...Array<string>(value.up).fill('^'), ...value.path].join('.');
  }
}
