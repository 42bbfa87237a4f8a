import type { ComponentKind, ExprNode } from '../frontend/ast.js';
import { componentKinds } from '../frontend/ast.js';
import builtinPropertyTable from './builtin-properties.json' with { type: 'json' };
import { builtinType } from './types.js';
import type { ValueType } from './values.js';

/**
 * A typed property slot, built-in or user-declared.
 */
export interface PropertyType {
  name: string;
  /** Accepted value types, in preference order. */
  types: ValueType[];
  components: ReadonlySet<ComponentKind>;
  /** Value used by the `prop;` shorthand for non-boolean properties. */
  default?: ExprNode;
  builtin: boolean;
}

function isComponentKind(name: string): name is ComponentKind {
  return componentKinds.some((k) => k === name);
}

function parseTypeSpelling(spelling: string): ValueType | undefined {
  if (spelling.endsWith('[]')) {
    const element = parseTypeSpelling(spelling.slice(0, -2));
    return element ? { kind: 'Array', element } : undefined;
  }
  return builtinType(spelling);
}

function parseComponents(raw: string | string[], property: string): Set<ComponentKind> {
  if (raw === 'all') return new Set(componentKinds);
  const kinds = new Set<ComponentKind>();
  for (const k of Array.isArray(raw) ? raw : [raw]) {
    if (!isComponentKind(k)) {
      throw new Error(`Built-in property "${property}" names unknown component kind "${k}".`);
    }
    kinds.add(k);
  }
  return kinds;
}

let table: ReadonlyMap<string, PropertyType> | undefined;

/**
 * Built-in property types, loaded once from `builtin-properties.json` and never mutated.
 */
export function builtinPropertyTypes(): ReadonlyMap<string, PropertyType> {
  if (table) return table;
  const loaded = new Map<string, PropertyType>();
  for (const row of builtinPropertyTable) {
    const types: ValueType[] = [];
    for (const spelling of row.types) {
      const type = parseTypeSpelling(spelling);
      if (!type) {
        throw new Error(`Built-in property "${row.name}" has unknown type "${spelling}".`);
      }
      types.push(type);
    }
    loaded.set(row.name, {
      name: row.name,
      types,
      components: parseComponents(row.components, row.name),
      builtin: true,
    });
  }
  table = loaded;
  return table;
}
