import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { diagAt } from '../diagnostics/report.js';
import type { ComponentDeclNode, SourceSpan } from '../frontend/ast.js';
import { bind, templateLabel } from './bind.js';
import type { ElabEnv } from './env.js';
import type { Instance } from './expand.js';
import { expand } from './expand.js';
import type { Specializer, SpecializedComponent } from './specialize.js';
import type { ComponentRefValue, Value } from './values.js';
import { mapRefs, refValue } from './values.js';

/**
 * Fully elaborated address map: the sole artifact handed to downstream tools.
 */
export interface ElaboratedTree {
  readonly root: Instance;
}

export interface BuildTreeOptions {
  env: ElabEnv;
  specializer: Specializer;
  /** Name of the root instance; defaults to the template name. */
  name?: string;
  /** Instantiation site used to locate errors; defaults to the template. */
  site?: SourceSpan;
}

type PathAssignments = ReadonlyMap<string, ReadonlyMap<string, Value>>;

function segment(name: string, ordinal: number | undefined): string {
  return ordinal === undefined ? name : `${name}[${ordinal}]`;
}

/**
 * Rewrite references made by the component placed at `base` into paths from the root.
 */
function rootRelative(
  props: ReadonlyMap<string, Value>,
  base: readonly string[],
): Map<string, Value> {
  return new Map(
    Array.from(props, ([name, v]): [string, Value] => [
      name,
      mapRefs(v, (r) => refValue([...base.slice(0, Math.max(0, base.length - r.up)), ...r.path])),
    ]),
  );
}

/**
 * Overlay `outer` path assignments on `inner`; `outer` wins per property.
 */
function overlay(inner: PathAssignments, outer: PathAssignments): PathAssignments {
  if (outer.size === 0) return inner;
  const merged = new Map<string, ReadonlyMap<string, Value>>(inner);
  for (const [path, props] of outer) {
    merged.set(path, new Map([...(inner.get(path) ?? []), ...props]));
  }
  return merged;
}

/**
 * Place every child slot of `component`, applying dynamic assignments made by the component
 * itself and by its ancestors (`inherited`, keyed relative to `component`). `base` is the path of
 * the placed component from the root.
 */
function placeChildren(
  component: SpecializedComponent,
  inherited: PathAssignments,
  base: readonly string[],
  diagnostics: Diagnostic[] | undefined,
): Instance[] | undefined {
  const own = new Map<string, ReadonlyMap<string, Value>>();
  for (const [path, props] of component.dynamicAssignments) {
    own.set(path, rootRelative(props, base));
  }
  const assignments = overlay(own, inherited);
  const placed: Instance[] = [];

  for (const slot of component.children) {
    const prefix = `${slot.name}.`;
    const forChild = new Map<string, ReadonlyMap<string, Value>>();
    for (const [path, props] of assignments) {
      if (path.startsWith(prefix)) forChild.set(path.slice(prefix.length), props);
    }
    const assigned = assignments.get(slot.name) ?? [];
    const pathOf = (ordinal: number | undefined) => [...base, segment(slot.name, ordinal)];

    const instances = expand(
      slot.component,
      slot.extent,
      {
        name: slot.name,
        properties: (ordinal) =>
          new Map([...rootRelative(slot.component.properties, pathOf(ordinal)), ...assigned]),
        children: (ordinal) =>
          placeChildren(slot.component, forChild, pathOf(ordinal), diagnostics),
        span: slot.span,
      },
      diagnostics,
    );
    if (!instances) return undefined;
    placed.push(...instances);
  }
  return placed;
}

/**
 * Elaborate an address map template into an instance tree.
 *
 * Binds the root's parameters, specializes it like any other template and expands every child
 * instantiation recursively, attaching the results in body order.
 */
export function buildTree(
  addrmap: ComponentDeclNode,
  overrides: ReadonlyMap<string, Value>,
  options: BuildTreeOptions,
  diagnostics?: Diagnostic[],
): ElaboratedTree | undefined {
  const site = options.site ?? addrmap.span;
  if (addrmap.componentKind !== 'addrmap') {
    diagAt(
      diagnostics,
      DiagnosticIds.DeclarationError,
      site,
      `Top-level component "${templateLabel(addrmap)}" is a ${addrmap.componentKind}, not an addrmap.`,
    );
    return undefined;
  }

  const params = bind(addrmap, overrides, { structs: options.env.structs, site }, diagnostics);
  if (!params) return undefined;
  const specialized = options.specializer.specialize(addrmap, params, diagnostics);
  if (!specialized) return undefined;

  const name = options.name ?? addrmap.name ?? 'top';
  const roots = expand(
    specialized,
    undefined,
    {
      name,
      properties: () => rootRelative(specialized.properties, []),
      children: () => placeChildren(specialized, new Map(), [], diagnostics),
      span: site,
    },
    diagnostics,
  );
  const root = roots?.[0];
  if (!root) return undefined;
  const tree: ElaboratedTree = { root };
  return checkReferences(tree, diagnostics) ? tree : undefined;
}

function refsIn(value: Value): ComponentRefValue[] {
  switch (value.kind) {
    case 'ComponentRef':
      return [value];
    case 'Struct':
      return Array.from(value.fields.values()).flatMap(refsIn);
    case 'Array':
      return value.elements.flatMap(refsIn);
    default:
      return [];
  }
}

/**
 * Every reference in the tree must name a placed instance. References into enclosing components
 * and to whole instance arrays are only checked here.
 */
function checkReferences(tree: ElaboratedTree, diagnostics: Diagnostic[] | undefined): boolean {
  const visit = (instance: Instance, path: readonly string[]): boolean => {
    for (const [property, value] of instance.properties) {
      for (const r of refsIn(value)) {
        const target = r.path.join('.');
        if (findInstance(tree, target)) continue;
        const where = path.length > 0 ? path.join('.') : instance.name;
        diagAt(
          diagnostics,
          DiagnosticIds.UndefinedReference,
          instance.definition.template.span,
          `Property "${property}" of "${where}" refers to "${target}", which is not an instance.`,
        );
        return false;
      }
    }
    return instance.children.every((c) => visit(c, [...path, segment(c.name, c.ordinal)]));
  };
  return visit(tree.root, []);
}
