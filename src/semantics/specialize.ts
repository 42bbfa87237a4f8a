import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { diagAt } from '../diagnostics/report.js';
import type {
  ComponentDeclNode,
  ComponentKind,
  InstanceNode,
  PropAssignNode,
  SourceSpan,
} from '../frontend/ast.js';
import { bind, evaluateOverrides, templateLabel } from './bind.js';
import type { ElabEnv } from './env.js';
import type { EvalScope, ParameterEnvironment } from './evaluate.js';
import { evaluate } from './evaluate.js';
import { checkExtent } from './expand.js';
import { coerceValue } from './types.js';
import type { Value } from './values.js';
import { boolValue, formatType, formatValue, mapRefs, refValue, valueKey } from './values.js';

/**
 * One named child of a specialized component. Array children share one definition.
 */
export interface ChildSlot {
  readonly name: string;
  readonly component: SpecializedComponent;
  /** Instance-array extent; absent for a single instance. */
  readonly extent?: number;
  readonly span: SourceSpan;
}

/**
 * A component template specialized under one parameter environment.
 *
 * Shared by every instantiation whose environment is structurally equal; never mutated.
 */
export interface SpecializedComponent {
  readonly kind: ComponentKind;
  readonly typeName: string | undefined;
  readonly template: ComponentDeclNode;
  readonly parameters: ParameterEnvironment;
  /** Properties assigned by the body to the component itself. */
  readonly properties: ReadonlyMap<string, Value>;
  readonly children: readonly ChildSlot[];
  /**
   * Dynamic assignments (`a.b->prop = v`) made by the body, keyed by dotted instance path.
   * They apply to the placed descendants, never to the shared child definitions.
   */
  readonly dynamicAssignments: ReadonlyMap<string, ReadonlyMap<string, Value>>;
}

/**
 * Lexical scope of component definitions, carrying the parameters of the body that owns it.
 *
 * References held in `params` are relative to the component currently being specialized.
 */
export interface DefinitionScope {
  readonly templates: ReadonlyMap<string, ComponentDeclNode>;
  readonly params: ParameterEnvironment;
  readonly parent?: DefinitionScope;
}

export interface Specializer {
  /**
   * Specialize `template` under an already-bound environment.
   *
   * `scope` is the definition scope the template was found in; root scope when omitted.
   */
  specialize(
    template: ComponentDeclNode,
    params: ParameterEnvironment,
    diagnostics?: Diagnostic[],
    scope?: DefinitionScope,
  ): SpecializedComponent | undefined;
  /** Root definition scope: the program's root-scope templates, no parameters. */
  readonly rootScope: DefinitionScope;
  /** Number of distinct specializations built so far. */
  cacheSize(): number;
}

function environmentKey(params: ParameterEnvironment): string {
  return Array.from(params)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([name, v]) => `${name}=${valueKey(v)}`)
    .join(';');
}

/**
 * Re-express the references in `params` for a component `levels` below the one they were
 * evaluated in.
 */
function lowerRefs(params: ParameterEnvironment, levels: number): ParameterEnvironment {
  return new Map(
    Array.from(params, ([name, v]): [string, Value] => [
      name,
      mapRefs(v, (r) => refValue(r.path, r.up + levels)),
    ]),
  );
}

function lowerScope(scope: DefinitionScope, levels: number): DefinitionScope {
  const params = lowerRefs(scope.params, levels);
  return scope.parent
    ? { templates: scope.templates, params, parent: lowerScope(scope.parent, levels) }
    : { templates: scope.templates, params };
}

function findTemplate(
  scope: DefinitionScope,
  name: string,
): { template: ComponentDeclNode; scope: DefinitionScope } | undefined {
  for (let s: DefinitionScope | undefined = scope; s; s = s.parent) {
    const template = s.templates.get(name);
    if (template) return { template, scope: s };
  }
  return undefined;
}

/**
 * Create a specializer with its own structural cache.
 *
 * The cache maps template identity plus the deep value key of the environment to the finished
 * specialization. Elaboration is synchronous, so each key is built at most once and is inserted
 * only after its build completes.
 */
export function createSpecializer(env: ElabEnv): Specializer {
  const cache = new WeakMap<ComponentDeclNode, Map<string, SpecializedComponent>>();
  const stack: ComponentDeclNode[] = [];
  let built = 0;

  const rootScope: DefinitionScope = { templates: env.components, params: new Map() };

  const localTemplates = (
    template: ComponentDeclNode,
    diagnostics: Diagnostic[] | undefined,
  ): Map<string, ComponentDeclNode> | undefined => {
    const templates = new Map<string, ComponentDeclNode>();
    for (const item of template.body) {
      if (item.kind !== 'ComponentDecl') continue;
      if (item.name === undefined) {
        diagAt(
          diagnostics,
          DiagnosticIds.DeclarationError,
          item.span,
          'Anonymous component definitions are only allowed as part of an instantiation.',
        );
        return undefined;
      }
      if (templates.has(item.name)) {
        diagAt(
          diagnostics,
          DiagnosticIds.DuplicateName,
          item.span,
          `Component "${item.name}" is defined more than once in "${templateLabel(template)}".`,
        );
        return undefined;
      }
      templates.set(item.name, item);
    }
    return templates;
  };

  const specialize = (
    template: ComponentDeclNode,
    params: ParameterEnvironment,
    diagnostics?: Diagnostic[],
    scope: DefinitionScope = rootScope,
  ): SpecializedComponent | undefined => {
    const key = environmentKey(params);
    let perTemplate = cache.get(template);
    const cached = perTemplate?.get(key);
    if (cached) return cached;

    if (stack.includes(template)) {
      const chain = stack.slice(stack.indexOf(template)).concat([template]).map(templateLabel);
      diagAt(
        diagnostics,
        DiagnosticIds.InstantiationCycle,
        template.span,
        `Component "${templateLabel(template)}" instantiates itself: ${chain.join(' -> ')}.`,
      );
      return undefined;
    }

    stack.push(template);
    let result: SpecializedComponent | undefined;
    try {
      result = buildSpecialization(template, params, scope, diagnostics);
    } finally {
      stack.pop();
    }
    if (!result) return undefined;

    if (!perTemplate) {
      perTemplate = new Map();
      cache.set(template, perTemplate);
    }
    perTemplate.set(key, result);
    built++;
    return result;
  };

  const buildSpecialization = (
    template: ComponentDeclNode,
    params: ParameterEnvironment,
    definedIn: DefinitionScope,
    diagnostics: Diagnostic[] | undefined,
  ): SpecializedComponent | undefined => {
    const templates = localTemplates(template, diagnostics);
    if (!templates) return undefined;
    const bodyScope: DefinitionScope = { templates, params, parent: definedIn };

    const children: ChildSlot[] = [];
    const childByName = new Map<string, ChildSlot>();
    const properties = new Map<string, Value>();
    const dynamicAssignments = new Map<string, Map<string, Value>>();

    const resolvePath = (path: readonly string[]): ChildSlot | undefined => {
      let slots: ReadonlyMap<string, ChildSlot> = childByName;
      let found: ChildSlot | undefined;
      for (const name of path) {
        found = slots.get(name);
        if (!found) return undefined;
        slots = new Map(found.component.children.map((c) => [c.name, c]));
      }
      return found;
    };

    const evalScope: EvalScope = {
      structs: env.structs,
      params,
      hasInstance: (path) => resolvePath(path) !== undefined,
    };

    const instantiate = (item: InstanceNode): ChildSlot | undefined => {
      let child: { template: ComponentDeclNode; scope: DefinitionScope } | undefined;
      if (item.component.kind === 'ComponentDecl') {
        child = { template: item.component, scope: bodyScope };
      } else {
        child = findTemplate(bodyScope, item.component.name);
        if (!child) {
          diagAt(
            diagnostics,
            DiagnosticIds.UndefinedReference,
            item.component.span,
            `Unknown component type "${item.component.name}".`,
          );
          return undefined;
        }
      }

      if (childByName.has(item.name)) {
        diagAt(
          diagnostics,
          DiagnosticIds.DuplicateName,
          item.span,
          `Instance "${item.name}" is declared more than once in "${templateLabel(template)}".`,
        );
        return undefined;
      }

      const overrides = evaluateOverrides(child.template, item.overrides, evalScope, diagnostics);
      if (!overrides) return undefined;
      // The child body sees this body's instances one level up.
      const childScope = lowerScope(child.scope, 1);
      const childParams = bind(
        child.template,
        lowerRefs(overrides, 1),
        { structs: env.structs, outer: childScope.params, site: item.span },
        diagnostics,
      );
      if (!childParams) return undefined;

      let extent: number | undefined;
      if (item.extent) {
        const raw = evaluate(item.extent, evalScope, diagnostics);
        if (!raw) return undefined;
        extent = checkExtent(raw, item.extent.span, diagnostics);
        if (extent === undefined) return undefined;
      }

      const component = specialize(child.template, childParams, diagnostics, childScope);
      if (!component) return undefined;
      return extent !== undefined
        ? { name: item.name, component, extent, span: item.span }
        : { name: item.name, component, span: item.span };
    };

    const assign = (item: PropAssignNode): boolean => {
      let targetKind: ComponentKind = template.componentKind;
      if (item.target.length > 0) {
        const slot = resolvePath(item.target);
        if (!slot) {
          diagAt(
            diagnostics,
            DiagnosticIds.UndefinedReference,
            item.span,
            `"${item.target.join('.')}" does not name an instance declared before this assignment.`,
          );
          return false;
        }
        targetKind = slot.component.kind;
      }

      const propType = env.properties.get(item.property);
      if (!propType || !propType.components.has(targetKind)) {
        diagAt(
          diagnostics,
          DiagnosticIds.UnknownProperty,
          item.span,
          propType
            ? `Property "${item.property}" does not apply to ${targetKind} components.`
            : `Unknown property "${item.property}".`,
        );
        return false;
      }

      let value: Value | undefined;
      if (item.value) {
        const hint = propType.types.find((t) => t.kind === 'Array') ?? propType.types[0];
        const raw = evaluate(item.value, evalScope, diagnostics, hint);
        if (!raw) return false;
        for (const t of propType.types) {
          value = coerceValue(raw, t, env.structs);
          if (value) break;
        }
        if (!value) {
          diagAt(
            diagnostics,
            DiagnosticIds.PropertyTypeMismatch,
            item.value.span,
            `Property "${item.property}" expects ${propType.types.map(formatType).join(' or ')}, got ${formatValue(raw)}.`,
          );
          return false;
        }
      } else if (propType.types.some((t) => t.kind === 'Boolean')) {
        value = boolValue(true);
      } else if (propType.default) {
        const first = propType.types[0];
        const raw = evaluate(
          propType.default,
          { structs: env.structs, params: new Map() },
          diagnostics,
          first,
        );
        if (!raw) return false;
        value = first ? coerceValue(raw, first, env.structs) : undefined;
        if (!value) {
          diagAt(
            diagnostics,
            DiagnosticIds.PropertyTypeMismatch,
            propType.default.span,
            `Default of property "${item.property}" does not conform to its type.`,
          );
          return false;
        }
      } else {
        diagAt(
          diagnostics,
          DiagnosticIds.PropertyTypeMismatch,
          item.span,
          `Property "${item.property}" needs a value.`,
        );
        return false;
      }

      if (item.target.length === 0) {
        properties.set(item.property, value);
      } else {
        const path = item.target.join('.');
        let byProperty = dynamicAssignments.get(path);
        if (!byProperty) {
          byProperty = new Map();
          dynamicAssignments.set(path, byProperty);
        }
        byProperty.set(item.property, value);
      }
      return true;
    };

    for (const item of template.body) {
      switch (item.kind) {
        case 'ComponentDecl':
          break;
        case 'Instance': {
          const slot = instantiate(item);
          if (!slot) return undefined;
          children.push(slot);
          childByName.set(slot.name, slot);
          break;
        }
        case 'PropAssign':
          if (!assign(item)) return undefined;
          break;
      }
    }

    return {
      kind: template.componentKind,
      typeName: template.name,
      template,
      parameters: params,
      properties,
      children,
      dynamicAssignments,
    };
  };

  return { specialize, rootScope, cacheSize: () => built };
}
