import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { diagAt } from '../diagnostics/report.js';
import type { ComponentDeclNode, ParamOverrideNode, SourceSpan } from '../frontend/ast.js';
import type { EvalScope, ParameterEnvironment } from './evaluate.js';
import { evaluate, referencedNames } from './evaluate.js';
import type { StructTable } from './types.js';
import { coerceValue, resolveTypeExpr } from './types.js';
import type { Value, ValueType } from './values.js';
import { formatType, formatValue } from './values.js';

export interface BindOptions {
  structs: StructTable;
  /**
   * Parameters visible from the template's lexical parent. Own formals shadow them.
   */
  outer?: ParameterEnvironment;
  /** Instantiation site used to locate override errors; defaults to the template. */
  site?: SourceSpan;
}

export function templateLabel(template: ComponentDeclNode): string {
  return template.name ?? `anonymous ${template.componentKind}`;
}

/**
 * Resolve a template's formal parameters against caller overrides and defaults.
 *
 * Rules:
 * - Formals are processed in declaration order.
 * - An override is converted to the formal's declared type or rejected.
 * - A default may reference earlier formals only; it is evaluated against the environment built
 *   so far and is never evaluated when an override exists.
 *
 * @returns a flat environment holding the outer parameters plus every formal.
 */
export function bind(
  template: ComponentDeclNode,
  overrides: ReadonlyMap<string, Value>,
  options: BindOptions,
  diagnostics?: Diagnostic[],
): ParameterEnvironment | undefined {
  const label = templateLabel(template);
  const site = options.site ?? template.span;

  for (const name of overrides.keys()) {
    if (!template.params.some((p) => p.name === name)) {
      diagAt(
        diagnostics,
        DiagnosticIds.UnknownParameter,
        site,
        `Component "${label}" has no parameter "${name}".`,
      );
      return undefined;
    }
  }

  const params = new Map<string, Value>(options.outer ?? []);
  const formalNames = template.params.map((p) => p.name);

  for (let i = 0; i < template.params.length; i++) {
    const formal = template.params[i];
    if (!formal) continue;
    if (formalNames.indexOf(formal.name) !== i) {
      diagAt(
        diagnostics,
        DiagnosticIds.DuplicateName,
        formal.span,
        `Parameter "${formal.name}" is declared more than once in "${label}".`,
      );
      return undefined;
    }
    const type = resolveTypeExpr(formal.typeExpr, (n) => options.structs.has(n), diagnostics);
    if (!type) return undefined;

    const override = overrides.get(formal.name);
    if (override) {
      const converted = coerceValue(override, type, options.structs);
      if (!converted) {
        diagAt(
          diagnostics,
          DiagnosticIds.ParameterTypeMismatch,
          site,
          `Parameter "${formal.name}" of "${label}" expects ${formatType(type)}, got ${formatValue(override)}.`,
        );
        return undefined;
      }
      params.set(formal.name, converted);
      continue;
    }

    if (!formal.default) {
      diagAt(
        diagnostics,
        DiagnosticIds.MissingParameter,
        site,
        `Parameter "${formal.name}" of "${label}" has no default and no value was given.`,
      );
      return undefined;
    }

    const later = new Set(formalNames.slice(i));
    const forward = [...referencedNames(formal.default)].find((n) => later.has(n));
    if (forward !== undefined) {
      diagAt(
        diagnostics,
        DiagnosticIds.ForwardReference,
        formal.default.span,
        forward === formal.name
          ? `Default of parameter "${formal.name}" references itself.`
          : `Default of parameter "${formal.name}" references later parameter "${forward}".`,
      );
      return undefined;
    }

    const scope: EvalScope = { structs: options.structs, params };
    const value = evaluate(formal.default, scope, diagnostics, type);
    if (!value) return undefined;
    const converted = coerceValue(value, type, options.structs);
    if (!converted) {
      diagAt(
        diagnostics,
        DiagnosticIds.ParameterTypeMismatch,
        formal.default.span,
        `Default of parameter "${formal.name}" of "${label}" expects ${formatType(type)}, got ${formatValue(value)}.`,
      );
      return undefined;
    }
    params.set(formal.name, converted);
  }

  return params;
}

/**
 * Evaluate the `.NAME(expr)` overrides of an instantiation in the caller's scope.
 *
 * Each value is evaluated with the matching formal's type as a hint so that array literals
 * (including `'{}`) take the declared element type. Type conformance is left to {@link bind}.
 */
export function evaluateOverrides(
  template: ComponentDeclNode,
  overrides: readonly ParamOverrideNode[],
  scope: EvalScope,
  diagnostics?: Diagnostic[],
): Map<string, Value> | undefined {
  const values = new Map<string, Value>();
  for (const ov of overrides) {
    if (values.has(ov.name)) {
      diagAt(
        diagnostics,
        DiagnosticIds.DuplicateName,
        ov.span,
        `Parameter "${ov.name}" is given more than once.`,
      );
      return undefined;
    }
    const formal = template.params.find((p) => p.name === ov.name);
    if (!formal) {
      diagAt(
        diagnostics,
        DiagnosticIds.UnknownParameter,
        ov.span,
        `Component "${templateLabel(template)}" has no parameter "${ov.name}".`,
      );
      return undefined;
    }
    const hint: ValueType | undefined = resolveTypeExpr(
      formal.typeExpr,
      (n) => scope.structs.has(n),
    );
    const value = evaluate(ov.value, scope, diagnostics, hint);
    if (!value) return undefined;
    values.set(ov.name, value);
  }
  return values;
}
