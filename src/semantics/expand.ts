import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { diagAt } from '../diagnostics/report.js';
import type { ComponentKind, SourceSpan } from '../frontend/ast.js';
import type { SpecializedComponent } from './specialize.js';
import type { Value } from './values.js';
import { formatValue } from './values.js';

/**
 * One placement of a specialized component in the elaborated tree.
 */
export interface Instance {
  readonly name: string;
  readonly kind: ComponentKind;
  readonly typeName: string | undefined;
  /** Position inside an instance array; absent for a single instance. */
  readonly ordinal: number | undefined;
  readonly definition: SpecializedComponent;
  /**
   * Effective properties: the definition's own, overridden by ancestors' dynamic assignments.
   * References in them are paths from the root.
   */
  readonly properties: ReadonlyMap<string, Value>;
  readonly children: readonly Instance[];
}

/**
 * Per-element callbacks receive the element's ordinal (`undefined` for a single instance).
 */
export interface InstancePlacement {
  name: string;
  properties: (ordinal: number | undefined) => ReadonlyMap<string, Value>;
  /** Builds the children of one placed element; called once per element. */
  children: (ordinal: number | undefined) => readonly Instance[] | undefined;
  span?: SourceSpan;
}

/** Largest instance array the expander will place. */
export const MAX_EXTENT = 1 << 20;

function extentError(extent: number | bigint): string | undefined {
  if (extent < 0) return `Instance array extent ${extent} is negative.`;
  if (extent > MAX_EXTENT) {
    return `Instance array extent ${extent} exceeds the limit of ${MAX_EXTENT}.`;
  }
  return undefined;
}

/**
 * Validate an evaluated instance-array extent.
 *
 * @returns the extent as a JS number, or `undefined` after pushing a diagnostic.
 */
export function checkExtent(
  value: Value,
  span: SourceSpan,
  diagnostics?: Diagnostic[],
): number | undefined {
  if (value.kind !== 'Int') {
    diagAt(
      diagnostics,
      DiagnosticIds.InvalidExtent,
      span,
      `Instance array extent must be an integer, got ${formatValue(value)}.`,
    );
    return undefined;
  }
  // Integers are unsigned 64-bit, so a negative source extent arrives with bit 63 set.
  const message = extentError(BigInt.asIntN(64, value.value));
  if (message) {
    diagAt(diagnostics, DiagnosticIds.InvalidExtent, span, message);
    return undefined;
  }
  return Number(value.value);
}

/**
 * Expand a specialized component into its placed instances.
 *
 * An extent of `k` yields `k` instances with ordinals `0..k-1`; no extent yields one instance
 * without an ordinal. Every instance shares `specialized` as its definition.
 */
export function expand(
  specialized: SpecializedComponent,
  extent: number | undefined,
  placement: InstancePlacement,
  diagnostics?: Diagnostic[],
): Instance[] | undefined {
  if (extent !== undefined) {
    const message = Number.isInteger(extent)
      ? extentError(extent)
      : `Instance array extent ${extent} is not a valid array size.`;
    if (message) {
      diagAt(
        diagnostics,
        DiagnosticIds.InvalidExtent,
        placement.span ?? specialized.template.span,
        message,
      );
      return undefined;
    }
  }

  const place = (ordinal: number | undefined): Instance | undefined => {
    const children = placement.children(ordinal);
    if (!children) return undefined;
    return {
      name: placement.name,
      kind: specialized.kind,
      typeName: specialized.typeName,
      ordinal,
      definition: specialized,
      properties: placement.properties(ordinal),
      children,
    };
  };

  if (extent === undefined) {
    const single = place(undefined);
    return single ? [single] : undefined;
  }

  const instances: Instance[] = [];
  for (let ordinal = 0; ordinal < extent; ordinal++) {
    const instance = place(ordinal);
    if (!instance) return undefined;
    instances.push(instance);
  }
  return instances;
}
