import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { diagAt } from '../diagnostics/report.js';
import type {
  ComponentDeclNode,
  InstanceNode,
  ProgramNode,
  SourceSpan,
  StructDeclNode,
} from '../frontend/ast.js';
import { componentKinds } from '../frontend/ast.js';
import type { PropertyType } from './builtinProperties.js';
import { builtinPropertyTypes } from './builtinProperties.js';
import type { StructType } from './types.js';
import { resolveStructTypes, resolveTypeExpr } from './types.js';
import type { ValueType } from './values.js';

/**
 * Read-only declaration environment for one program: struct types, property types and
 * root-scope component templates.
 *
 * Built once by {@link buildEnv} and shared by every specialization afterwards.
 */
export interface ElabEnv {
  /** Map of struct name -> resolved struct type. */
  structs: Map<string, StructType>;

  /** Map of property name -> property type (built-in and user-declared). */
  properties: Map<string, PropertyType>;

  /**
   * Map of template name -> root-scope component definition.
   *
   * Insertion order is program order; the last `addrmap` is the default top.
   */
  components: Map<string, ComponentDeclNode>;

  /** Root-level instantiations, in program order. */
  roots: InstanceNode[];
}

/**
 * Environment with only the built-in properties; handy for evaluating free-standing expressions.
 */
export function emptyEnv(): ElabEnv {
  return {
    structs: new Map(),
    properties: new Map(builtinPropertyTypes()),
    components: new Map(),
    roots: [],
  };
}

/**
 * Build the declaration environment by collecting root-scope declarations across all files.
 *
 * Implementation note:
 * - Struct and component names share the type namespace; properties have their own.
 * - User properties may not redefine a built-in property.
 * - Declarations that fail to resolve are diagnosed and left out.
 */
export function buildEnv(program: ProgramNode, diagnostics: Diagnostic[]): ElabEnv {
  const env = emptyEnv();

  if (program.files.length === 0) {
    diagnostics.push({
      id: DiagnosticIds.DeclarationError,
      severity: 'error',
      message: 'No source files to elaborate.',
      file: program.entryFile,
    });
    return env;
  }

  const typeNames = new Map<string, { kind: string; span: SourceSpan }>();
  const claim = (kind: string, name: string, span: SourceSpan): boolean => {
    const prev = typeNames.get(name);
    if (prev) {
      diagAt(
        diagnostics,
        DiagnosticIds.DuplicateName,
        span,
        `Name "${name}" collides with ${prev.kind} "${name}".`,
      );
      return false;
    }
    typeNames.set(name, { kind, span });
    return true;
  };

  const structDecls = new Map<string, StructDeclNode>();
  for (const file of program.files) {
    for (const item of file.items) {
      if (item.kind === 'StructDecl') {
        if (claim('struct', item.name, item.span)) structDecls.set(item.name, item);
      } else if (item.kind === 'ComponentDecl') {
        if (item.name === undefined) {
          diagAt(
            diagnostics,
            DiagnosticIds.DeclarationError,
            item.span,
            'Anonymous component definitions are only allowed as part of an instantiation.',
          );
          continue;
        }
        if (claim(item.componentKind, item.name, item.span)) {
          env.components.set(item.name, item);
        }
      } else if (item.kind === 'Instance') {
        env.roots.push(item);
      }
    }
  }

  for (const [name, struct] of resolveStructTypes(structDecls, diagnostics)) {
    env.structs.set(name, struct);
  }

  for (const file of program.files) {
    for (const item of file.items) {
      if (item.kind !== 'PropertyDecl') continue;
      const prev = env.properties.get(item.name);
      if (prev) {
        diagAt(
          diagnostics,
          DiagnosticIds.DuplicateName,
          item.span,
          prev.builtin
            ? `Property "${item.name}" is a built-in property and cannot be redefined.`
            : `Property "${item.name}" is already defined.`,
        );
        continue;
      }
      const type: ValueType | undefined = resolveTypeExpr(
        item.typeExpr,
        (n) => env.structs.has(n),
        diagnostics,
      );
      if (!type) continue;
      env.properties.set(item.name, {
        name: item.name,
        types: [type],
        components: new Set(item.components === 'all' ? componentKinds : item.components),
        ...(item.default ? { default: item.default } : {}),
        builtin: false,
      });
    }
  }

  return env;
}
