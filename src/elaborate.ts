import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import { diagAt, hasErrors } from './diagnostics/report.js';
import type { ComponentDeclNode, InstanceNode } from './frontend/ast.js';
import type { ElaborateFn, ElaborateOptions, ElaborateResult } from './pipeline.js';
import { evaluateOverrides } from './semantics/bind.js';
import type { ElabEnv } from './semantics/env.js';
import { buildEnv } from './semantics/env.js';
import type { Specializer } from './semantics/specialize.js';
import { createSpecializer } from './semantics/specialize.js';
import type { ElaboratedTree } from './semantics/tree.js';
import { buildTree } from './semantics/tree.js';

type TopSite =
  | { kind: 'instance'; node: InstanceNode }
  | { kind: 'definition'; template: ComponentDeclNode };

function selectSites(
  env: ElabEnv,
  options: ElaborateOptions,
  entryFile: string,
  diagnostics: Diagnostic[],
): TopSite[] {
  if (options.top !== undefined) {
    const byInstance = env.roots.find((r) => r.name === options.top);
    if (byInstance) return [{ kind: 'instance', node: byInstance }];
    const template = env.components.get(options.top);
    if (template) return [{ kind: 'definition', template }];
    diagnostics.push({
      id: DiagnosticIds.UndefinedReference,
      severity: 'error',
      message: `Top-level address map "${options.top}" not found.`,
      file: entryFile,
    });
    return [];
  }

  if (env.roots.length > 0) {
    return env.roots.map((node): TopSite => ({ kind: 'instance', node }));
  }

  const addrmaps = [...env.components.values()].filter((c) => c.componentKind === 'addrmap');
  const last = addrmaps[addrmaps.length - 1];
  if (!last) {
    diagnostics.push({
      id: DiagnosticIds.DeclarationError,
      severity: 'error',
      message: 'No addrmap definition to elaborate.',
      file: entryFile,
    });
    return [];
  }
  return [{ kind: 'definition', template: last }];
}

function elaborateSite(
  site: TopSite,
  env: ElabEnv,
  specializer: Specializer,
  options: ElaborateOptions,
  diagnostics: Diagnostic[],
): ElaboratedTree | undefined {
  if (site.kind === 'definition') {
    return buildTree(
      site.template,
      new Map(Object.entries(options.parameters ?? {})),
      { env, specializer },
      diagnostics,
    );
  }

  const node = site.node;
  let template: ComponentDeclNode | undefined;
  if (node.component.kind === 'ComponentDecl') {
    template = node.component;
  } else {
    template = env.components.get(node.component.name);
    if (!template) {
      diagAt(
        diagnostics,
        DiagnosticIds.UndefinedReference,
        node.component.span,
        `Unknown component type "${node.component.name}".`,
      );
      return undefined;
    }
  }
  if (node.extent) {
    diagAt(
      diagnostics,
      DiagnosticIds.InvalidExtent,
      node.extent.span,
      `Top-level instance "${node.name}" cannot be an instance array.`,
    );
    return undefined;
  }

  const overrides = evaluateOverrides(
    template,
    node.overrides,
    { structs: env.structs, params: new Map() },
    diagnostics,
  );
  if (!overrides) return undefined;
  return buildTree(
    template,
    overrides,
    { env, specializer, name: node.name, site: node.span },
    diagnostics,
  );
}

/**
 * Elaborate a parsed program into instance trees.
 *
 * Implementation note:
 * - Declarations are collected once into a read-only env shared by every site.
 * - All sites share one specializer, so equal specializations are built once per run.
 * - A failing site stops the run unless `continueOnError` is set.
 */
export const elaborate: ElaborateFn = (program, options = {}): ElaborateResult => {
  const diagnostics: Diagnostic[] = [];
  const env = buildEnv(program, diagnostics);
  if (hasErrors(diagnostics)) {
    return { diagnostics, trees: [] };
  }

  const sites = selectSites(env, options, program.entryFile, diagnostics);
  const specializer = createSpecializer(env);
  const trees: ElaboratedTree[] = [];

  for (const site of sites) {
    const tree = elaborateSite(site, env, specializer, options, diagnostics);
    if (tree) {
      trees.push(tree);
    } else if (options.continueOnError !== true) {
      break;
    }
  }

  return { diagnostics, trees };
};
