import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import type { RootItemNode } from '../src/frontend/ast.js';
import { builtinPropertyTypes } from '../src/semantics/builtinProperties.js';
import { buildEnv } from '../src/semantics/env.js';
import { STRING } from '../src/semantics/values.js';
import { component, inst, program, propertyDecl, span, structDecl } from './helpers/ast.js';

function envOf(...items: RootItemNode[]) {
  const diagnostics: Diagnostic[] = [];
  const env = buildEnv(program(...items), diagnostics);
  return { env, diagnostics, errors: diagnostics.map((d) => [d.id, d.message]) };
}

describe('builtinPropertyTypes', () => {
  it('loads the built-in table once', () => {
    const table = builtinPropertyTypes();
    expect(table.size).toBe(79);
    expect(builtinPropertyTypes()).toBe(table);
    const slice = table.get('hdl_path_slice');
    expect(slice?.types).toEqual([{ kind: 'Array', element: STRING }]);
    expect([...(slice?.components ?? [])]).toEqual(['field', 'mem']);
    expect(table.get('name')?.components.size).toBe(6);
  });
});

describe('buildEnv', () => {
  it('collects root-scope declarations', () => {
    const { env, diagnostics } = envOf(
      structDecl('s_t', { a: 'longint' }),
      propertyDecl('p_reg', 'longint', ['reg']),
      component('addrmap', 'map_t', [], []),
      inst('map_t', 'chip'),
    );
    expect(diagnostics).toEqual([]);
    expect([...env.structs.keys()]).toEqual(['s_t']);
    expect([...env.components.keys()]).toEqual(['map_t']);
    expect(env.roots.map((r) => r.name)).toEqual(['chip']);
    expect(env.properties.has('desc')).toBe(true);
    expect([...(env.properties.get('p_reg')?.components ?? [])]).toEqual(['reg']);
  });

  it('shares one namespace between structs and components', () => {
    expect(
      envOf(structDecl('x_t', { a: 'longint' }), component('reg', 'x_t', [], [])).errors,
    ).toEqual([[DiagnosticIds.DuplicateName, 'Name "x_t" collides with struct "x_t".']]);
    expect(
      envOf(component('reg', 'r', [], []), component('addrmap', 'r', [], [])).errors,
    ).toEqual([[DiagnosticIds.DuplicateName, 'Name "r" collides with reg "r".']]);
  });

  it('rejects anonymous root-scope definitions', () => {
    expect(envOf(component('reg', undefined, [], [])).errors).toEqual([
      [
        DiagnosticIds.DeclarationError,
        'Anonymous component definitions are only allowed as part of an instantiation.',
      ],
    ]);
  });

  it('protects built-in and already-defined properties', () => {
    expect(envOf(propertyDecl('desc', 'string')).errors).toEqual([
      [DiagnosticIds.DuplicateName, 'Property "desc" is a built-in property and cannot be redefined.'],
    ]);
    expect(envOf(propertyDecl('p', 'string'), propertyDecl('p', 'longint')).errors).toEqual([
      [DiagnosticIds.DuplicateName, 'Property "p" is already defined.'],
    ]);
  });

  it('diagnoses property types that do not resolve', () => {
    const { env, errors } = envOf(propertyDecl('p', 'nope_t'));
    expect(errors).toEqual([[DiagnosticIds.UndefinedReference, 'Unknown type "nope_t".']]);
    expect(env.properties.has('p')).toBe(false);
  });

  it('reports a program without files', () => {
    const diagnostics: Diagnostic[] = [];
    buildEnv({ kind: 'Program', span, entryFile: 'empty.rdl', files: [] }, diagnostics);
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.DeclarationError,
        severity: 'error',
        message: 'No source files to elaborate.',
        file: 'empty.rdl',
      },
    ]);
  });
});

describe('DiagnosticIds', () => {
  it('only lists classified elaboration errors', () => {
    const ids: string[] = Object.values(DiagnosticIds);
    expect(ids).not.toContain('RDL000');
    expect(ids.filter((id) => !/^RDL[1-4]\d\d$/.test(id))).toEqual([]);
    expect(new Set(ids).size).toBe(ids.length);
  });
});
