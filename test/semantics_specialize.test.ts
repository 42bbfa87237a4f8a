import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import type { RootItemNode } from '../src/frontend/ast.js';
import { buildEnv } from '../src/semantics/env.js';
import { createSpecializer } from '../src/semantics/specialize.js';
import type { Value } from '../src/semantics/values.js';
import {
  STRING,
  arrayValue,
  boolValue,
  enumValue,
  intValue,
  refValue,
  stringValue,
} from '../src/semantics/values.js';
import {
  arrayLit,
  arrayOf,
  assign,
  binary,
  bool,
  component,
  enumLit,
  inst,
  int,
  param,
  program,
  propertyDecl,
  ref,
  str,
  structDecl,
  structLit,
  unary,
} from './helpers/ast.js';

function setup(...items: RootItemNode[]) {
  const envDiagnostics: Diagnostic[] = [];
  const env = buildEnv(program(...items), envDiagnostics);
  if (envDiagnostics.length > 0) throw new Error(envDiagnostics[0]?.message);
  const specializer = createSpecializer(env);
  const run = (name: string, params: ReadonlyMap<string, Value> = new Map()) => {
    const template = env.components.get(name);
    if (!template) throw new Error(`no template ${name}`);
    const diagnostics: Diagnostic[] = [];
    return { component: specializer.specialize(template, params, diagnostics), diagnostics };
  };
  const errors = (name: string) => run(name).diagnostics.map((d) => [d.id, d.message]);
  return { specializer, run, errors };
}

const sizedReg = component(
  'reg',
  'r_t',
  [param('SIZE', 'longint', int(32))],
  [assign('regwidth', ref('SIZE'))],
);
const anonField = () => component('field', undefined, [], []);

describe('specialization cache', () => {
  it('shares one specialization between structurally equal environments', () => {
    const { specializer, run } = setup(
      sizedReg,
      component('addrmap', 'top', [], [
        inst('r_t', 'a', { overrides: { SIZE: int(16) } }),
        inst('r_t', 'b', { overrides: { SIZE: binary('+', int(8), int(8)) } }),
        inst('r_t', 'c'),
      ]),
    );
    const first = run('top');
    expect(first.diagnostics).toEqual([]);
    const [a, b, c] = first.component?.children ?? [];
    expect(a?.component).toBe(b?.component);
    expect(c?.component).not.toBe(a?.component);
    expect(a?.component.properties.get('regwidth')).toEqual(intValue(16));
    expect(c?.component.properties.get('regwidth')).toEqual(intValue(32));
    expect(specializer.cacheSize()).toBe(3);

    expect(run('top').component).toBe(first.component);
    expect(specializer.cacheSize()).toBe(3);
  });

  it('keys struct overrides by value, not by literal field order', () => {
    const s1 = (order: 'a' | 'b') =>
      order === 'a'
        ? structLit('s1_t', { bool: bool(true), str: str('x'), n_arr: arrayLit(int(1)) })
        : structLit('s1_t', { n_arr: arrayLit(int(1)), bool: int(1), str: str('x') });
    const { run } = setup(
      structDecl('s1_t', { bool: 'boolean', str: 'string', n_arr: arrayOf('longint') }),
      component('reg', 's_t', [param('S', 's1_t')], []),
      component('addrmap', 'top', [], [
        inst('s_t', 'a', { overrides: { S: s1('a') } }),
        inst('s_t', 'b', { overrides: { S: s1('b') } }),
      ]),
    );
    const [a, b] = run('top').component?.children ?? [];
    expect(a?.component).toBeDefined();
    expect(a?.component).toBe(b?.component);
  });

  it('does not cache failed specializations', () => {
    const { specializer, errors } = setup(
      component('reg', 'bad_t', [], [assign('regwidth', str('x'))]),
    );
    expect(errors('bad_t')).toHaveLength(1);
    expect(errors('bad_t')).toHaveLength(1);
    expect(specializer.cacheSize()).toBe(0);
  });
});

describe('property assignment', () => {
  const { run, errors } = setup(
    propertyDecl('p_int', 'longint', 'all', int(5)),
    propertyDecl('p_str', 'string'),
    component('reg', 'props_t', [], [
      assign('desc', str('a')),
      assign('desc', str('b')),
      assign('shared'),
      assign('p_int'),
      inst(anonField(), 'f'),
      assign('hdl_path_slice', arrayLit(), ['f']),
    ]),
    component('reg', 'bad_prop', [], [assign('bogus', int(1))]),
    component('field', 'bad_kind', [], [assign('regwidth', int(8))]),
    component('reg', 'bad_type', [], [assign('regwidth', str('x'))]),
    component('field', 'bad_reset', [], [assign('reset', str('x'))]),
    component('reg', 'no_value', [], [assign('p_str')]),
    component('reg', 'early_t', [], [
      assign('sw', enumLit('accesstype', 'r'), ['f']),
      inst(anonField(), 'f'),
    ]),
  );

  it('keeps the last assignment and fills shorthand values', () => {
    const { component: c, diagnostics } = run('props_t');
    expect(diagnostics).toEqual([]);
    expect(c?.properties.get('desc')).toEqual(stringValue('b'));
    expect(c?.properties.get('shared')).toEqual(boolValue(true));
    expect(c?.properties.get('p_int')).toEqual(intValue(5));
    expect(c?.dynamicAssignments.get('f')?.get('hdl_path_slice')).toEqual(arrayValue(STRING, []));
  });

  it('rejects unknown and inapplicable properties', () => {
    expect(errors('bad_prop')).toEqual([
      [DiagnosticIds.UnknownProperty, 'Unknown property "bogus".'],
    ]);
    expect(errors('bad_kind')).toEqual([
      [DiagnosticIds.UnknownProperty, 'Property "regwidth" does not apply to field components.'],
    ]);
  });

  it('rejects values of the wrong type', () => {
    expect(errors('bad_type')).toEqual([
      [DiagnosticIds.PropertyTypeMismatch, 'Property "regwidth" expects longint, got "x".'],
    ]);
    expect(errors('bad_reset')).toEqual([
      [DiagnosticIds.PropertyTypeMismatch, 'Property "reset" expects longint or ref, got "x".'],
    ]);
    expect(errors('no_value')).toEqual([
      [DiagnosticIds.PropertyTypeMismatch, 'Property "p_str" needs a value.'],
    ]);
  });

  it('requires dynamic targets to be declared first', () => {
    expect(errors('early_t')).toEqual([
      [
        DiagnosticIds.UndefinedReference,
        '"f" does not name an instance declared before this assignment.',
      ],
    ]);
  });
});

describe('dynamic assignment', () => {
  const { run } = setup(
    component('reg', 'dyn_t', [], [
      inst(component('signal', undefined, [], []), 's'),
      inst(anonField(), 'f'),
      assign('resetsignal', ref('s'), ['f']),
      assign('sw', enumLit('accesstype', 'r'), ['f']),
    ]),
    component('addrmap', 'deep', [], [
      inst('dyn_t', 'r'),
      assign('sw', enumLit('accesstype', 'w'), ['r', 'f']),
    ]),
  );

  it('records targeted assignments on the assigning component', () => {
    const { component: c, diagnostics } = run('dyn_t');
    expect(diagnostics).toEqual([]);
    expect(c?.properties.size).toBe(0);
    expect(c?.dynamicAssignments.get('f')).toEqual(
      new Map<string, Value>([
        ['resetsignal', refValue(['s'])],
        ['sw', enumValue('accesstype', 'r')],
      ]),
    );
    expect(c?.children[1]?.component.properties.size).toBe(0);
  });

  it('leaves the shared child definition untouched', () => {
    const reg = run('dyn_t').component;
    const top = run('deep').component;
    expect(top?.children[0]?.component).toBe(reg);
    expect(top?.dynamicAssignments.get('r.f')?.get('sw')).toEqual(enumValue('accesstype', 'w'));
    expect(reg?.dynamicAssignments.get('f')?.get('sw')).toEqual(enumValue('accesstype', 'r'));
  });
});

describe('instantiation', () => {
  const { run, errors } = setup(
    sizedReg,
    component('addrmap', 'a_map', [], [inst('b_map', 'x')]),
    component('addrmap', 'b_map', [], [inst('a_map', 'y')]),
    component('addrmap', 'self_map', [], [inst('self_map', 'x')]),
    component('addrmap', 'outer_t', [param('W', 'longint', int(8))], [
      component('reg', 'inner_t', [], [assign('regwidth', ref('W'))]),
      inst('inner_t', 'r'),
    ]),
    component('addrmap', 'other', [], [inst('inner_t', 'r')]),
    component('addrmap', 'dup_inst', [], [inst('r_t', 'a'), inst('r_t', 'a')]),
    component('addrmap', 'dup_def', [], [
      component('reg', 'x', [], []),
      component('reg', 'x', [], []),
    ]),
    component('addrmap', 'anon_def', [], [component('reg', undefined, [], [])]),
    component('addrmap', 'arr', [], [
      inst('r_t', 'a', { extent: binary('*', int(2), int(2)) }),
    ]),
    component('addrmap', 'bad_extent', [], [inst('r_t', 'a', { extent: str('x') })]),
    component('addrmap', 'neg_extent', [], [inst('r_t', 'a', { extent: unary('-', int(1)) })]),
    component('addrmap', 'huge_extent', [], [inst('r_t', 'a', { extent: int(1e12) })]),
  );

  it('reports instantiation cycles with their chain', () => {
    expect(errors('a_map')).toEqual([
      [
        DiagnosticIds.InstantiationCycle,
        'Component "a_map" instantiates itself: a_map -> b_map -> a_map.',
      ],
    ]);
    expect(errors('self_map')).toEqual([
      [
        DiagnosticIds.InstantiationCycle,
        'Component "self_map" instantiates itself: self_map -> self_map.',
      ],
    ]);
  });

  it('lets nested definitions read the enclosing parameters', () => {
    const w8 = run('outer_t', new Map([['W', intValue(8)]])).component;
    const w16 = run('outer_t', new Map([['W', intValue(16)]])).component;
    expect(w8?.children[0]?.component.properties.get('regwidth')).toEqual(intValue(8));
    expect(w16?.children[0]?.component.properties.get('regwidth')).toEqual(intValue(16));
    expect(w16?.children[0]?.component).not.toBe(w8?.children[0]?.component);
  });

  it('keeps nested definitions out of other scopes', () => {
    expect(errors('other')).toEqual([
      [DiagnosticIds.UndefinedReference, 'Unknown component type "inner_t".'],
    ]);
  });

  it('rejects duplicate instance and definition names', () => {
    expect(errors('dup_inst')).toEqual([
      [DiagnosticIds.DuplicateName, 'Instance "a" is declared more than once in "dup_inst".'],
    ]);
    expect(errors('dup_def')).toEqual([
      [DiagnosticIds.DuplicateName, 'Component "x" is defined more than once in "dup_def".'],
    ]);
    expect(errors('anon_def').map(([id]) => id)).toEqual([DiagnosticIds.DeclarationError]);
  });

  it('evaluates array extents in the body scope', () => {
    expect(run('arr').component?.children[0]?.extent).toBe(4);
    expect(errors('bad_extent')).toEqual([
      [DiagnosticIds.InvalidExtent, 'Instance array extent must be an integer, got "x".'],
    ]);
  });

  it('reports negative and oversized extents', () => {
    expect(errors('neg_extent')).toEqual([
      [DiagnosticIds.InvalidExtent, 'Instance array extent -1 is negative.'],
    ]);
    expect(errors('huge_extent')).toEqual([
      [
        DiagnosticIds.InvalidExtent,
        'Instance array extent 1000000000000 exceeds the limit of 1048576.',
      ],
    ]);
  });
});

describe('reference parameters', () => {
  const signal = () => component('signal', undefined, [], []);
  const holder = (name: string, sig: string) =>
    component('addrmap', name, [], [
      inst(signal(), sig),
      inst('rp_t', 'r', { overrides: { R: ref(sig) } }),
    ]);
  const { run } = setup(
    component('reg', 'rp_t', [param('R', 'ref')], [
      inst(anonField(), 'f'),
      assign('resetsignal', ref('R'), ['f']),
    ]),
    holder('hold_s', 's'),
    holder('hold_s2', 's'),
    holder('hold_t', 't'),
  );

  it('passes references one level up into the child', () => {
    const { component: c, diagnostics } = run('hold_s');
    expect(diagnostics).toEqual([]);
    const rp = c?.children[1]?.component;
    expect(rp?.parameters.get('R')).toEqual(refValue(['s'], 1));
    expect(rp?.dynamicAssignments.get('f')?.get('resetsignal')).toEqual(refValue(['s'], 1));
  });

  it('shares a specialization only when the reference means the same relative instance', () => {
    const s = run('hold_s').component?.children[1]?.component;
    expect(run('hold_s2').component?.children[1]?.component).toBe(s);
    expect(run('hold_t').component?.children[1]?.component).not.toBe(s);
  });
});
