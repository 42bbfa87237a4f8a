import type { ExprNode, ProgramNode } from '../../src/frontend/ast.js';
import {
  arrayLit,
  arrayOf,
  assign,
  bool,
  component,
  index,
  inst,
  int,
  member,
  param,
  program,
  propertyDecl,
  ref,
  str,
  structDecl,
  structLit,
} from './ast.js';

/**
 * Parameterized register with scalar and string-array parameters:
 *
 * ```
 * reg myReg #(longint SIZE = 32, boolean SHARED = true, string FIELD_SLICES[] = '{"data_q"}) {
 *   regwidth = SIZE;
 *   shared = SHARED;
 *   field {} data;
 *   data->hdl_path_slice = FIELD_SLICES;
 * };
 * addrmap params_top {
 *   myReg r_default;
 *   myReg #(.SIZE(16)) r_16;
 *   myReg #(.SIZE(8), .SHARED(false)) r_8;
 *   myReg #(.SIZE(16)) r_arr[4];
 * };
 * ```
 */
export function scalarParamsProgram(): ProgramNode {
  const myReg = component(
    'reg',
    'myReg',
    [
      param('SIZE', 'longint', int(32)),
      param('SHARED', 'boolean', bool(true)),
      param('FIELD_SLICES', arrayOf('string'), arrayLit(str('data_q'))),
    ],
    [
      assign('regwidth', ref('SIZE')),
      assign('shared', ref('SHARED')),
      inst(component('field', undefined, [], []), 'data'),
      assign('hdl_path_slice', ref('FIELD_SLICES'), ['data']),
    ],
  );
  const top = component(
    'addrmap',
    'params_top',
    [],
    [
      inst('myReg', 'r_default'),
      inst('myReg', 'r_16', { overrides: { SIZE: int(16) } }),
      inst('myReg', 'r_8', { overrides: { SIZE: int(8), SHARED: bool(false) } }),
      inst('myReg', 'r_arr', { overrides: { SIZE: int(16) }, extent: 4 }),
    ],
  );
  return program(myReg, top);
}

const s1 = (flag: boolean, text: string, nArr: number[]): ExprNode =>
  structLit('s1_t', {
    bool: bool(flag),
    str: str(text),
    n_arr: arrayLit(...nArr.map((n) => int(n))),
  });

/**
 * `s2_t` literal used by the struct-parameter program:
 * `nest.str = "hey"`, `nest_arr[0].str = "foo"`, `nest_arr[1].n_arr[2] = 61`.
 */
export const nestedLiteral: ExprNode = structLit('s2_t', {
  nest: s1(true, 'hey', [1, 2]),
  nest_arr: arrayLit(s1(false, 'foo', []), s1(true, 'bar', [59, 60, 61])),
});

/**
 * Struct-typed parameter whose fields feed properties through member and index access:
 *
 * ```
 * struct s1_t { boolean bool; string str; longint n_arr[]; };
 * struct s2_t { s1_t nest; s1_t nest_arr[]; };
 * property p_int { type = longint; component = all; };
 * property p_bool { type = boolean; component = all; };
 * property p_s1 { type = s1_t; component = all; };
 * reg my_reg_t #(s2_t S = s2_t'{nest: s1_t'{bool: false, str: "", n_arr: '{}}, nest_arr: '{}}) {
 *   desc = S.nest.str;
 *   name = S.nest_arr[0].str;
 *   p_int = S.nest_arr[1].n_arr[2];
 *   p_bool = S.nest.bool;
 *   p_s1 = S.nest;
 *   field {} f;
 * };
 * addrmap struct_top { my_reg_t #(.S(<nestedLiteral>)) r1; };
 * ```
 */
export function structParamsProgram(): ProgramNode {
  const myRegT = component(
    'reg',
    'my_reg_t',
    [
      param(
        'S',
        's2_t',
        structLit('s2_t', { nest: s1(false, '', []), nest_arr: arrayLit() }),
      ),
    ],
    [
      assign('desc', member(member(ref('S'), 'nest'), 'str')),
      assign('name', member(index(member(ref('S'), 'nest_arr'), 0), 'str')),
      assign('p_int', index(member(index(member(ref('S'), 'nest_arr'), 1), 'n_arr'), 2)),
      assign('p_bool', member(member(ref('S'), 'nest'), 'bool')),
      assign('p_s1', member(ref('S'), 'nest')),
      inst(component('field', undefined, [], []), 'f'),
    ],
  );
  const top = component(
    'addrmap',
    'struct_top',
    [],
    [inst('my_reg_t', 'r1', { overrides: { S: nestedLiteral } })],
  );
  return program(
    structDecl('s1_t', { bool: 'boolean', str: 'string', n_arr: arrayOf('longint') }),
    structDecl('s2_t', { nest: 's1_t', nest_arr: arrayOf('s1_t') }),
    propertyDecl('p_int', 'longint'),
    propertyDecl('p_bool', 'boolean'),
    propertyDecl('p_s1', 's1_t'),
    myRegT,
    top,
  );
}
