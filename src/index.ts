export type { Diagnostic, DiagnosticId, DiagnosticSeverity } from './diagnostics/types.js';
export { DiagnosticIds } from './diagnostics/types.js';
export type * from './frontend/ast.js';
export { componentKinds } from './frontend/ast.js';
export type { ElaborateFn, ElaborateOptions, ElaborateResult } from './pipeline.js';
export { elaborate } from './elaborate.js';

export type { BindOptions } from './semantics/bind.js';
export { bind, evaluateOverrides } from './semantics/bind.js';
export type { PropertyType } from './semantics/builtinProperties.js';
export { builtinPropertyTypes } from './semantics/builtinProperties.js';
export type { ElabEnv } from './semantics/env.js';
export { buildEnv, emptyEnv } from './semantics/env.js';
export type { EvalScope, ParameterEnvironment } from './semantics/evaluate.js';
export { evaluate, referencedNames, selfWidth } from './semantics/evaluate.js';
export type { Instance, InstancePlacement } from './semantics/expand.js';
export { MAX_EXTENT, checkExtent, expand } from './semantics/expand.js';
export type {
  ChildSlot,
  DefinitionScope,
  SpecializedComponent,
  Specializer,
} from './semantics/specialize.js';
export { createSpecializer } from './semantics/specialize.js';
export type { BuildTreeOptions, ElaboratedTree } from './semantics/tree.js';
export { buildTree, findInstance } from './semantics/tree.js';
export type { StructField, StructType } from './semantics/types.js';
export { coerceValue, resolveTypeExpr } from './semantics/types.js';
export type { BuiltinEnumType, Value, ValueType } from './semantics/values.js';
export {
  arrayValue,
  boolValue,
  enumValue,
  formatType,
  formatValue,
  intValue,
  mapRefs,
  refValue,
  stringValue,
  structValue,
  valueKey,
  valuesEqual,
} from './semantics/values.js';
