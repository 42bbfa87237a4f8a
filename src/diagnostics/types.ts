/**
 * Severity level for a diagnostic. Elaboration reports errors only.
 */
export type DiagnosticSeverity = 'error';

/**
 * An elaboration error with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `RDL200`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
}

/**
 * Known diagnostic IDs.
 *
 * Numbering groups: 1xx declarations, 2xx expressions, 3xx parameters, 4xx properties and instances.
 */
export const DiagnosticIds = {
  /** Malformed declaration (unknown base struct, bad property type, no top addrmap, etc.). */
  DeclarationError: 'RDL100',

  /** Two declarations or two instances claim the same name in one scope. */
  DuplicateName: 'RDL101',

  /** A struct type contains itself, directly or through other structs. */
  RecursiveType: 'RDL102',

  /** Name, struct field or component type not found in scope. */
  UndefinedReference: 'RDL200',

  /** Operator, indexer or literal applied to an incompatible value. */
  TypeMismatch: 'RDL201',

  /** Array index outside `0..length-1`. */
  IndexOutOfBounds: 'RDL202',

  /** Struct literal with a missing, unknown or repeated field. */
  StructLiteralError: 'RDL203',

  /** Divide or modulo by zero. */
  DivideByZero: 'RDL204',

  /** Instantiation names a parameter the template does not declare. */
  UnknownParameter: 'RDL300',

  /** Parameter value does not conform to the formal's declared type. */
  ParameterTypeMismatch: 'RDL301',

  /** Parameter default references itself or a later parameter. */
  ForwardReference: 'RDL302',

  /** Parameter has neither an override nor a default. */
  MissingParameter: 'RDL303',

  /** No property of that name applies to the target's component kind. */
  UnknownProperty: 'RDL400',

  /** Assigned value does not conform to the property's declared type. */
  PropertyTypeMismatch: 'RDL401',

  /** Instance array extent is negative, not an integer, or above `MAX_EXTENT`. */
  InvalidExtent: 'RDL402',

  /** A template instantiates itself, directly or transitively. */
  InstantiationCycle: 'RDL403',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];
