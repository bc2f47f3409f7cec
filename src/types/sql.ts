export type Dialect = 'oracle' | 'mysql' | 'postgresql';

// Dialects a package or PL/SQL body can be lowered into
export type TargetDialect = Exclude<Dialect, 'oracle'>;

export const DIALECTS: readonly Dialect[] = ['oracle', 'mysql', 'postgresql'];

export type Severity = 'info' | 'warning' | 'error';

export const SEVERITY_RANK: Record<Severity, number> = {
  info: 0,
  warning: 1,
  error: 2
};

export type WarningKind =
  | 'unsupported-statement'
  | 'unsupported-function'
  | 'syntax-difference'
  | 'partial-support'
  | 'manual-review-needed';

export interface Warning {
  readonly kind: WarningKind;
  readonly message: string;
  readonly severity: Severity;
  readonly suggestion?: string;
}

export type AppliedRule = string;

export type ParameterMode = 'in' | 'out' | 'inout';

export interface RoutineParameter {
  name: string;
  mode: ParameterMode;
  type: string;
  defaultValue?: string;
}

export type RoutineKind = 'procedure' | 'function';

export interface RoutineSignature {
  name: string;
  kind: RoutineKind;
  parameters: RoutineParameter[];
  returnType?: string;
}

export type HandlerAction = 'exit' | 'continue';

export interface ExceptionHandler {
  sourceConditionName: string;
  targetCondition: string;
  body: string;
  action: HandlerAction;
}

export interface PackageConstant {
  name: string;
  type: string;
  value: string;
}

export interface PackageVariable {
  name: string;
  type: string;
  initialValue?: string;
}

export interface PackageType {
  name: string;
  definition: string;
}

export interface PackageRoutine {
  kind: RoutineKind;
  name: string;
  // Full source text from the kind keyword to the closing `END name;`
  definition?: string;
  header: string;
}

export interface PackageInfo {
  name: string;
  schema?: string;
  unit: 'specification' | 'body';
  constants: PackageConstant[];
  variables: PackageVariable[];
  types: PackageType[];
  routines: PackageRoutine[];
  // User-defined exceptions declared at package level
  exceptions: string[];
  initialization?: string;
}

export interface QualityScore {
  total: number;
  valid: number;
  score: number;
}

export interface ConversionResult {
  success: boolean;
  sql?: string;
  warnings: Warning[];
  appliedRules: AppliedRule[];
  errors?: string[];
  metadata?: {
    source: Dialect;
    target: Dialect;
    units: number;
    hoistedStatements: number;
    formatted: boolean;
    inputQuality?: QualityScore;
    outputQuality?: QualityScore;
  };
}

export type FailOn = Severity | 'never';

export interface ConversionOptions {
  format?: boolean;
  score?: boolean;
  failOn?: FailOn;
}
