// src/types/emulator-types.ts

// !=============================================================================
// ! Definition file shapes (as read from JSON, before compilation)
// !=============================================================================

export type StateValue = number | string | boolean;

export interface IntegerVariableSource {
  type: 'integer';
  min?: number;
  max?: number;
  default?: number;
}

export interface EnumVariableSource {
  type: 'enum';
  values: string[];
  default?: string;
}

export interface BooleanVariableSource {
  type: 'boolean';
  default?: boolean;
  labels?: { true: string; false: string };
}

export type StateVariableSource = IntegerVariableSource | EnumVariableSource | BooleanVariableSource;

export interface IntegerParamSource {
  type: 'integer';
  min?: number;
  max?: number;
}

export interface EnumParamSource {
  type: 'enum';
  values: string[];
}

export interface BooleanParamSource {
  type: 'boolean';
  true?: string[];
  false?: string[];
}

export interface TextParamSource {
  type: 'text';
}

export type ParamSource = IntegerParamSource | EnumParamSource | BooleanParamSource | TextParamSource;

/** How a set command derives the value it writes into one state variable */
export type WriteBindingSource =
  | { param: string }
  | { value: StateValue }
  | { step: number }
  | { toggle: true };

export interface CommandSource {
  name: string;
  description?: string;
  pattern: string;
  params?: Record<string, ParamSource>;
  response?: string;
  error?: string;
  writes?: Record<string, WriteBindingSource>;
}

export interface ProtocolDefinitionSource {
  model: string;
  device?: { manufacturer?: string; model?: string; description?: string };
  connection?: { port?: number };
  framing?: { commandEol?: string; responseEol?: string; caseInsensitive?: boolean };
  unrecognized?: string;
  state: Record<string, StateVariableSource>;
  commands: CommandSource[];
}

// !=============================================================================
// ! Compiled definition model
// !=============================================================================

export interface IntegerVariableSpec {
  readonly name: string;
  readonly type: 'integer';
  readonly min?: number;
  readonly max?: number;
  readonly default: number;
}

export interface EnumVariableSpec {
  readonly name: string;
  readonly type: 'enum';
  readonly values: readonly string[];
  readonly default: string;
}

export interface BooleanVariableSpec {
  readonly name: string;
  readonly type: 'boolean';
  readonly default: boolean;
  readonly labels: { readonly true: string; readonly false: string };
}

export type StateVariableSpec = IntegerVariableSpec | EnumVariableSpec | BooleanVariableSpec;

export type ParamType = 'integer' | 'enum' | 'boolean' | 'text';

export interface IntegerParamSpec {
  readonly name: string;
  readonly type: 'integer';
  readonly min?: number;
  readonly max?: number;
}

export interface EnumParamSpec {
  readonly name: string;
  readonly type: 'enum';
  readonly values: readonly string[];
}

export interface BooleanParamSpec {
  readonly name: string;
  readonly type: 'boolean';
  readonly trueValues: readonly string[];
  readonly falseValues: readonly string[];
}

export interface TextParamSpec {
  readonly name: string;
  readonly type: 'text';
}

export type ParamSpec = IntegerParamSpec | EnumParamSpec | BooleanParamSpec | TextParamSpec;

/** A pattern compiled to an anchored expression; capture groups follow `slots` order. */
export interface CompiledPattern {
  readonly source: string;
  readonly regex: RegExp;
  readonly slots: readonly string[];
}

export interface IntegerFormat {
  readonly sign: boolean;
  readonly zeroPad: boolean;
  readonly width: number;
}

export type TemplateSegment =
  | { readonly kind: 'literal'; readonly text: string }
  | { readonly kind: 'param'; readonly name: string; readonly format: IntegerFormat | null }
  | { readonly kind: 'state'; readonly name: string; readonly format: IntegerFormat | null };

export interface CompiledTemplate {
  readonly source: string;
  readonly segments: readonly TemplateSegment[];
}

export type WriteBinding =
  | { readonly variable: string; readonly kind: 'param'; readonly param: string }
  | { readonly variable: string; readonly kind: 'constant'; readonly value: StateValue }
  | { readonly variable: string; readonly kind: 'step'; readonly delta: number }
  | { readonly variable: string; readonly kind: 'toggle' };

export type CommandKind = 'query' | 'set';

export interface CommandSpec {
  readonly name: string;
  readonly description: string;
  readonly kind: CommandKind;
  readonly pattern: CompiledPattern;
  readonly params: ReadonlyMap<string, ParamSpec>;
  readonly response: CompiledTemplate | null;
  readonly error: CompiledTemplate | null;
  /** State variables the response template reads */
  readonly reads: readonly string[];
  readonly writes: readonly WriteBinding[];
}

export interface DeviceInfo {
  readonly manufacturer: string;
  readonly model: string;
  readonly description: string;
}

export interface FramingSpec {
  readonly commandEol: string;
  readonly responseEol: string;
  readonly caseInsensitive: boolean;
}

// !=============================================================================
// ! Matching, state and engine results
// !=============================================================================

export interface MatchedParam {
  readonly value: StateValue;
  /** Token exactly as it appeared in the input line */
  readonly raw: string;
}

export type MatchResult =
  | {
      readonly matched: true;
      readonly command: CommandSpec;
      readonly params: ReadonlyMap<string, MatchedParam>;
    }
  | { readonly matched: false; readonly input: string };

export type OutOfRangePolicy = 'reject' | 'clamp';

export interface DeviceStateStoreOptions {
  outOfRange?: OutOfRangePolicy;
}

export type StateSnapshot = Record<string, StateValue>;

export type CommandOutcome = 'query' | 'set' | 'rejected' | 'unmatched' | 'failed';

export interface EngineResult {
  readonly input: string;
  readonly outcome: CommandOutcome;
  /** Name of the matched command, null when unmatched */
  readonly command: string | null;
  /** Response text without line terminator; null means no response is sent */
  readonly response: string | null;
}

// !=============================================================================
// ! Server and monitoring
// !=============================================================================

export interface EmulatorServerOptions extends DeviceStateStoreOptions {
  idleTimeout?: number;
  maxLineLength?: number;
}

export interface SessionOptions {
  responseEol: string;
  acceptBareCarriageReturn: boolean;
  maxLineLength: number;
  idleTimeout: number;
}

export interface CommandLogEntry {
  timestamp: Date;
  clientId: string;
  command: string;
  response: string;
  isError: boolean;
}

export interface ActivityStats {
  commands: number;
  connections: number;
  errors: number;
}

// !=============================================================================
// ! Logging
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Context attached to a log record */
export interface LogContext {
  logger?: string;
  clientId?: string;
  model?: string;
  command?: string;
  [key: string]: string | number | boolean | undefined;
}

export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  isLevelEnabled(lvl: LogLevel): boolean;
  setLevel(lvl: LogLevel | 'none'): void;
  pause(): void;
  resume(): void;
}
