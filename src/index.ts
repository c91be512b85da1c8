// Compiler
export {
  PathCompiler,
  createCompiler,
  defaultCompiler,
  compile,
} from "./compiler.ts";
export {
  STATIC_PREFIX,
  toStaticExpression,
  toNonStaticExpression,
} from "./expression-text.ts";

// Expressions and nodes
export { PathExpression } from "./path-expression.ts";
export {
  ExpressionNode,
  FieldNode,
  MethodNode,
  ArrayNode,
  type PathNode,
} from "./nodes.ts";

// Evaluation
export {
  getValue,
  setValue,
  getStaticValue,
  setStaticValue,
} from "./evaluate.ts";
export { getAll, setAll, type BulkOptions } from "./bulk.ts";

// Predicates
export {
  PathExpressionPredicate,
  ACCEPT_ALL,
  DENY_ALL,
  ROOT_OBJ_KEY,
  rootArgs,
} from "./predicate.ts";
export {
  UNDEFINED,
  unary,
  binary,
  isNull,
  isNotNull,
  isEqual,
  isNotEqual,
  isSame,
  isGreaterThan,
  isLessThan,
  isIn,
} from "./is.ts";
export type { IsTest, UndefinedTest, UnaryTest, BinaryTest } from "./is.ts";

// Decorators
export { field, method, named } from "./decorators.ts";

// Types and registries
export { ArrayType, arrayOf, typeName } from "./types.ts";
export type {
  Type,
  Constructor,
  Target,
  Args,
  Scope,
  CompilerOptions,
  EvaluateOptions,
  StaticEvaluateOptions,
} from "./types.ts";
export {
  TypeRegistry,
  UnknownTypeError,
  defaultTypeRegistry,
} from "./type-registry.ts";

// Instance factories
export {
  DelegatedInstanceFactory,
  createDefaultInstanceFactory,
  defaultInstanceFactory,
} from "./instance-factory.ts";
export type { InstanceFactory, Producer } from "./instance-factory.ts";

// Member resolution
export {
  DecoratorMemberResolver,
  defaultResolver,
  memberType,
} from "./resolve.ts";
export type {
  Member,
  FieldMember,
  MethodMember,
  MemberResolver,
} from "./resolve.ts";

// Formatting
export { formatValue, formatType, formatArgs } from "./format.ts";

// Errors
export {
  PathError,
  InvalidExpressionError,
  MissingArgumentError,
  UnsupportedWriteError,
  UnsupportedOperationError,
  InstantiationError,
  InvalidArgumentError,
  MemberNotFoundError,
} from "./errors.ts";

// Hooks
export type {
  CompileInfo,
  AutovivifyInfo,
  AbandonedWriteInfo,
  CompilerEvent,
  CompilerEventInfo,
  CompilerEventMap,
} from "./hooks.ts";
