export { Interpreter, InterpreterOptions } from './runtime/interpreter';
export { Environment } from './runtime/environment';
export { LispError, LispErrorType, isLispError } from './runtime/errors';
export { SpecialForm, SPECIAL_FORMS, lookupSpecialForm } from './runtime/special-forms';
export {
  Expr,
  NumberExpr,
  SymbolExpr,
  PairExpr,
  NilExpr,
  ClosureExpr,
  BuiltinExpr,
  UnspecifiedExpr,
  NativeProcedure,
  ProcedureContext,
  NIL,
  UNSPECIFIED,
  number,
  symbol,
  cons,
  list,
  closure,
  builtin,
  bool,
  car,
  cdr,
  listToArray,
  isProcedure,
  isTruthy,
  exprToString,
  exprsEqual,
} from './runtime/values';
export { BUILTIN_PROCEDURES, installBuiltins, describeBuiltin } from './runtime/builtins';
export { LispPlugin } from './runtime/plugin';
export { LispConfig, loadConfig, loadConfigFrom, interpreterOptionsFromConfig } from './runtime/config';

import { Environment } from './runtime/environment';
import { Interpreter } from './runtime/interpreter';
import { Expr } from './runtime/values';

let defaultInterpreter: Interpreter | null = null;

function getDefaultInterpreter(): Interpreter {
  if (!defaultInterpreter) {
    defaultInterpreter = new Interpreter();
  }
  return defaultInterpreter;
}

/**
 * Create an environment. Without a parent this is a fresh root frame with
 * the builtins installed; with one it is an empty child frame.
 */
export function createEnv(parent?: Environment | null): Environment {
  return parent ? parent.child() : Environment.createGlobal();
}

export function envSet(env: Environment, name: string, value: Expr): void {
  env.set(name, value);
}

export function envGet(env: Environment, name: string): Expr {
  return env.get(name);
}

export function envMutate(env: Environment, name: string, value: Expr): void {
  env.mutate(name, value);
}

/**
 * Evaluate an expression in the given environment with default
 * interpreter options.
 */
export function evaluate(expr: Expr, env: Environment): Expr {
  return getDefaultInterpreter().evaluate(expr, env);
}

/**
 * Apply a procedure value to already-evaluated arguments.
 */
export function apply(proc: Expr, args: Expr[], env: Environment): Expr {
  return getDefaultInterpreter().apply(proc, args, env);
}
