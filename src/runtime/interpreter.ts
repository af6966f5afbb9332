import { Environment } from './environment';
import { LispError } from './errors';
import { LispPlugin } from './plugin';
import { SpecialForm } from './special-forms';
import {
  Expr,
  PairExpr,
  SymbolExpr,
  UNSPECIFIED,
  builtin,
  closure,
  exprToString,
  isProcedure,
  isTruthy,
} from './values';

export interface InterpreterOptions {
  trace?: boolean;
  /**
   * Deepest evaluate nesting allowed before RecursionDepthExceeded. Default 1000.
   * Each nested closure call costs two or three levels (the call form, its
   * body, and an enclosing form such as the if branch holding the next call),
   * so the default admits roughly 330 nested user-level calls. Raise it for deeper non-tail
   * recursion, keeping in mind that every level is also a host stack frame.
   */
  maxDepth?: number;
  /** Iteration cap for a single while loop. Unbounded by default. */
  maxIterations?: number;
  /** Extra native procedures bound into the global frame. */
  plugins?: LispPlugin[];
}

const DEFAULT_MAX_DEPTH = 1000;

/**
 * Tree-walking evaluator. Special forms are handled here; every other list
 * is a procedure call that goes through apply().
 *
 * Calls recurse on the host stack and there are no tail calls, so deep
 * user recursion is cut off at maxDepth with a LispError rather than a
 * host stack overflow. Loops belong in while.
 */
export class Interpreter {
  private globalEnv: Environment;
  private traceEnabled: boolean;
  private traceLog: string[] = [];
  private startTime = Date.now();
  private maxDepth: number;
  private maxIterations?: number;
  private depth = 0;

  constructor(options: InterpreterOptions = {}) {
    this.globalEnv = Environment.createGlobal();
    this.traceEnabled = options.trace ?? false;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.maxIterations = options.maxIterations;
    for (const plugin of options.plugins ?? []) {
      this.use(plugin);
    }
  }

  getGlobalEnv(): Environment {
    return this.globalEnv;
  }

  getTraceLog(): string[] {
    return [...this.traceLog];
  }

  /**
   * Bind a plugin's procedures into a frame (the global frame by default).
   */
  use(plugin: LispPlugin, env: Environment = this.globalEnv): void {
    const names = Object.keys(plugin.procedures);
    for (const name of names) {
      env.set(name, builtin(name, plugin.procedures[name]));
    }
    this.trace(`Plugin "${plugin.name}" installed (${names.length} procedures)`);
  }

  /**
   * Evaluate a top-level expression in the global frame.
   */
  run(expr: Expr): Expr {
    this.startTime = Date.now();
    this.depth = 0;
    return this.evaluate(expr, this.globalEnv);
  }

  evaluate(expr: Expr, env: Environment): Expr {
    if (this.depth >= this.maxDepth) {
      throw new LispError('RecursionDepthExceeded', `evaluation nested deeper than ${this.maxDepth} levels`);
    }
    this.depth++;
    try {
      return this.dispatch(expr, env);
    } finally {
      this.depth--;
    }
  }

  apply(proc: Expr, args: Expr[], env: Environment): Expr {
    if (proc.kind === 'builtin') {
      return proc.fn(args, {
        env,
        apply: (inner, innerArgs) => this.apply(inner, innerArgs, env),
      });
    }

    if (proc.kind !== 'closure') {
      throw new LispError('NotAProcedure', `${exprToString(proc)} is not a procedure`);
    }

    if (args.length !== proc.params.length) {
      throw new LispError(
        'ArityMismatch',
        `${exprToString(proc)} expects ${proc.params.length} argument(s), got ${args.length}`,
      );
    }

    // Lexical scope: the new frame hangs off the defining environment, not the caller's.
    const local = proc.env.child();
    proc.params.forEach((param, i) => local.set(param.name, args[i]));

    if (this.traceEnabled) {
      this.trace(`apply ${exprToString(proc)} to (${args.map(exprToString).join(' ')})`);
    }
    return this.evaluate(proc.body, local);
  }

  // ─── Dispatch ──────────────────────────────────────────

  private dispatch(expr: Expr, env: Environment): Expr {
    switch (expr.kind) {
      case 'number':
      case 'nil':
      case 'closure':
      case 'builtin':
      case 'unspecified':
        return expr;
      case 'symbol':
        return env.get(expr.name);
      case 'pair':
        return this.evaluatePair(expr, env);
    }
  }

  private evaluatePair(expr: PairExpr, env: Environment): Expr {
    const head = expr.car;
    if (head.kind === 'symbol' && head.form) {
      return this.evaluateSpecialForm(head.form, head, expr, env);
    }

    const proc = this.evaluate(head, env);
    if (!isProcedure(proc)) {
      if (head.kind === 'symbol') {
        throw new LispError(
          'UnknownForm',
          `'${head.name}' is neither a special form nor bound to a procedure (value: ${exprToString(proc)})`,
        );
      }
      throw new LispError('NotAProcedure', `${exprToString(proc)} is not a procedure`);
    }

    const args = this.operands(expr).map(arg => this.evaluate(arg, env));
    return this.apply(proc, args, env);
  }

  private evaluateSpecialForm(form: SpecialForm, head: SymbolExpr, expr: PairExpr, env: Environment): Expr {
    switch (form) {
      case 'quote': {
        const [datum] = this.operands(expr, head, 1);
        return datum;
      }
      case 'eval': {
        const [operand] = this.operands(expr, head, 1);
        return this.evaluate(this.evaluate(operand, env), env);
      }
      case 'if':
        return this.evaluateIf(head, expr, env);
      case 'define':
        return this.evaluateDefine(head, expr, env);
      case 'set!':
        return this.evaluateSet(head, expr, env);
      case 'lambda':
        return this.evaluateLambda(head, expr, env);
      case 'let':
        return this.evaluateLet(head, expr, env);
      case 'begin':
        return this.evaluateSequence(this.operands(expr, head), env);
      case 'while':
        return this.evaluateWhile(head, expr, env);
      default: {
        const unhandled: never = form;
        throw new LispError('UnknownForm', `unhandled special form ${String(unhandled)}`);
      }
    }
  }

  // ─── Special Forms ─────────────────────────────────────

  private evaluateIf(head: SymbolExpr, expr: PairExpr, env: Environment): Expr {
    const [condition, consequent, alternative] = this.operands(expr, head, 3);
    return isTruthy(this.evaluate(condition, env))
      ? this.evaluate(consequent, env)
      : this.evaluate(alternative, env);
  }

  private evaluateDefine(head: SymbolExpr, expr: PairExpr, env: Environment): Expr {
    const [target, valueExpr] = this.operands(expr, head, 2);
    const name = this.expectName(head, target);
    const value = this.evaluate(valueExpr, env);
    env.set(name, value);
    if (this.traceEnabled) this.trace(`define ${name} = ${exprToString(value)}`);
    return UNSPECIFIED;
  }

  private evaluateSet(head: SymbolExpr, expr: PairExpr, env: Environment): Expr {
    const [target, valueExpr] = this.operands(expr, head, 2);
    const name = this.expectName(head, target);
    const value = this.evaluate(valueExpr, env);
    env.mutate(name, value);
    if (this.traceEnabled) this.trace(`set! ${name} = ${exprToString(value)}`);
    return UNSPECIFIED;
  }

  private evaluateLambda(head: SymbolExpr, expr: PairExpr, env: Environment): Expr {
    const [paramList, body] = this.operands(expr, head, 2);
    const params: SymbolExpr[] = [];
    for (const param of this.items(paramList, 'lambda parameter list')) {
      if (param.kind !== 'symbol') {
        throw new LispError('MalformedForm', `lambda parameters must be symbols, got ${exprToString(param)}`);
      }
      params.push(param);
    }
    return closure(params, body, env);
  }

  private evaluateLet(head: SymbolExpr, expr: PairExpr, env: Environment): Expr {
    const [bindingList, ...body] = this.operands(expr, head);
    if (bindingList === undefined) {
      throw new LispError('MalformedForm', 'let expects a binding list');
    }

    // Every value is computed in the outer frame before any name is bound.
    const bindings: [string, Expr][] = [];
    for (const binding of this.items(bindingList, 'let binding list')) {
      const parts = this.items(binding, 'let binding');
      if (parts.length !== 2) {
        throw new LispError('MalformedForm', `let binding must be (name value), got ${exprToString(binding)}`);
      }
      bindings.push([this.expectName(head, parts[0]), this.evaluate(parts[1], env)]);
    }

    const local = env.child();
    for (const [name, value] of bindings) {
      local.set(name, value);
    }
    return this.evaluateSequence(body, local);
  }

  private evaluateWhile(head: SymbolExpr, expr: PairExpr, env: Environment): Expr {
    const [condition, body] = this.operands(expr, head, 2);
    let iterations = 0;

    for (;;) {
      const test = this.evaluate(condition, env);
      if (test.kind === 'unspecified' || !isTruthy(test)) break;
      if (this.maxIterations !== undefined && iterations >= this.maxIterations) {
        throw new LispError(
          'IterationLimitExceeded',
          `while loop exceeded maximum iterations (${this.maxIterations})`,
        );
      }
      this.evaluate(body, env);
      iterations++;
    }

    if (this.traceEnabled) this.trace(`while finished after ${iterations} iteration(s)`);
    return UNSPECIFIED;
  }

  private evaluateSequence(body: Expr[], env: Environment): Expr {
    let result: Expr = UNSPECIFIED;
    for (const item of body) {
      result = this.evaluate(item, env);
    }
    return result;
  }

  // ─── Helpers ───────────────────────────────────────────

  /**
   * Elements after the head of a form. With an arity, the operand count
   * must match exactly.
   */
  private operands(expr: PairExpr, head?: SymbolExpr, arity?: number): Expr[] {
    const items = this.items(expr.cdr, head ? `${head.name} form` : 'argument list');
    if (head && arity !== undefined && items.length !== arity) {
      throw new LispError(
        'MalformedForm',
        `${head.name} expects ${arity} operand(s), got ${items.length}`,
      );
    }
    return items;
  }

  private items(expr: Expr, what: string): Expr[] {
    const items: Expr[] = [];
    const seen = new Set<PairExpr>();
    let current = expr;
    while (current.kind === 'pair') {
      if (seen.has(current)) {
        throw new LispError('MalformedForm', `${what} is circular: ${exprToString(expr)}`);
      }
      seen.add(current);
      items.push(current.car);
      current = current.cdr;
    }
    if (current.kind !== 'nil') {
      throw new LispError('MalformedForm', `${what} is not a proper list: ${exprToString(expr)}`);
    }
    return items;
  }

  private expectName(head: SymbolExpr, target: Expr): string {
    if (target.kind !== 'symbol') {
      throw new LispError('MalformedForm', `${head.name} expects a symbol, got ${exprToString(target)}`);
    }
    return target.name;
  }

  private trace(message: string): void {
    if (!this.traceEnabled) return;
    const entry = `[${Date.now() - this.startTime}ms] ${message}`;
    this.traceLog.push(entry);
    console.log(`  [trace] ${message}`);
  }
}
