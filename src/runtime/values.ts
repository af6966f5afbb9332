/**
 * Expression model for the evaluator.
 * The same nodes serve as program syntax and as runtime values.
 */

import type { Environment } from './environment';
import { LispError } from './errors';
import { SpecialForm, lookupSpecialForm } from './special-forms';

export type Expr =
  | NumberExpr
  | SymbolExpr
  | PairExpr
  | NilExpr
  | ClosureExpr
  | BuiltinExpr
  | UnspecifiedExpr;

export interface NumberExpr {
  kind: 'number';
  value: number;
}

export interface SymbolExpr {
  kind: 'symbol';
  name: string;
  /** Set when the name is a special-form keyword. */
  form?: SpecialForm;
}

export interface PairExpr {
  kind: 'pair';
  car: Expr;
  cdr: Expr;
}

/** The empty list terminator. */
export interface NilExpr {
  kind: 'nil';
}

export interface ClosureExpr {
  kind: 'closure';
  params: SymbolExpr[];
  body: Expr;
  /** Defining environment, captured by reference. */
  env: Environment;
}

export interface BuiltinExpr {
  kind: 'builtin';
  name: string;
  fn: NativeProcedure;
}

/** Result of forms that produce no usable value (define, set!, while). */
export interface UnspecifiedExpr {
  kind: 'unspecified';
}

/**
 * What a native procedure can reach besides its arguments: the caller's
 * environment, and a way to call back into procedures it was handed.
 */
export interface ProcedureContext {
  env: Environment;
  apply: (proc: Expr, args: Expr[]) => Expr;
}

export type NativeProcedure = (args: Expr[], context: ProcedureContext) => Expr;

// ─── Constructors ────────────────────────────────────

export const NIL: NilExpr = { kind: 'nil' };

export const UNSPECIFIED: UnspecifiedExpr = { kind: 'unspecified' };

export function number(value: number): NumberExpr {
  if (Number.isNaN(value) || (Number.isFinite(value) && !Number.isInteger(value))) {
    throw new LispError('TypeMismatch', `${value} is not an integer`);
  }
  if (!Number.isSafeInteger(value)) {
    throw new LispError('IntegerOverflow', `${value} is outside the safe integer range`);
  }
  return { kind: 'number', value };
}

export function symbol(name: string): SymbolExpr {
  const form = lookupSpecialForm(name);
  return form ? { kind: 'symbol', name, form } : { kind: 'symbol', name };
}

export function cons(car: Expr, cdr: Expr): PairExpr {
  return { kind: 'pair', car, cdr };
}

export function list(...items: Expr[]): Expr {
  let result: Expr = NIL;
  for (let i = items.length - 1; i >= 0; i--) {
    result = cons(items[i], result);
  }
  return result;
}

export function closure(params: SymbolExpr[], body: Expr, env: Environment): ClosureExpr {
  return { kind: 'closure', params, body, env };
}

export function builtin(name: string, fn: NativeProcedure): BuiltinExpr {
  return { kind: 'builtin', name, fn };
}

export function bool(value: boolean): NumberExpr {
  return number(value ? 1 : 0);
}

// ─── Accessors ───────────────────────────────────────

export function car(expr: Expr): Expr {
  if (expr.kind !== 'pair') {
    throw new LispError('NotAPair', `car of ${exprToString(expr)}`);
  }
  return expr.car;
}

export function cdr(expr: Expr): Expr {
  if (expr.kind !== 'pair') {
    throw new LispError('NotAPair', `cdr of ${exprToString(expr)}`);
  }
  return expr.cdr;
}

/**
 * Collect the elements of a proper list. Throws MalformedList when the
 * chain ends in anything other than NIL or comes back to a pair it has
 * already passed.
 */
export function listToArray(expr: Expr): Expr[] {
  const items: Expr[] = [];
  const seen = new Set<PairExpr>();
  let current = expr;
  while (current.kind === 'pair') {
    if (seen.has(current)) {
      throw new LispError('MalformedList', `${exprToString(expr)} is circular`);
    }
    seen.add(current);
    items.push(current.car);
    current = current.cdr;
  }
  if (current.kind !== 'nil') {
    throw new LispError('MalformedList', `${exprToString(expr)} is not a proper list`);
  }
  return items;
}

// ─── Utilities ───────────────────────────────────────

export function isProcedure(expr: Expr): expr is ClosureExpr | BuiltinExpr {
  return expr.kind === 'closure' || expr.kind === 'builtin';
}

/** Only numbers carry truth values: nonzero is true. */
export function isTruthy(expr: Expr): boolean {
  if (expr.kind !== 'number') {
    throw new LispError('TypeMismatch', `expected a number as condition, got ${exprToString(expr)}`);
  }
  return expr.value !== 0;
}

export function exprToString(expr: Expr): string {
  return render(expr, new Set());
}

function render(expr: Expr, open: Set<PairExpr>): string {
  switch (expr.kind) {
    case 'number': return String(expr.value);
    case 'symbol': return expr.name;
    case 'nil': return '()';
    case 'closure': return `#<closure (${expr.params.map(p => p.name).join(' ')})>`;
    case 'builtin': return `#<builtin ${expr.name}>`;
    case 'unspecified': return '#<unspecified>';
    case 'pair': {
      if (open.has(expr)) return '#<cycle>';
      const parts: string[] = [];
      const visited: PairExpr[] = [];
      let current: Expr = expr;
      while (current.kind === 'pair') {
        if (open.has(current)) break;
        open.add(current);
        visited.push(current);
        parts.push(render(current.car, open));
        current = current.cdr;
      }
      let text = '(' + parts.join(' ');
      if (current.kind === 'pair') {
        text += ' . #<cycle>';
      } else if (current.kind !== 'nil') {
        text += ' . ' + render(current, open);
      }
      for (const pair of visited) open.delete(pair);
      return text + ')';
    }
  }
}

/**
 * Structural equality. Procedures compare by identity. Pairs already under
 * comparison count as equal when met again, so circular lists terminate.
 */
export function exprsEqual(a: Expr, b: Expr): boolean {
  return equalWithin(a, b, new Map());
}

function equalWithin(a: Expr, b: Expr, comparing: Map<PairExpr, Set<PairExpr>>): boolean {
  let left = a;
  let right = b;
  while (left.kind === 'pair' && right.kind === 'pair') {
    if (left === right) return true;
    let partners = comparing.get(left);
    if (partners?.has(right)) return true;
    if (!partners) {
      partners = new Set();
      comparing.set(left, partners);
    }
    partners.add(right);
    if (!equalWithin(left.car, right.car, comparing)) return false;
    left = left.cdr;
    right = right.cdr;
  }
  if (left === right) return true;
  switch (left.kind) {
    case 'number': return right.kind === 'number' && left.value === right.value;
    case 'symbol': return right.kind === 'symbol' && left.name === right.name;
    case 'nil': return right.kind === 'nil';
    case 'unspecified': return right.kind === 'unspecified';
    default: return false;
  }
}
