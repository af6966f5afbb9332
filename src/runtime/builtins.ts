/**
 * Registry of native procedures installed into every root environment.
 * Truth values are the numbers 1 and 0.
 */

import type { Environment } from './environment';
import { LispError } from './errors';
import {
  Expr,
  NativeProcedure,
  PairExpr,
  UNSPECIFIED,
  bool,
  builtin,
  car,
  cdr,
  cons,
  exprToString,
  exprsEqual,
  isProcedure,
  isTruthy,
  list,
  listToArray,
  number,
} from './values';

function expectArity(name: string, args: Expr[], count: number): void {
  if (args.length !== count) {
    throw new LispError(
      'ArityMismatch',
      `${name} expects ${count} argument${count === 1 ? '' : 's'}, got ${args.length}`,
    );
  }
}

function expectNumber(name: string, arg: Expr): number {
  if (arg.kind !== 'number') {
    throw new LispError('TypeMismatch', `arguments to ${name} must be numbers, got ${exprToString(arg)}`);
  }
  return arg.value;
}

function checked(name: string, value: number): number {
  if (!Number.isSafeInteger(value)) {
    throw new LispError('IntegerOverflow', `result of ${name} is outside the safe integer range`);
  }
  return value;
}

function expectPair(name: string, arg: Expr): PairExpr {
  if (arg.kind !== 'pair') {
    throw new LispError('NotAPair', `${name} of ${exprToString(arg)}`);
  }
  return arg;
}

function comparison(name: string, test: (a: number, b: number) => boolean): NativeProcedure {
  return (args) => {
    expectArity(name, args, 2);
    return bool(test(expectNumber(name, args[0]), expectNumber(name, args[1])));
  };
}

function predicate(name: string, test: (arg: Expr) => boolean): NativeProcedure {
  return (args) => {
    expectArity(name, args, 1);
    return bool(test(args[0]));
  };
}

function isEq(a: Expr, b: Expr): boolean {
  if (a === b) return true;
  if (a.kind === 'number' && b.kind === 'number') return a.value === b.value;
  if (a.kind === 'symbol' && b.kind === 'symbol') return a.name === b.name;
  return a.kind === 'nil' && b.kind === 'nil';
}

export const BUILTIN_PROCEDURES: ReadonlyMap<string, NativeProcedure> = new Map<string, NativeProcedure>([
  // Arithmetic
  ['+', (args) => number(args.reduce((sum, arg) => checked('+', sum + expectNumber('+', arg)), 0))],
  ['*', (args) => number(args.reduce((product, arg) => checked('*', product * expectNumber('*', arg)), 1))],
  ['-', (args) => {
    if (args.length === 0) {
      throw new LispError('ArityMismatch', '- expects at least 1 argument, got 0');
    }
    const first = expectNumber('-', args[0]);
    if (args.length === 1) return number(-first);
    return number(args.slice(1).reduce((acc, arg) => checked('-', acc - expectNumber('-', arg)), first));
  }],
  ['/', (args) => {
    if (args.length === 0) {
      throw new LispError('ArityMismatch', '/ expects at least 1 argument, got 0');
    }
    const operands = args.length === 1 ? [1, expectNumber('/', args[0])] : args.map(arg => expectNumber('/', arg));
    let quotient = operands[0];
    for (const divisor of operands.slice(1)) {
      if (divisor === 0) {
        throw new LispError('DivisionByZero', `${quotient} / 0`);
      }
      quotient = Math.trunc(quotient / divisor);
    }
    return number(quotient);
  }],

  // Comparison
  ['=', comparison('=', (a, b) => a === b)],
  ['<', comparison('<', (a, b) => a < b)],
  ['>', comparison('>', (a, b) => a > b)],
  ['<=', comparison('<=', (a, b) => a <= b)],
  ['>=', comparison('>=', (a, b) => a >= b)],
  ['not', (args) => {
    expectArity('not', args, 1);
    return bool(expectNumber('not', args[0]) === 0);
  }],

  // Pairs and lists
  ['cons', (args) => {
    expectArity('cons', args, 2);
    return cons(args[0], args[1]);
  }],
  ['car', (args) => {
    expectArity('car', args, 1);
    return car(args[0]);
  }],
  ['cdr', (args) => {
    expectArity('cdr', args, 1);
    return cdr(args[0]);
  }],
  ['set-car!', (args) => {
    expectArity('set-car!', args, 2);
    expectPair('set-car!', args[0]).car = args[1];
    return UNSPECIFIED;
  }],
  ['set-cdr!', (args) => {
    expectArity('set-cdr!', args, 2);
    expectPair('set-cdr!', args[0]).cdr = args[1];
    return UNSPECIFIED;
  }],
  ['list', (args) => list(...args)],
  ['length', (args) => {
    expectArity('length', args, 1);
    return number(listToArray(args[0]).length);
  }],

  // Type predicates
  ['null?', predicate('null?', arg => arg.kind === 'nil')],
  ['pair?', predicate('pair?', arg => arg.kind === 'pair')],
  ['number?', predicate('number?', arg => arg.kind === 'number')],
  ['symbol?', predicate('symbol?', arg => arg.kind === 'symbol')],
  ['procedure?', predicate('procedure?', isProcedure)],
  ['eq?', (args) => {
    expectArity('eq?', args, 2);
    return bool(isEq(args[0], args[1]));
  }],
  ['equal?', (args) => {
    expectArity('equal?', args, 2);
    return bool(exprsEqual(args[0], args[1]));
  }],

  // Higher-order
  ['map', (args, ctx) => {
    expectArity('map', args, 2);
    const [proc, items] = args;
    return list(...listToArray(items).map(item => ctx.apply(proc, [item])));
  }],
  ['filter', (args, ctx) => {
    expectArity('filter', args, 2);
    const [proc, items] = args;
    return list(...listToArray(items).filter(item => isTruthy(ctx.apply(proc, [item]))));
  }],
  ['reduce', (args, ctx) => {
    expectArity('reduce', args, 3);
    const [proc, init, items] = args;
    return listToArray(items).reduce((acc, item) => ctx.apply(proc, [acc, item]), init);
  }],
]);

/**
 * Install every builtin procedure into the given frame.
 */
export function installBuiltins(env: Environment): void {
  for (const [name, fn] of BUILTIN_PROCEDURES) {
    env.set(name, builtin(name, fn));
  }
}

/**
 * Returns a description of what a builtin procedure does.
 */
export function describeBuiltin(name: string): string {
  const descriptions: Record<string, string> = {
    '+': 'Sum of the arguments; 0 with none.',
    '*': 'Product of the arguments; 1 with none.',
    '-': 'Negate one argument, or subtract the rest from the first.',
    '/': 'Truncating integer division, left to right.',
    '=': 'Numeric equality (1 or 0).',
    '<': 'Numeric less-than (1 or 0).',
    '>': 'Numeric greater-than (1 or 0).',
    '<=': 'Numeric less-than-or-equal (1 or 0).',
    '>=': 'Numeric greater-than-or-equal (1 or 0).',
    not: '1 when the argument is 0, otherwise 0.',
    cons: 'Build a pair from a car and a cdr.',
    car: 'First slot of a pair.',
    cdr: 'Second slot of a pair.',
    'set-car!': 'Replace the first slot of a pair in place.',
    'set-cdr!': 'Replace the second slot of a pair in place.',
    list: 'Build a proper list from the arguments.',
    length: 'Number of elements in a proper list.',
    'null?': 'Is the argument the empty list?',
    'pair?': 'Is the argument a pair?',
    'number?': 'Is the argument a number?',
    'symbol?': 'Is the argument a symbol?',
    'procedure?': 'Is the argument a closure or builtin?',
    'eq?': 'Identity; numbers and symbols compare by value.',
    'equal?': 'Structural equality.',
    map: 'Apply a procedure to each list element.',
    filter: 'Keep the list elements for which a procedure returns nonzero.',
    reduce: 'Left fold: (reduce f init list).',
  };
  return descriptions[name] || `Builtin procedure: ${name}`;
}
