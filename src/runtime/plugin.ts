import { NativeProcedure } from './values';

/**
 * LispPlugin — a named set of extra native procedures.
 *
 * Plugins extend the builtin registry without touching it. Their procedures
 * are bound into the global frame after the builtins, so a plugin may
 * replace a builtin of the same name.
 *
 * Example plugin:
 * ```ts
 * import { Interpreter, LispError, LispPlugin, number } from 'conscell';
 *
 * const plugin: LispPlugin = {
 *   name: 'math',
 *   description: 'Extra integer operations',
 *   procedures: {
 *     square(args) {
 *       const [x] = args;
 *       if (x.kind !== 'number') throw new LispError('TypeMismatch', 'square expects a number');
 *       return number(x.value * x.value);
 *     },
 *   },
 * };
 *
 * const interpreter = new Interpreter({ plugins: [plugin] });
 * ```
 */
export interface LispPlugin {
  /** Plugin name (used for identification and trace logging). */
  name: string;

  /** Human-readable description of what this plugin provides. */
  description?: string;

  /** Procedures bound under their key names. */
  procedures: Record<string, NativeProcedure>;
}
