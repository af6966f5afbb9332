import { Expr } from './values';
import { LispError } from './errors';
import { installBuiltins } from './builtins';

/**
 * Lexical scope environment for variable bindings.
 * Each scope has a parent, forming a scope chain.
 */
export class Environment {
  private bindings: Map<string, Expr> = new Map();
  private parent: Environment | null;

  constructor(parent: Environment | null = null) {
    this.parent = parent;
  }

  /**
   * Root frame with the builtin procedures installed. Frames made through
   * child() never receive builtins; they see them through the chain.
   */
  static createGlobal(): Environment {
    const env = new Environment();
    installBuiltins(env);
    return env;
  }

  get(name: string): Expr {
    const value = this.bindings.get(name);
    if (value !== undefined) {
      return value;
    }
    if (this.parent) {
      return this.parent.get(name);
    }
    throw new LispError('UnboundVariable', `'${name}'`);
  }

  /**
   * Bind in this frame only, overwriting an existing binding of the same
   * name. Parents are never searched; this is what define does.
   */
  set(name: string, value: Expr): void {
    this.bindings.set(name, value);
  }

  /**
   * Overwrite the binding in the nearest frame that has one (set!).
   * Never creates a binding.
   */
  mutate(name: string, value: Expr): void {
    if (this.bindings.has(name)) {
      this.bindings.set(name, value);
      return;
    }
    if (this.parent) {
      this.parent.mutate(name, value);
      return;
    }
    throw new LispError('UnboundVariable', `'${name}' in set!`);
  }

  has(name: string): boolean {
    if (this.bindings.has(name)) return true;
    if (this.parent) return this.parent.has(name);
    return false;
  }

  hasOwn(name: string): boolean {
    return this.bindings.has(name);
  }

  child(): Environment {
    return new Environment(this);
  }

  getParent(): Environment | null {
    return this.parent;
  }

  /**
   * Get all bindings in this scope (not including parent).
   */
  getOwnBindings(): Map<string, Expr> {
    return new Map(this.bindings);
  }
}
