import { Environment } from '../src/runtime/environment';
import { number } from '../src/runtime/values';
import { createEnv, envMutate } from '../src/index';

describe('Environment', () => {
  describe('get and set', () => {
    it('should bind and retrieve values', () => {
      const env = new Environment();
      env.set('x', number(42));
      expect(env.get('x')).toEqual(number(42));
    });

    it('should overwrite a binding in the same frame', () => {
      const env = new Environment();
      env.set('x', number(1));
      env.set('x', number(2));
      expect(env.get('x')).toEqual(number(2));
      expect(env.getOwnBindings().size).toBe(1);
    });

    it('should search parent frames on lookup', () => {
      const parent = new Environment();
      parent.set('x', number(1));
      const child = parent.child();
      expect(child.get('x')).toEqual(number(1));
      expect(child.hasOwn('x')).toBe(false);
      expect(child.has('x')).toBe(true);
    });

    it('should shadow parent bindings without touching them', () => {
      const parent = new Environment();
      parent.set('x', number(1));
      const child = parent.child();
      child.set('x', number(2));
      expect(child.get('x')).toEqual(number(2));
      expect(parent.get('x')).toEqual(number(1));
    });

    it('should throw UnboundVariable when no frame binds the name', () => {
      const env = new Environment().child();
      expect(() => env.get('missing')).toThrow("UnboundVariable: 'missing'");
    });
  });

  describe('mutate()', () => {
    it('should overwrite the nearest frame that binds the name', () => {
      const root = new Environment();
      root.set('x', number(1));
      const middle = root.child();
      middle.set('x', number(2));
      const leaf = middle.child();

      leaf.mutate('x', number(3));

      expect(middle.get('x')).toEqual(number(3));
      expect(root.get('x')).toEqual(number(1));
      expect(leaf.hasOwn('x')).toBe(false);
    });

    it('should never create a binding', () => {
      const env = new Environment();
      expect(() => envMutate(env, 'x', number(1))).toThrow("UnboundVariable: 'x' in set!");
      expect(env.has('x')).toBe(false);
    });
  });

  describe('creation', () => {
    it('should install builtins only into root frames', () => {
      const global = Environment.createGlobal();
      expect(global.hasOwn('+')).toBe(true);
      expect(global.child().hasOwn('+')).toBe(false);
      expect(new Environment().has('+')).toBe(false);
    });

    it('should create a root frame when no parent is given', () => {
      const env = createEnv();
      expect(env.getParent()).toBeNull();
      expect(env.get('+').kind).toBe('builtin');
    });

    it('should create an empty child frame when a parent is given', () => {
      const parent = createEnv();
      const child = createEnv(parent);
      expect(child.getParent()).toBe(parent);
      expect(child.getOwnBindings().size).toBe(0);
      expect(child.get('car').kind).toBe('builtin');
    });

    it('should give each root frame its own bindings', () => {
      const a = createEnv();
      const b = createEnv();
      a.set('+', number(0));
      expect(b.get('+').kind).toBe('builtin');
    });
  });

  it('should return a copy of its own bindings', () => {
    const env = new Environment();
    env.set('x', number(1));
    const copy = env.getOwnBindings();
    copy.set('y', number(2));
    expect(env.hasOwn('y')).toBe(false);
  });
});
