import { Interpreter } from '../src/runtime/interpreter';
import { LispError } from '../src/runtime/errors';
import { LispPlugin } from '../src/runtime/plugin';
import { Expr, list, number, symbol } from '../src/runtime/values';

const S = symbol;
const N = number;

const math: LispPlugin = {
  name: 'math',
  description: 'Extra integer operations',
  procedures: {
    square(args) {
      const [x] = args;
      if (args.length !== 1 || x.kind !== 'number') {
        throw new LispError('TypeMismatch', 'square expects one number');
      }
      return number(x.value * x.value);
    },
    twice(args, ctx) {
      const [proc, value] = args;
      return ctx.apply(proc, [ctx.apply(proc, [value])]);
    },
  },
};

describe('Plugin system', () => {
  it('should bind plugin procedures into the global frame', () => {
    const interpreter = new Interpreter({ plugins: [math] });
    expect(interpreter.run(list(S('square'), N(7)))).toEqual(N(49));
    expect(interpreter.getGlobalEnv().get('square')).toEqual(
      expect.objectContaining({ kind: 'builtin', name: 'square' }),
    );
  });

  it('should let plugin procedures call back into closures', () => {
    const interpreter = new Interpreter({ plugins: [math] });
    const double = list(S('lambda'), list(S('x')), list(S('*'), S('x'), N(2)));
    expect(interpreter.run(list(S('twice'), double, N(3)))).toEqual(N(12));
  });

  it('should surface errors thrown by plugin procedures', () => {
    const interpreter = new Interpreter({ plugins: [math] });
    expect(() => interpreter.run(list(S('square'), list(S('quote'), S('a'))))).toThrow('TypeMismatch');
  });

  it('should override builtins of the same name', () => {
    const constantPlus: LispPlugin = {
      name: 'constant',
      procedures: { '+': (): Expr => N(0) },
    };
    const interpreter = new Interpreter({ plugins: [constantPlus] });
    expect(interpreter.run(list(S('+'), N(1), N(2)))).toEqual(N(0));
  });

  it('should install into a given frame only', () => {
    const interpreter = new Interpreter();
    const scope = interpreter.getGlobalEnv().child();
    interpreter.use(math, scope);
    expect(interpreter.evaluate(list(S('square'), N(3)), scope)).toEqual(N(9));
    expect(() => interpreter.run(list(S('square'), N(3)))).toThrow('UnboundVariable');
  });

  describe('tracing', () => {
    const originalLog = console.log;
    beforeAll(() => { console.log = jest.fn(); });
    afterAll(() => { console.log = originalLog; });

    it('should trace plugin installation', () => {
      const interpreter = new Interpreter({ trace: true, plugins: [math] });
      const log = interpreter.getTraceLog();
      expect(log).toHaveLength(1);
      expect(log[0]).toMatch(/Plugin "math" installed \(2 procedures\)$/);
    });
  });
});
