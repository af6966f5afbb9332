/**
 * Keywords the evaluator handles itself instead of applying a procedure.
 * A symbol's tag is looked up once, when the symbol node is built.
 */
export type SpecialForm =
  | 'quote'
  | 'eval'
  | 'if'
  | 'define'
  | 'set!'
  | 'lambda'
  | 'let'
  | 'begin'
  | 'while';

export const SPECIAL_FORMS: ReadonlyMap<string, SpecialForm> = new Map<string, SpecialForm>([
  ['quote', 'quote'],
  ['eval', 'eval'],
  ['if', 'if'],
  ['define', 'define'],
  ['set!', 'set!'],
  ['lambda', 'lambda'],
  ['let', 'let'],
  ['begin', 'begin'],
  ['while', 'while'],
]);

export function lookupSpecialForm(name: string): SpecialForm | undefined {
  return SPECIAL_FORMS.get(name);
}
