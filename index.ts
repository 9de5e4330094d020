export { Eval, force, foldRight, foldRightEval } from './monads/eval'
export type { Thunk } from './monads/eval'
export { State, runState } from './monads/state'
export { Either } from './monads/either'
export { Maybe } from './monads/maybe'
export { Reader } from './monads/reader'
export { Writer } from './monads/writer'
export { ap, arrayMonoid, stringMonoid } from './monads/monad'
export type { Monad, Monoid } from './monads/monad'
export {
    evalAll,
    evalInput,
    evalOne,
    evaluatePostfix,
    tokenize,
} from './calc/calc'
export type { CalcOptions, CalcStack, CalcState } from './calc/calc'
export {
    ArithmeticError,
    ParseError,
    StackUnderflowError,
} from './calc/errors'
export type { CalcError } from './calc/errors'
