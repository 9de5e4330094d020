import { Stack } from 'immutable'
import { Either } from '../monads/either'
import { State } from '../monads/state'
import { type CalcError, ParseError, StackUnderflowError } from './errors'
import {
    type Operator,
    applyOperator,
    isOperator,
    parseInteger,
} from './operators'

export type CalcStack = Stack<number>

export type CalcState<A> = State<CalcStack, Either<CalcError, A>>

export interface CalcOptions {
    // top of the stack first
    initialStack?: Iterable<number>
    // receives one line per evaluated token
    log?: (line: string) => void
}

const ok = (n: number) => Either.right<CalcError, number>(n)

const fail = (error: CalcError) => Either.left<CalcError, number>(error)

const settle = (result: Either<CalcError, number>): CalcState<number> =>
    State.pure<CalcStack, Either<CalcError, number>>(result)

export function operand(num: number): CalcState<number> {
    return State.modify((stack: CalcStack) => stack.push(num)).map(() =>
        ok(num)
    )
}

export function operator(op: Operator): CalcState<number> {
    return State.get<CalcStack>().bind((stack) => {
        const a = stack.peek()
        const rest = stack.pop()
        const b = rest.peek()
        if (a === undefined || b === undefined) {
            return settle(fail(new StackUnderflowError(op, stack.size)))
        }
        return applyOperator(op, a, b).fold(
            (error) => settle(fail(error)),
            (answer) =>
                State.set(rest.pop().push(answer)).map(() => ok(answer))
        )
    })
}

export function evalOne(sym: string): CalcState<number> {
    if (isOperator(sym)) {
        return operator(sym)
    }
    return parseInteger(sym).fold(
        () => settle(fail(new ParseError(sym))),
        (n) => operand(n)
    )
}

function traced(
    sym: string,
    step: CalcState<number>,
    log: (line: string) => void
): CalcState<number> {
    return step.bind((result) =>
        State.inspect((stack: CalcStack) => {
            log(
                result.fold(
                    (error) => `${sym} failed: ${error.message}`,
                    () => `${sym} -> [${stack.join(', ')}]`
                )
            )
            return result
        })
    )
}

/**
 * Folds the tokens into one program. Once a step fails the remaining
 * tokens are skipped and the failure becomes the result.
 */
export function evalAll(
    input: readonly string[],
    options: Pick<CalcOptions, 'log'> = {}
): CalcState<number> {
    const { log } = options
    return input.reduce<CalcState<number>>(
        (program, sym) =>
            program.bind((previous) => {
                if (previous.isLeft()) {
                    return settle(previous)
                }
                return log ? traced(sym, evalOne(sym), log) : evalOne(sym)
            }),
        settle(ok(0))
    )
}

export function evaluatePostfix(
    tokens: readonly string[],
    options: CalcOptions = {}
): Either<CalcError, number> {
    const initial = Stack<number>(options.initialStack ?? [])
    return evalAll(tokens, options).runA(initial)
}

export function tokenize(input: string): string[] {
    return input.split(/\s+/).filter((sym) => sym.length > 0)
}

export function evalInput(
    input: string,
    options: CalcOptions = {}
): Either<CalcError, number> {
    return evaluatePostfix(tokenize(input), options)
}
