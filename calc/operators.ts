import { Either } from '../monads/either'
import { Maybe } from '../monads/maybe'
import { ArithmeticError } from './errors'

export type Operator = '+' | '-' | '*' | '/'

type Apply = (a: number, b: number) => Either<ArithmeticError, number>

// a is the top of the stack, b the value under it. Results wrap to 32 bits
// and division truncates toward zero.
const operators: Record<Operator, Apply> = {
    '+': (a, b) => Either.right((a + b) | 0),
    '-': (a, b) => Either.right((b - a) | 0),
    '*': (a, b) => Either.right(Math.imul(a, b)),
    '/': (a, b) =>
        a === 0
            ? Either.left(new ArithmeticError('/', 'division by zero'))
            : Either.right((b / a) | 0),
}

export function isOperator(token: string): token is Operator {
    return Object.hasOwn(operators, token)
}

export function applyOperator(
    op: Operator,
    a: number,
    b: number
): Either<ArithmeticError, number> {
    return operators[op](a, b)
}

const INTEGER = /^[+-]?[0-9]+$/
const INT_MIN = -2147483648
const INT_MAX = 2147483647

export function parseInteger(token: string): Maybe<number> {
    if (!INTEGER.test(token)) {
        return Maybe.none()
    }
    const n = Number(token)
    return n >= INT_MIN && n <= INT_MAX ? Maybe.some(n | 0) : Maybe.none()
}
