import type { Operator } from './operators'

export class ParseError extends Error {
    readonly token: string

    constructor(token: string) {
        super(`not an integer or operator: ${JSON.stringify(token)}`)
        this.name = 'ParseError'
        this.token = token
    }
}

export class StackUnderflowError extends Error {
    readonly operator: Operator
    readonly availableDepth: number

    constructor(operator: Operator, availableDepth: number) {
        super(
            `operator ${operator} needs 2 operands, stack holds ${availableDepth}`
        )
        this.name = 'StackUnderflowError'
        this.operator = operator
        this.availableDepth = availableDepth
    }
}

export class ArithmeticError extends Error {
    readonly operator: Operator
    readonly reason: string

    constructor(operator: Operator, reason: string) {
        super(`${operator}: ${reason}`)
        this.name = 'ArithmeticError'
        this.operator = operator
        this.reason = reason
    }
}

export type CalcError = ParseError | StackUnderflowError | ArithmeticError
