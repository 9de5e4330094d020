import { describe, expect, it } from 'vitest'
import { applyOperator, isOperator, parseInteger } from './operators'

describe('parseInteger', () => {
    it('accepts signed decimal literals', () => {
        expect(parseInteger('42').state).toEqual({ type: 'Some', value: 42 })
        expect(parseInteger('+5').state).toEqual({ type: 'Some', value: 5 })
        expect(parseInteger('-17').state).toEqual({ type: 'Some', value: -17 })
        expect(parseInteger('007').state).toEqual({ type: 'Some', value: 7 })
        expect(parseInteger('-0').getOrElse(1)).toBe(0)
    })

    it('stays within 32 bits', () => {
        expect(parseInteger('2147483647').getOrElse(0)).toBe(2147483647)
        expect(parseInteger('-2147483648').getOrElse(0)).toBe(-2147483648)
        expect(parseInteger('2147483648').state).toEqual({ type: 'None' })
        expect(parseInteger('-2147483649').state).toEqual({ type: 'None' })
    })

    it('rejects anything else', () => {
        for (const token of ['', ' 1', '1.0', '1e3', '0x10', '-', 'x']) {
            expect(parseInteger(token).state).toEqual({ type: 'None' })
        }
    })
})

describe('operators', () => {
    it('recognizes the four operators only', () => {
        expect(['+', '-', '*', '/'].every(isOperator)).toBe(true)
        expect(isOperator('%')).toBe(false)
        expect(isOperator('toString')).toBe(false)
    })

    it('takes the top of the stack as the right operand', () => {
        expect(applyOperator('-', 3, 10).getOrElse(0)).toBe(7)
        expect(applyOperator('/', 4, 10).getOrElse(0)).toBe(2)
        expect(applyOperator('+', 3, 10).getOrElse(0)).toBe(13)
        expect(applyOperator('*', 3, 10).getOrElse(0)).toBe(30)
    })

    it('fails on division by zero', () => {
        expect(applyOperator('/', 0, 10).isLeft()).toBe(true)
    })
})
