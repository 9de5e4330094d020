import { describe, expect, it } from 'vitest'
import { Maybe } from './maybe'
import { ap } from './monad'

const parse = (s: string): Maybe<number> =>
    Maybe.fromNullable(/^\d+$/.test(s) ? Number(s) : null)

describe('Maybe', () => {
    it('sequences computations that may produce nothing', () => {
        const sum = (a: string, b: string, c: string) =>
            parse(a).bind((x) =>
                parse(b).bind((y) => parse(c).map((z) => x + y + z))
            )

        expect(sum('1', '2', '3').state).toEqual({ type: 'Some', value: 6 })
        expect(sum('1', '?', '3').state).toEqual({ type: 'None' })
    })

    it('applies a wrapped function with ap', () => {
        const c = Maybe.some('hello').bind((a) =>
            Maybe.some('world').map((b) => a + ' ' + b)
        )
        const d = ap(
            Maybe.some((a: string) => a + '!'),
            c
        )
        expect(d).toEqual(Maybe.some('hello world!'))
        expect(ap(Maybe.none<(a: string) => string>(), c)).toEqual(
            Maybe.none()
        )
    })

    it('falls back and converts to Either', () => {
        expect(parse('x').getOrElse(-1)).toBe(-1)
        expect(parse('12').getOrElse(-1)).toBe(12)
        expect(parse('x').toEither(() => 'missing').state).toEqual({
            type: 'Left',
            value: 'missing',
        })
        expect(parse('7').toEither(() => 'missing').state).toEqual({
            type: 'Right',
            value: 7,
        })
    })

    it('treats only null and undefined as absent', () => {
        expect(Maybe.fromNullable(0).state).toEqual({ type: 'Some', value: 0 })
        expect(Maybe.fromNullable(undefined).state).toEqual({ type: 'None' })
    })
})
