import type { Monad } from './monad'

export type Thunk<T> = Done<T> | Defer<T> | Mapped<T> | Chained<T>

export interface Done<T> {
    readonly type: 'Done'
    readonly value: T
}

export interface Defer<T> {
    readonly type: 'Defer'
    readonly producer: () => Thunk<T>
}

// transform and continuation are declared as methods so that a node built
// from a Thunk<A> can hide A behind unknown.
export interface Mapped<T> {
    readonly type: 'Mapped'
    readonly source: Thunk<unknown>
    transform(value: unknown): T
}

export interface Chained<T> {
    readonly type: 'Chained'
    readonly source: Thunk<unknown>
    continuation(value: unknown): Thunk<T>
}

type Frame = (value: unknown) => Thunk<unknown>

export function done<T>(value: T): Thunk<T> {
    return { type: 'Done', value }
}

export function defer<T>(producer: () => Thunk<T>): Thunk<T> {
    return { type: 'Defer', producer }
}

export function mapped<A, T>(
    source: Thunk<A>,
    transform: (a: A) => T
): Thunk<T> {
    return { type: 'Mapped', source, transform }
}

export function chained<A, T>(
    source: Thunk<A>,
    continuation: (a: A) => Thunk<T>
): Thunk<T> {
    return { type: 'Chained', source, continuation }
}

/**
 * Drives a thunk to its value with a loop and an explicit list of pending
 * continuations, so native stack use stays constant however deep the chain.
 *
 * Errors thrown by producers and transforms propagate unchanged. An infinite
 * chain of Defer nodes never returns.
 */
export function force<T>(thunk: Thunk<T>): T {
    const out: { settled?: Done<T> } = {}
    drive(
        mapped(thunk, (value: T) => {
            out.settled = { type: 'Done', value }
            return value
        })
    )
    if (out.settled === undefined) {
        throw new Error('thunk finished without a value')
    }
    return out.settled.value
}

function drive(root: Thunk<unknown>): void {
    const pending: Frame[] = []
    let current: Thunk<unknown> = root

    for (;;) {
        switch (current.type) {
            case 'Done': {
                // innermost continuation was pushed last
                const frame = pending.pop()
                if (frame === undefined) {
                    return
                }
                current = frame(current.value)
                break
            }
            case 'Defer':
                current = current.producer()
                break
            case 'Mapped': {
                const node = current
                pending.push((value) => done(node.transform(value)))
                current = node.source
                break
            }
            case 'Chained': {
                const node = current
                pending.push((value) => node.continuation(value))
                current = node.source
                break
            }
        }
    }
}

function memo<T>(thunk: Thunk<T>): Thunk<T> {
    let cached: Done<T> | undefined
    return defer(
        () =>
            cached ??
            mapped(thunk, (value: T) => {
                cached = { type: 'Done', value }
                return value
            })
    )
}

/**
 * A lazily evaluated value whose map and bind are trampolined.
 *
 * - now: computed eagerly, memoized
 * - later: computed on first access, memoized
 * - always: computed on every access
 */
export class Eval<A> implements Monad<A> {
    readonly thunk: Thunk<A>

    static now<A>(a: A): Eval<A> {
        return new Eval(done(a))
    }

    static later<A>(f: () => A): Eval<A> {
        return new Eval(memo(defer(() => done(f()))))
    }

    static always<A>(f: () => A): Eval<A> {
        return new Eval(defer(() => done(f())))
    }

    static defer<A>(f: () => Eval<A>): Eval<A> {
        return new Eval(defer(() => f().thunk))
    }

    constructor(thunk: Thunk<A>) {
        this.thunk = thunk
    }

    get value(): A {
        return force(this.thunk)
    }

    map<B>(f: (a: A) => B): Eval<B> {
        return new Eval(mapped(this.thunk, f))
    }

    bind<B>(f: (a: A) => Eval<B>): Eval<B> {
        return new Eval(chained(this.thunk, (a: A) => f(a).thunk))
    }

    // Caches the chain built so far; steps added afterwards keep their own
    // evaluation strategy.
    memoize(): Eval<A> {
        return new Eval(memo(this.thunk))
    }
}

export function foldRightEval<A, B>(
    items: readonly A[],
    acc: Eval<B>,
    fn: (a: A, b: Eval<B>) => Eval<B>
): Eval<B> {
    const go = (i: number): Eval<B> =>
        i === items.length ? acc : Eval.defer(() => fn(items[i], go(i + 1)))
    return go(0)
}

export function foldRight<A, B>(
    items: readonly A[],
    acc: B,
    fn: (a: A, b: B) => B
): B {
    return foldRightEval(items, Eval.now(acc), (a, b) =>
        b.map((v) => fn(a, v))
    ).value
}
