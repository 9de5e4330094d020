export interface Monad<A> {
    map<B>(f: (a: A) => B): Monad<B>
    bind<B>(f: (a: A) => Monad<B>): Monad<B>
}

// Passed explicitly wherever logs get combined.
export interface Monoid<W> {
    empty: W
    combine(x: W, y: W): W
}

export function ap<A, B>(m1: Monad<(a: A) => B>, m2: Monad<A>): Monad<B> {
    return m1.bind((f) => m2.map(f))
}

export const arrayMonoid = <T>(): Monoid<readonly T[]> => ({
    empty: [],
    combine: (x, y) => [...x, ...y],
})

export const stringMonoid: Monoid<string> = {
    empty: '',
    combine: (x, y) => x + y,
}
