import type { Monad } from './monad'

// A computation of A that reads an environment X.
export class Reader<A, X> implements Monad<A> {
    run: (x: X) => A

    static ask<X>(): Reader<X, X> {
        return new Reader((x: X) => x)
    }

    static asks<A, X>(f: (x: X) => A): Reader<A, X> {
        return new Reader(f)
    }

    static pure<A, X>(a: A): Reader<A, X> {
        return new Reader(() => a)
    }

    constructor(run: (x: X) => A) {
        this.run = run
    }

    map<B>(f: (a: A) => B): Reader<B, X> {
        return new Reader((x: X) => f(this.run(x)))
    }

    bind<B>(f: (a: A) => Reader<B, X>): Reader<B, X> {
        return new Reader((x: X) => {
            const m = f(this.run(x))
            return m.run(x)
        })
    }

    local<Y>(f: (y: Y) => X): Reader<A, Y> {
        return new Reader((y: Y) => this.run(f(y)))
    }
}
