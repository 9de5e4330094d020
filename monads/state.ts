import { Eval } from './eval'
import type { Monad } from './monad'

const pair = <S, A>(s: S, a: A): [S, A] => [s, a]

/**
 * A transition `S => [S, A]` run through Eval, so chains of any length of
 * `bind` run in constant native stack.
 *
 * State values are never mutated; every step hands the next one a new value.
 */
export class State<S, A> implements Monad<A> {
    private readonly step: (s: S) => Eval<[S, A]>

    static from<S, A>(f: (s: S) => [S, A]): State<S, A> {
        return new State((s: S) => Eval.always(() => f(s)))
    }

    static pure<S, A>(a: A): State<S, A> {
        return new State((s: S) => Eval.now(pair(s, a)))
    }

    static get<S>(): State<S, S> {
        return new State((s: S) => Eval.now(pair(s, s)))
    }

    static set<S>(s: S): State<S, null> {
        return new State(() => Eval.now(pair(s, null)))
    }

    static modify<S>(f: (s: S) => S): State<S, null> {
        return new State((s: S) => Eval.always(() => pair(f(s), null)))
    }

    static inspect<S, A>(f: (s: S) => A): State<S, A> {
        return new State((s: S) => Eval.always(() => pair(s, f(s))))
    }

    constructor(step: (s: S) => Eval<[S, A]>) {
        this.step = step
    }

    map<B>(f: (a: A) => B): State<S, B> {
        return new State((s: S) =>
            Eval.defer(() => this.step(s)).map(([s2, a]) => pair(s2, f(a)))
        )
    }

    bind<B>(f: (a: A) => State<S, B>): State<S, B> {
        return new State((s: S) =>
            Eval.defer(() => this.step(s)).bind(([s2, a]) => f(a).step(s2))
        )
    }

    next<B>(m: State<S, B>): State<S, B> {
        return this.bind(() => m)
    }

    runF(s: S): Eval<[S, A]> {
        return Eval.defer(() => this.step(s))
    }

    run(s: S): [S, A] {
        return this.runF(s).value
    }

    runS(s: S): S {
        return this.run(s)[0]
    }

    runA(s: S): A {
        return this.run(s)[1]
    }
}

export function runState<S, A>(program: State<S, A>, initial: S): [S, A] {
    return program.run(initial)
}
