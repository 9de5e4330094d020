import { Either } from './either'
import type { Monad } from './monad'

type MaybeState<A> =
    | {
          type: 'Some'
          value: A
      }
    | {
          type: 'None'
      }

export class Maybe<A> implements Monad<A> {
    readonly state: MaybeState<A>

    static some<A>(a: A): Maybe<A> {
        return new Maybe<A>({ type: 'Some', value: a })
    }

    static none<A>(): Maybe<A> {
        return new Maybe<A>({ type: 'None' })
    }

    static fromNullable<A>(a: A | null | undefined): Maybe<A> {
        return a === null || a === undefined
            ? Maybe.none<A>()
            : Maybe.some<A>(a)
    }

    constructor(state: MaybeState<A>) {
        this.state = state
    }

    fold<B>(onNone: () => B, onSome: (a: A) => B): B {
        switch (this.state.type) {
            case 'Some':
                return onSome(this.state.value)
            case 'None':
                return onNone()
        }
    }

    map<B>(f: (a: A) => B): Maybe<B> {
        return this.fold(
            () => Maybe.none<B>(),
            (a) => Maybe.some(f(a))
        )
    }

    bind<B>(f: (a: A) => Maybe<B>): Maybe<B> {
        return this.fold(() => Maybe.none<B>(), f)
    }

    getOrElse(fallback: A): A {
        return this.fold(
            () => fallback,
            (a) => a
        )
    }

    toEither<E>(onNone: () => E): Either<E, A> {
        return this.fold(
            () => Either.left<E, A>(onNone()),
            (a) => Either.right<E, A>(a)
        )
    }
}
