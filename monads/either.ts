import type { Monad } from './monad'

type EitherState<E, A> =
    | {
          type: 'Left'
          value: E
      }
    | {
          type: 'Right'
          value: A
      }

export class Either<E, A> implements Monad<A> {
    readonly state: EitherState<E, A>

    static left<E, A>(e: E): Either<E, A> {
        return new Either<E, A>({ type: 'Left', value: e })
    }

    static right<E, A>(a: A): Either<E, A> {
        return new Either<E, A>({ type: 'Right', value: a })
    }

    static attempt<A>(f: () => A): Either<unknown, A> {
        try {
            return Either.right<unknown, A>(f())
        } catch (e) {
            return Either.left<unknown, A>(e)
        }
    }

    // Like attempt, but anything the guard rejects is rethrown.
    static attemptOnly<E, A>(
        guard: (e: unknown) => e is E,
        f: () => A
    ): Either<E, A> {
        try {
            return Either.right<E, A>(f())
        } catch (e) {
            if (guard(e)) {
                return Either.left<E, A>(e)
            }
            throw e
        }
    }

    constructor(state: EitherState<E, A>) {
        this.state = state
    }

    isLeft(): boolean {
        return this.state.type === 'Left'
    }

    isRight(): boolean {
        return this.state.type === 'Right'
    }

    fold<B>(onLeft: (e: E) => B, onRight: (a: A) => B): B {
        switch (this.state.type) {
            case 'Left':
                return onLeft(this.state.value)
            case 'Right':
                return onRight(this.state.value)
        }
    }

    map<B>(f: (a: A) => B): Either<E, B> {
        return this.fold(
            (e) => Either.left<E, B>(e),
            (a) => Either.right<E, B>(f(a))
        )
    }

    bind<B>(f: (a: A) => Either<E, B>): Either<E, B> {
        return this.fold((e) => Either.left<E, B>(e), f)
    }

    leftMap<F>(f: (e: E) => F): Either<F, A> {
        return this.bimap(f, (a) => a)
    }

    bimap<F, B>(onLeft: (e: E) => F, onRight: (a: A) => B): Either<F, B> {
        return this.fold(
            (e) => Either.left<F, B>(onLeft(e)),
            (a) => Either.right<F, B>(onRight(a))
        )
    }

    ensure(onFailure: E, p: (a: A) => boolean): Either<E, A> {
        return this.bind((a) =>
            p(a) ? Either.right<E, A>(a) : Either.left<E, A>(onFailure)
        )
    }

    getOrElse(fallback: A): A {
        return this.fold(() => fallback, (a) => a)
    }
}
