import type { Monad, Monoid } from './monad'

/**
 * Carries a log W next to a result A. The monoid is passed explicitly and
 * decides how logs from sequenced steps are combined.
 */
export class Writer<W, A> implements Monad<A> {
    readonly monoid: Monoid<W>
    readonly written: W
    readonly value: A

    static pure<W, A>(monoid: Monoid<W>, a: A): Writer<W, A> {
        return new Writer(monoid, monoid.empty, a)
    }

    static tell<W>(monoid: Monoid<W>, w: W): Writer<W, null> {
        return new Writer(monoid, w, null)
    }

    static writer<W, A>(monoid: Monoid<W>, a: A, w: W): Writer<W, A> {
        return new Writer(monoid, w, a)
    }

    constructor(monoid: Monoid<W>, written: W, value: A) {
        this.monoid = monoid
        this.written = written
        this.value = value
    }

    run(): [W, A] {
        return [this.written, this.value]
    }

    map<B>(f: (a: A) => B): Writer<W, B> {
        return new Writer(this.monoid, this.written, f(this.value))
    }

    bind<B>(f: (a: A) => Writer<W, B>): Writer<W, B> {
        const m = f(this.value)
        return new Writer(
            this.monoid,
            this.monoid.combine(this.written, m.written),
            m.value
        )
    }

    next<B>(m: Writer<W, B>): Writer<W, B> {
        return this.bind(() => m)
    }

    mapWritten(f: (w: W) => W): Writer<W, A> {
        return new Writer(this.monoid, f(this.written), this.value)
    }

    bimap<B>(onWritten: (w: W) => W, onValue: (a: A) => B): Writer<W, B> {
        return new Writer(
            this.monoid,
            onWritten(this.written),
            onValue(this.value)
        )
    }

    mapBoth<B>(f: (w: W, a: A) => [W, B]): Writer<W, B> {
        const [w, b] = f(this.written, this.value)
        return new Writer(this.monoid, w, b)
    }

    reset(): Writer<W, A> {
        return new Writer(this.monoid, this.monoid.empty, this.value)
    }
}
