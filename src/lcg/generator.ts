/**
 * LCG: bidirectional linear congruential generator over bigint.
 *
 * Forward:  state' = (a * state + c) mod m
 * Backward: state  = (state' - c) * a^-1 mod m   (only when gcd(a, m) = 1)
 *
 * Both directions mutate `state` in place. `next()` hands out the value held
 * at the moment of the call, so a run of `next()` followed by the same number
 * of `prev()` calls replays the run in reverse.
 */

import { InvalidParameterError } from './errors.js';
import { ModularMath } from './modular-math.js';
import type { IntegerLike, LcgInit, LcgParams } from './types.js';

function requireInteger(name: string, value: IntegerLike): bigint {
    const lifted = ModularMath.toBigInt(value);
    if (lifted === null) {
        throw new InvalidParameterError(`LCG parameter '${name}' must be an integer, got ${String(value)}`);
    }
    return lifted;
}

export class LCG implements Iterable<bigint> {
    state: bigint;
    readonly a: bigint;
    readonly c: bigint;
    readonly m: bigint;

    // undefined = not computed yet, null = a has no inverse mod m
    private inverse: bigint | null | undefined = undefined;

    constructor(init: LcgInit) {
        this.state = requireInteger('state', init.state);
        this.a = requireInteger('a', init.a);
        this.c = requireInteger('c', init.c);
        this.m = requireInteger('m', init.m);

        if (this.m <= 1n) {
            throw new InvalidParameterError(`LCG modulus must be greater than 1, got ${this.m}`);
        }
    }

    /**
     * Returns the current state and advances one step.
     */
    next(): bigint {
        const current = this.state;
        this.state = ModularMath.mod(this.a * current + this.c, this.m);
        return current;
    }

    /**
     * Steps back once and returns the recovered previous state.
     * Returns null, leaving `state` untouched, when the multiplier is not invertible mod m.
     */
    prev(): bigint | null {
        const inverse = this.multiplierInverse();
        if (inverse === null) return null;
        this.state = ModularMath.mod((this.state - this.c) * inverse, this.m);
        return this.state;
    }

    /**
     * Collects `count` values from `next()`.
     */
    take(count: number): bigint[] {
        const out: bigint[] = [];
        for (let i = 0; i < count; i++) out.push(this.next());
        return out;
    }

    /** True when `prev()` is defined, i.e. gcd(a, m) = 1. */
    isReversible(): boolean {
        return this.multiplierInverse() !== null;
    }

    multiplierInverse(): bigint | null {
        if (this.inverse === undefined) {
            this.inverse = ModularMath.modInverse(this.a, this.m);
        }
        return this.inverse;
    }

    params(): LcgParams {
        return { state: this.state, a: this.a, c: this.c, m: this.m };
    }

    clone(): LCG {
        return new LCG(this.params());
    }

    equals(other: LCG): boolean {
        return this.state === other.state && this.a === other.a && this.c === other.c && this.m === other.m;
    }

    /** Unbounded stream of `next()` values; pair with a bounded consumer. */
    *[Symbol.iterator](): Iterator<bigint> {
        while (true) {
            yield this.next();
        }
    }
}
