import type { IntegerLike } from './types.js';

export interface ExtendedGcd {
    gcd: bigint;
    /** Bezout coefficient of the first argument */
    x: bigint;
    /** Bezout coefficient of the second argument */
    y: bigint;
}

export class ModularMath {
    /**
     * Least non-negative residue. `%` on bigint keeps the sign of the dividend.
     */
    static mod(value: bigint, modulus: bigint): bigint {
        const r = value % modulus;
        return r < 0n ? r + modulus : r;
    }

    static abs(value: bigint): bigint {
        return value < 0n ? -value : value;
    }

    static gcd(a: bigint, b: bigint): bigint {
        let x = ModularMath.abs(a);
        let y = ModularMath.abs(b);
        while (y !== 0n) {
            [x, y] = [y, x % y];
        }
        return x;
    }

    /**
     * Iterative extended Euclid: returns g >= 0 with a*x + b*y = g.
     */
    static extendedGcd(a: bigint, b: bigint): ExtendedGcd {
        let [oldR, r] = [a, b];
        let [oldS, s] = [1n, 0n];
        let [oldT, t] = [0n, 1n];

        while (r !== 0n) {
            const q = oldR / r;
            [oldR, r] = [r, oldR - q * r];
            [oldS, s] = [s, oldS - q * s];
            [oldT, t] = [t, oldT - q * t];
        }

        if (oldR < 0n) {
            return { gcd: -oldR, x: -oldS, y: -oldT };
        }
        return { gcd: oldR, x: oldS, y: oldT };
    }

    /**
     * Inverse of `value` modulo `modulus`, or null when gcd(value, modulus) != 1.
     */
    static modInverse(value: bigint, modulus: bigint): bigint | null {
        if (modulus <= 0n) return null;
        const { gcd, x } = ModularMath.extendedGcd(ModularMath.mod(value, modulus), modulus);
        if (gcd !== 1n) return null;
        return ModularMath.mod(x, modulus);
    }

    /**
     * Lift a boundary integer to bigint. Non-integral or unsafe numbers yield null.
     */
    static toBigInt(value: IntegerLike): bigint | null {
        if (typeof value === 'bigint') return value;
        if (!Number.isSafeInteger(value)) return null;
        return BigInt(value);
    }
}
