import type { LCG } from './generator.js';

export type LcgLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
};

/** Integers accepted at the API boundary. Numbers must be safe integers. */
export type IntegerLike = bigint | number;

export interface LcgParams {
    /** Current internal value */
    state: bigint;
    /** Multiplier */
    a: bigint;
    /** Increment */
    c: bigint;
    /** Modulus, always > 1 */
    m: bigint;
}

export type LcgInit = {
    state: IntegerLike;
    a: IntegerLike;
    c: IntegerLike;
    m: IntegerLike;
};

/**
 * Well-known parameter sets.
 *
 * - `minstd`: Park-Miller minimal standard (multiplicative, prime modulus)
 * - `ansi_c`: the multiplier/increment pair from the ANSI C `rand()` reference
 * - `numerical_recipes`: full-period 32-bit generator from Numerical Recipes
 */
export type LcgPreset = 'minstd' | 'ansi_c' | 'numerical_recipes';

export const LCG_PRESETS: Record<LcgPreset, { a: bigint; c: bigint; m: bigint }> = {
    minstd:            { a: 16807n,      c: 0n,          m: 2147483647n },
    ansi_c:            { a: 1103515245n, c: 12345n,      m: 2147483648n },
    numerical_recipes: { a: 1664525n,    c: 1013904223n, m: 4294967296n },
};

export type CrackOptions = {
    /**
     * Modulus known out-of-band. When set, the modulus search is skipped and
     * three observations are enough.
     */
    modulus?: IntegerLike;
    /** Require more observations than the algorithm minimum. Lower or non-integral values are ignored. */
    minSamples?: number;
    /** Optional logger hook for recovery diagnostics. */
    logger?: LcgLogger | null;
};

export type CrackFailureReason =
    | 'insufficient-samples'
    | 'invalid-sample'
    | 'degenerate-modulus'
    | 'non-invertible'
    | 'inconsistent-sequence';

export type CrackResult =
    | { ok: true; generator: LCG }
    | { ok: false; reason: CrackFailureReason; message: string };
