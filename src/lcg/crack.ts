/**
 * Hidden-modulus LCG recovery.
 *
 * Given consecutive exact states s_0..s_{k-1}:
 *   t_i = s_{i+1} - s_i
 *   z_i = t_{i+2} * t_i - t_{i+1}^2      (each z_i is a multiple of m)
 *   m   = gcd(|z_0|, |z_1|, ...)
 *   a   = t_1 * t_0^-1 mod m
 *   c   = s_1 - a * s_0 mod m
 *
 * The gcd only converges to m with high probability. Short samples can settle on
 * a multiple of m, which either fails the replay check or, rarely, reproduces
 * the sample under different parameters. Pass more observations for certainty.
 */

import { CrackError } from './errors.js';
import { LCG } from './generator.js';
import { ModularMath } from './modular-math.js';
import type { CrackFailureReason, CrackOptions, CrackResult, IntegerLike, LcgLogger } from './types.js';

/** Observations needed when the modulus must be recovered too. */
export const MIN_SAMPLES_BLIND = 4;
/** Observations needed when the modulus is supplied. */
export const MIN_SAMPLES_KNOWN_MODULUS = 3;

function fail(reason: CrackFailureReason, message: string, logger: LcgLogger | null): CrackResult {
    logger?.warn?.(`[crack] ${reason}: ${message}`);
    return { ok: false, reason, message };
}

function recoverModulus(diffs: bigint[]): bigint {
    let modulus = 0n;
    for (let i = 0; i + 2 < diffs.length; i++) {
        const z = diffs[i + 2] * diffs[i] - diffs[i + 1] * diffs[i + 1];
        modulus = ModularMath.gcd(modulus, z);
    }
    return modulus;
}

/**
 * Derives (a, c, m) from consecutive observed states. On success the returned
 * generator sits one step past the last observation, so its `next()` yields
 * the first unseen value.
 */
export function crackLcg(values: ReadonlyArray<IntegerLike>, options: CrackOptions = {}): CrackResult {
    const logger = options.logger ?? null;
    const knownModulus = options.modulus;
    const floor = knownModulus === undefined ? MIN_SAMPLES_BLIND : MIN_SAMPLES_KNOWN_MODULUS;
    const requested = options.minSamples;
    const required = requested !== undefined && Number.isInteger(requested) ? Math.max(floor, requested) : floor;

    if (values.length < required) {
        return fail('insufficient-samples', `need at least ${required} observations, got ${values.length}`, logger);
    }

    const samples: bigint[] = [];
    for (let i = 0; i < values.length; i++) {
        const lifted = ModularMath.toBigInt(values[i]);
        if (lifted === null) {
            return fail('invalid-sample', `observation ${i} is not an integer: ${String(values[i])}`, logger);
        }
        samples.push(lifted);
    }

    const diffs: bigint[] = [];
    for (let i = 0; i + 1 < samples.length; i++) {
        diffs.push(samples[i + 1] - samples[i]);
    }

    let m: bigint;
    if (knownModulus === undefined) {
        m = recoverModulus(diffs);
    } else {
        const lifted = ModularMath.toBigInt(knownModulus);
        if (lifted === null) {
            return fail('invalid-sample', `supplied modulus is not an integer: ${String(knownModulus)}`, logger);
        }
        m = lifted;
    }

    if (m <= 1n) {
        return fail('degenerate-modulus', `modulus candidate ${m} is not greater than 1`, logger);
    }

    const inverse = ModularMath.modInverse(diffs[0], m);
    if (inverse === null) {
        return fail('non-invertible', `first difference ${diffs[0]} has no inverse modulo candidate ${m}`, logger);
    }

    const a = ModularMath.mod(diffs[1] * inverse, m);
    const c = ModularMath.mod(samples[1] - a * samples[0], m);

    const replay = new LCG({ state: samples[0], a, c, m });
    for (let i = 0; i < samples.length; i++) {
        const produced = replay.next();
        if (produced !== samples[i]) {
            return fail(
                'inconsistent-sequence',
                `replay of a=${a} c=${c} m=${m} produced ${produced} at index ${i}, observed ${samples[i]}`,
                logger
            );
        }
    }

    logger?.info?.(`[crack] recovered a=${a} c=${c} m=${m} from ${samples.length} observations`);
    return { ok: true, generator: replay };
}

/**
 * Unwraps a crack outcome, throwing CrackError on failure.
 */
export function unwrapCrack(result: CrackResult): LCG {
    if (!result.ok) {
        throw new CrackError(result.message, result.reason);
    }
    return result.generator;
}
