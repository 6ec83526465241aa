/**
 * LCG toolkit public API
 *
 * @module lcg-toolkit
 */

import { LCG } from './lcg/generator.js';
import { crackLcg, unwrapCrack } from './lcg/crack.js';
import { InvalidParameterError } from './lcg/errors.js';
import { LCG_PRESETS } from './lcg/types.js';
import type { CrackOptions, CrackResult, IntegerLike, LcgInit, LcgPreset } from './lcg/types.js';

export type {
    CrackOptions,
    CrackResult,
    CrackFailureReason,
    IntegerLike,
    LcgInit,
    LcgLogger as Logger,
    LcgParams,
    LcgPreset,
} from './lcg/types.js';
export { LCG_PRESETS } from './lcg/types.js';
export { LCG } from './lcg/generator.js';
export { crackLcg, unwrapCrack, MIN_SAMPLES_BLIND, MIN_SAMPLES_KNOWN_MODULUS } from './lcg/crack.js';
export { ModularMath } from './lcg/modular-math.js';
export type { ExtendedGcd } from './lcg/modular-math.js';
export { LcgError, InvalidParameterError, CrackError } from './lcg/errors.js';

function isPreset(name: string): name is LcgPreset {
    return Object.prototype.hasOwnProperty.call(LCG_PRESETS, name);
}

export const Lcg = {
    /**
     * Builds a generator from known parameters.
     */
    create: (init: LcgInit): LCG => new LCG(init),

    /**
     * Builds a generator from one of the well-known parameter sets.
     */
    fromPreset: (preset: LcgPreset | string, seed: IntegerLike): LCG => {
        if (!isPreset(preset)) {
            throw new InvalidParameterError(`Unknown LCG preset '${preset}'`);
        }
        return new LCG({ state: seed, ...LCG_PRESETS[preset] });
    },

    /**
     * Recovers a generator from consecutive observed states. Never throws.
     */
    crack: (values: ReadonlyArray<IntegerLike>, options?: CrackOptions): CrackResult => crackLcg(values, options),

    /**
     * Same as `crack`, but throws CrackError instead of returning a failure.
     */
    crackOrThrow: (values: ReadonlyArray<IntegerLike>, options?: CrackOptions): LCG =>
        unwrapCrack(crackLcg(values, options)),

    Generator: LCG,

    presets: LCG_PRESETS,
};

export default Lcg;
