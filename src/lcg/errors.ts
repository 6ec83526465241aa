import type { CrackFailureReason } from './types.js';

export class LcgError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'LcgError';
    }
}

export class InvalidParameterError extends LcgError {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidParameterError';
    }
}

export class CrackError extends LcgError {
    constructor(message: string, public readonly reason: CrackFailureReason) {
        super(message);
        this.name = 'CrackError';
    }
}
