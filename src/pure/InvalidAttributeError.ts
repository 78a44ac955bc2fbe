export class InvalidAttributeError extends Error {
    constructor(readonly attribute: string, readonly value: unknown, expectation: string) {
        super(`${attribute} must be ${expectation}, got ${String(value)}`);
        this.name = 'InvalidAttributeError';
    }
}
