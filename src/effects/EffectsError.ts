export class EffectsError extends Error {
    constructor(readonly failures: Error[], readonly effects: string[] = []) {
        super(`${effects.length ? `[${effects.join(', ')}] ` : ''}${failures.map(e => e.message).join('; ')}`);
        this.name = 'EffectsError';
    }
}
