/**
 * Raised when an activity date, count or calculation option cannot be
 * parsed or normalized. Never caught and skipped inside the domain: a
 * dropped date would change the streak.
 */
export class InvalidInputError extends Error {
    readonly code = 'INVALID_INPUT';

    constructor(
        message: string,
        readonly field?: string,
        readonly value?: unknown
    ) {
        super(message);
        this.name = 'InvalidInputError';
        Object.setPrototypeOf(this, InvalidInputError.prototype);
    }

    /**
     * Error for the entry at `index` of an input collection.
     */
    static atIndex(index: number, value: unknown, reason: string): InvalidInputError {
        return new InvalidInputError(`Invalid activity date at index ${index}: ${reason}`, `dates[${index}]`, value);
    }

    /**
     * Error for a named option.
     */
    static forOption(option: string, value: unknown, reason: string): InvalidInputError {
        return new InvalidInputError(`Invalid option ${option}: ${reason}`, option, value);
    }
}
