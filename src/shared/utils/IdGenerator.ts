import { randomUUID } from 'crypto';

/**
 * Generates opaque identifiers for records, requests and correlation ids.
 */
export class IdGenerator {
    static generate(): string {
        return randomUUID();
    }
}
