import { InvalidInputError } from '../errors/InvalidInputError.js';

export const MAX_SUBJECT_ID_LENGTH = 128;

const SUBJECT_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._:-]*$/;

/**
 * Validate a subject id as it appears in a route.
 * Letters, digits, `.`, `_`, `:` and `-`, starting with a letter or digit.
 */
export function parseSubjectId(value: unknown): string {
    if (typeof value !== 'string' || value.trim() === '') {
        throw new InvalidInputError('Subject id is required', 'subjectId', value);
    }
    const subjectId = value.trim();
    if (subjectId.length > MAX_SUBJECT_ID_LENGTH) {
        throw new InvalidInputError(
            `Subject id must be at most ${MAX_SUBJECT_ID_LENGTH} characters`,
            'subjectId',
            value
        );
    }
    if (!SUBJECT_ID_PATTERN.test(subjectId)) {
        throw new InvalidInputError(
            'Subject id may only contain letters, digits, ".", "_", ":" and "-"',
            'subjectId',
            value
        );
    }
    return subjectId;
}
