/**
 * BodyParser - reads JSON request bodies with a size limit.
 */

import { IncomingMessage } from 'http';
import { ApiError } from '../../shared/errors/ApiError.js';

export const DEFAULT_MAX_BODY_BYTES = 1_048_576;

export class BodyParser {
    constructor(private readonly maxBytes: number = DEFAULT_MAX_BODY_BYTES) { }

    /**
     * Read and parse the body. An empty body reads as `{}`.
     * Rejects with PAYLOAD_TOO_LARGE past the limit and VALIDATION_ERROR
     * on malformed JSON.
     */
    read(req: IncomingMessage): Promise<unknown> {
        const declaredLength = Number(req.headers['content-length']);
        if (Number.isFinite(declaredLength) && declaredLength > this.maxBytes) {
            return Promise.reject(ApiError.payloadTooLarge(this.maxBytes));
        }

        return new Promise((resolve, reject) => {
            const chunks: Buffer[] = [];
            let received = 0;
            let rejected = false;

            req.on('data', (chunk: Buffer | string) => {
                if (rejected) return;
                const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
                received += buffer.length;
                if (received > this.maxBytes) {
                    rejected = true;
                    reject(ApiError.payloadTooLarge(this.maxBytes));
                    return;
                }
                chunks.push(buffer);
            });
            req.on('end', () => {
                if (rejected) return;
                const body = Buffer.concat(chunks).toString('utf8');
                if (body.trim() === '') {
                    resolve({});
                    return;
                }
                try {
                    resolve(JSON.parse(body));
                } catch {
                    reject(ApiError.validation('Request body must be valid JSON'));
                }
            });
            req.on('error', reject);
        });
    }
}
