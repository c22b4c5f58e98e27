import * as crypto from 'crypto';

/**
 * Canonical form of free text before hashing: NFC, trimmed, single spaces.
 */
export function normalizeText(text: string): string {
    return text.normalize('NFC').trim().replace(/\s+/g, ' ');
}

/**
 * Content hash identifying one (question, answer, pipeline version) triple.
 *
 * The normalized values are hashed as a JSON array, so text containing a
 * separator still maps to a distinct payload.
 */
export function computeFingerprint(questionContext: string, candidateAnswer: string, pipelineVersion: string): string {
    const payload = JSON.stringify([
        normalizeText(questionContext),
        normalizeText(candidateAnswer),
        pipelineVersion
    ]);

    return crypto.createHash('sha256').update(payload, 'utf8').digest('hex');
}

export function buildCacheKey(prefix: string, fingerprint: string): string {
    return `${prefix}${fingerprint}`;
}
