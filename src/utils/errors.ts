import { HttpException, HttpStatus } from '@nestjs/common';

export type TutorErrorCode =
    | 'EmptyDocument'
    | 'UnsupportedFormat'
    | 'DimensionMismatch'
    | 'EmbeddingUnavailable'
    | 'UpstreamTimeout'
    | 'GenerationUnavailable'
    | 'InvalidQuery'
    | 'Internal';

const PUBLIC_MESSAGES: Record<TutorErrorCode, string> = {
    EmptyDocument: 'The document contains no readable text.',
    UnsupportedFormat: 'This file format is not supported.',
    DimensionMismatch: 'The embedding does not match the index dimensionality.',
    EmbeddingUnavailable: 'The embedding service is unavailable right now. Please try again later.',
    UpstreamTimeout: 'The request took too long to complete. Please try again.',
    GenerationUnavailable: 'The answer service is unavailable right now.',
    InvalidQuery: 'Please enter a question.',
    Internal: 'Sorry, something went wrong while processing your request.',
};

const HTTP_STATUSES: Record<TutorErrorCode, HttpStatus> = {
    EmptyDocument: HttpStatus.BAD_REQUEST,
    UnsupportedFormat: HttpStatus.UNSUPPORTED_MEDIA_TYPE,
    DimensionMismatch: HttpStatus.UNPROCESSABLE_ENTITY,
    EmbeddingUnavailable: HttpStatus.SERVICE_UNAVAILABLE,
    UpstreamTimeout: HttpStatus.GATEWAY_TIMEOUT,
    GenerationUnavailable: HttpStatus.SERVICE_UNAVAILABLE,
    InvalidQuery: HttpStatus.BAD_REQUEST,
    Internal: HttpStatus.INTERNAL_SERVER_ERROR,
};

/**
 * Base class of every failure the tutor reports. `message` is for logs;
 * `publicMessage` is the only text that ever reaches a client.
 */
export class TutorError extends Error {
    constructor(readonly code: TutorErrorCode, message: string, cause?: unknown) {
        super(message, cause ? { cause } : undefined);
        this.name = 'TutorError';
    }

    get publicMessage(): string {
        return PUBLIC_MESSAGES[this.code];
    }
}

export class EmptyDocumentError extends TutorError {
    constructor(filename: string) {
        super('EmptyDocument', `Document "${filename}" is blank after normalization`);
        this.name = 'EmptyDocumentError';
    }
}

export class UnsupportedFormatError extends TutorError {
    constructor(format: string) {
        super('UnsupportedFormat', `No text extraction for format "${format}"`);
        this.name = 'UnsupportedFormatError';
    }
}

export class DimensionMismatchError extends TutorError {
    constructor(readonly expected: number, readonly actual: number) {
        super('DimensionMismatch', `Expected vectors of length ${expected}, got ${actual}`);
        this.name = 'DimensionMismatchError';
    }
}

export class EmbeddingUnavailableError extends TutorError {
    constructor(detail: string, cause?: unknown) {
        super('EmbeddingUnavailable', `Embedding failed: ${detail}`, cause);
        this.name = 'EmbeddingUnavailableError';
    }
}

export class UpstreamTimeoutError extends TutorError {
    constructor(readonly stage: 'embedding' | 'generation', readonly timeoutMs: number) {
        super('UpstreamTimeout', `${stage} call exceeded ${timeoutMs}ms`);
        this.name = 'UpstreamTimeoutError';
    }
}

export class GenerationUnavailableError extends TutorError {
    constructor(detail: string, cause?: unknown) {
        super('GenerationUnavailable', `Generation failed: ${detail}`, cause);
        this.name = 'GenerationUnavailableError';
    }
}

export class InvalidQueryError extends TutorError {
    constructor(detail = 'question is empty') {
        super('InvalidQuery', `Invalid query: ${detail}`);
        this.name = 'InvalidQueryError';
    }
}

export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export function toTutorError(err: unknown): TutorError {
    if (err instanceof TutorError) return err;
    return new TutorError('Internal', describeError(err), err);
}

export function toHttpException(err: unknown): HttpException {
    if (err instanceof HttpException) return err;
    const failure = toTutorError(err);
    return new HttpException({ error: failure.code, message: failure.publicMessage }, HTTP_STATUSES[failure.code], { cause: failure });
}
