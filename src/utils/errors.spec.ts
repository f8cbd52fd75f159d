import { ConflictException, HttpStatus } from '@nestjs/common';
import {
    DimensionMismatchError,
    EmbeddingUnavailableError,
    InvalidQueryError,
    TutorError,
    UnsupportedFormatError,
    UpstreamTimeoutError,
    toHttpException,
    toTutorError,
} from './errors';

describe('errors', () => {
    it('keeps internal detail out of the public message', () => {
        const error = new EmbeddingUnavailableError('API key test-secret rejected');

        expect(error.code).toBe('EmbeddingUnavailable');
        expect(error.message).toBe('Embedding failed: API key test-secret rejected');
        expect(error.publicMessage).toBe('The embedding service is unavailable right now. Please try again later.');
    });

    it('wraps unknown failures as Internal', () => {
        const cause = new Error('socket hang up');
        const error = toTutorError(cause);

        expect(error).toBeInstanceOf(TutorError);
        expect(error.code).toBe('Internal');
        expect(error.cause).toBe(cause);
        expect(toTutorError('boom').message).toBe('boom');
    });

    it.each([
        [new InvalidQueryError(), HttpStatus.BAD_REQUEST, 'InvalidQuery'],
        [new UnsupportedFormatError('.pptx'), HttpStatus.UNSUPPORTED_MEDIA_TYPE, 'UnsupportedFormat'],
        [new DimensionMismatchError(3, 2), HttpStatus.UNPROCESSABLE_ENTITY, 'DimensionMismatch'],
        [new UpstreamTimeoutError('generation', 50), HttpStatus.GATEWAY_TIMEOUT, 'UpstreamTimeout'],
        [new Error('disk full'), HttpStatus.INTERNAL_SERVER_ERROR, 'Internal'],
    ])('maps %s to an HTTP status', (error, status, code) => {
        const exception = toHttpException(error);

        expect(exception.getStatus()).toBe(status);
        expect(exception.getResponse()).toEqual({ error: code, message: toTutorError(error).publicMessage });
    });

    it('passes HTTP exceptions through', () => {
        const conflict = new ConflictException('Document doc-1 already exists');

        expect(toHttpException(conflict)).toBe(conflict);
    });
});
