import {
    BadRequestError,
    ConnectionError,
    FileReadError,
    InternalServerError,
    isWatsonError,
    NotFoundError,
    ServiceUnavailableError,
    UnauthorizedError,
    UnmappedResponseError,
    WatsonError,
} from '../../../src/domain/errors/WatsonError';
import { errorForStatus, extractServiceMessage } from '../../../src/infrastructure/watson/statusErrors';

describe('WatsonError', () => {
    it('should keep the class name and Error ancestry', () => {
        const error = new NotFoundError({ resourceId: 'cust-1' });

        expect(error).toBeInstanceOf(Error);
        expect(error).toBeInstanceOf(WatsonError);
        expect(error.name).toBe('NotFoundError');
        expect(error.message).toBe('The specified resource cust-1 was not found');
        expect(error.statusCode).toBe(404);
    });

    it('should mark only transient failures as retryable', () => {
        expect(new ConnectionError('socket hang up').retryable).toBe(true);
        expect(new InternalServerError().retryable).toBe(true);
        expect(new ServiceUnavailableError().retryable).toBe(true);
        expect(new BadRequestError().retryable).toBe(false);
        expect(new UnmappedResponseError(418).retryable).toBe(false);
    });

    it('should append the service message to the text', () => {
        const error = new ServiceUnavailableError({ serviceMessage: 'Maintenance window' });

        expect(error.message).toBe('The service is currently unavailable: Maintenance window');
    });

    it('should describe file read failures with the path', () => {
        const error = new FileReadError('/tmp/missing.wav', 'ENOENT: no such file or directory');

        expect(error.message).toBe('There was an error reading the file /tmp/missing.wav: ENOENT: no such file or directory');
    });

    it('should recognize only library errors', () => {
        expect(isWatsonError(new UnmappedResponseError(418))).toBe(true);
        expect(isWatsonError(new Error('plain'))).toBe(false);
        expect(isWatsonError('nope')).toBe(false);
    });

    describe('errorForStatus()', () => {
        it('should map 403 to UnauthorizedError with its own status', () => {
            const error = errorForStatus(403, { resourceId: 'cust-1' });

            expect(error).toBeInstanceOf(UnauthorizedError);
            expect(error.statusCode).toBe(403);
        });

        it.each<[304 | 400 | 404 | 406 | 415 | 500 | 503, string]>([
            [304, 'NotModified'],
            [400, 'BadRequest'],
            [404, 'NotFound'],
            [406, 'NotAcceptable'],
            [415, 'UnsupportedMediaType'],
            [500, 'InternalServerError'],
            [503, 'ServiceUnavailable'],
        ])('should map %i to %s', (status, kind) => {
            const error = errorForStatus(status);

            expect(error.kind).toBe(kind);
            expect(error.statusCode).toBe(status);
        });
    });

    describe('extractServiceMessage()', () => {
        it('should read the error field of a parsed body', () => {
            expect(extractServiceMessage({ code: 404, error: 'Model not found' })).toBe('Model not found');
        });

        it('should read JSON carried in a Buffer', () => {
            expect(extractServiceMessage(Buffer.from('{"error":"Unsupported voice"}'))).toBe('Unsupported voice');
        });

        it('should fall back to IAM style errorMessage', () => {
            expect(extractServiceMessage({ errorCode: 'BXNIM0415E', errorMessage: 'Bad key' })).toBe('Bad key');
        });

        it('should return undefined for bodies without a message', () => {
            expect(extractServiceMessage('Service Unavailable')).toBeUndefined();
            expect(extractServiceMessage('{not json')).toBeUndefined();
            expect(extractServiceMessage(undefined)).toBeUndefined();
            expect(extractServiceMessage({ error: '   ' })).toBeUndefined();
        });
    });
});
