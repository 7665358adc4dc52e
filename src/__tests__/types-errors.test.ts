import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, isErrorResult } from '../types/index.js';
import {
    ExtractionError,
    InvalidProviderError,
    NotFoundError,
    RetrievalError,
    UpstreamRequestError,
    errorMessage,
} from '../utils/errors.js';

describe('Types', () => {
    describe('isErrorResult', () => {
        it('should recognize error values', () => {
            expect(isErrorResult({ status: 'error', message: 'x', metadata: {} })).toBe(true);
        });

        it('should reject records and success values', () => {
            expect(isErrorResult({ id: '1', title: 't' })).toBe(false);
            expect(isErrorResult({ status: 'success' })).toBe(false);
        });
    });

    describe('DEFAULT_CONFIG', () => {
        it('should use the documented timeouts', () => {
            expect(DEFAULT_CONFIG.timeouts).toEqual({ existenceCheck: 10000, request: 30000, download: 60000 });
        });

        it('should point at the public APIs', () => {
            expect(DEFAULT_CONFIG.endpoints.arxivApi).toBe('https://export.arxiv.org/api/query');
            expect(DEFAULT_CONFIG.endpoints.osfApi).toBe('https://api.osf.io/v2');
            expect(DEFAULT_CONFIG.endpoints.openalexApi).toBe('https://api.openalex.org');
        });

        it('should have no contact email by default', () => {
            expect(DEFAULT_CONFIG.email).toBeUndefined();
        });
    });
});

describe('Errors', () => {
    it('should tag each error with its kind', () => {
        expect(new NotFoundError('missing').kind).toBe('not_found');
        expect(new UpstreamRequestError('down').kind).toBe('upstream_request');
        expect(new ExtractionError('empty').kind).toBe('extraction');
    });

    it('should keep the wrapped cause', () => {
        const cause = new Error('socket hang up');
        expect(new UpstreamRequestError('Request failed', cause).cause).toBe(cause);
    });

    it('should list valid ids for an invalid provider', () => {
        const error = new InvalidProviderError('nope', ['arxiv', 'osf']);

        expect(error).toBeInstanceOf(RetrievalError);
        expect(error.message).toBe('Invalid provider: nope. Valid providers: arxiv, osf');
        expect(error.validIds).toEqual(['arxiv', 'osf']);
        expect(error.kind).toBe('invalid_provider');
    });

    it('should read messages from unknown thrown values', () => {
        expect(errorMessage(new Error('boom'))).toBe('boom');
        expect(errorMessage('plain')).toBe('plain');
    });
});
