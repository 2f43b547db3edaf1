import { AxiosError, AxiosHeaders, CanceledError } from 'axios';
import { classifyHttpError, isFirewallRejection } from '../../src/clients/http-errors';
import { DownstreamError } from '../../src/errors';
import { httpError } from '../helpers/http';

describe('isFirewallRejection', () => {
    it('treats 406 as a firewall refusal', () => {
        expect(isFirewallRejection(406, undefined)).toBe(true);
    });

    it('needs a firewall signature in a 403 body', () => {
        expect(isFirewallRejection(403, '<h1>Not Acceptable!</h1> An appropriate representation was not found')).toBe(true);
        expect(isFirewallRejection(403, 'Request blocked by ModSecurity')).toBe(true);
        expect(isFirewallRejection(403, 'Sorry, you are not allowed to upload files.')).toBe(false);
    });
});

describe('classifyHttpError', () => {
    it('classifies a WAF rejection as content_rejected', () => {
        const error = classifyHttpError(httpError(406, '<html>Not Acceptable</html>'), 'upload');
        expect(error.kind).toBe('content_rejected');
        expect(error.status).toBe(406);
        expect(error.message).toBe('upload rejected by web application firewall (HTTP 406)');
    });

    it('classifies server errors and throttling as transient', () => {
        expect(classifyHttpError(httpError(503), 'upload').message).toBe('upload failed with HTTP 503: no response body');
        expect(classifyHttpError(httpError(503), 'upload').kind).toBe('transient');
        expect(classifyHttpError(httpError(429, { message: 'slow down' }), 'upload').kind).toBe('transient');
        expect(classifyHttpError(httpError(408), 'upload').kind).toBe('transient');
    });

    it('classifies auth failures without a firewall signature as transient', () => {
        const error = classifyHttpError(httpError(403, { code: 'rest_forbidden' }), 'upload');
        expect(error.kind).toBe('transient');
        expect(error.message).toBe('upload failed with HTTP 403: {"code":"rest_forbidden"}');
        expect(classifyHttpError(httpError(401), 'upload').kind).toBe('transient');
    });

    it('classifies other client errors as permanent', () => {
        const error = classifyHttpError(httpError(400, { code: 'rest_upload_unknown_error' }), 'vision correction');
        expect(error.kind).toBe('permanent');
        expect(error.message).toBe('vision correction failed with HTTP 400: {"code":"rest_upload_unknown_error"}');
    });

    it('truncates long response bodies', () => {
        const error = classifyHttpError(httpError(422, 'x'.repeat(300)), 'upload');
        expect(error.message).toBe(`upload failed with HTTP 422: ${'x'.repeat(200)}…`);
    });

    it('classifies client-side timeouts as timeout and other network failures as transient', () => {
        const config = { headers: new AxiosHeaders() };
        const timedOut = new AxiosError('timeout of 1000ms exceeded', 'ECONNABORTED', config);
        const refused = new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED', config);

        expect(classifyHttpError(timedOut, 'upload')).toMatchObject({
            kind: 'timeout',
            message: 'upload failed: timeout of 1000ms exceeded',
        });
        expect(classifyHttpError(refused, 'upload')).toMatchObject({
            kind: 'transient',
            message: 'upload failed: connect ECONNREFUSED 127.0.0.1:443',
        });
    });

    it('classifies an aborted request as timeout', () => {
        expect(classifyHttpError(new CanceledError(), 'upload')).toMatchObject({
            kind: 'timeout',
            message: 'upload was aborted',
        });
    });

    it('passes downstream errors through and wraps anything else as transient', () => {
        const original = new DownstreamError('corrected image not found: a.jpg', 'permanent');
        expect(classifyHttpError(original, 'upload')).toBe(original);
        expect(classifyHttpError(new Error('socket hang up'), 'upload')).toMatchObject({
            kind: 'transient',
            message: 'upload failed: socket hang up',
        });
    });
});
