import axios, { isAxiosError } from 'axios';
import { DownstreamError } from '../errors';

const FIREWALL_SIGNATURE = /mod_security|modsecurity|not acceptable|firewall/i;

function bodySnippet(data: unknown): string {
    if (data === undefined || data === null || data === '') return 'no response body';
    const text = typeof data === 'string' ? data : JSON.stringify(data);
    return text.length > 200 ? `${text.slice(0, 200)}…` : text;
}

// 406 is how mod_security-style filters refuse a request; some hosts answer 403 with a firewall page.
export function isFirewallRejection(status: number, data: unknown): boolean {
    if (status === 406) return true;
    return status === 403 && typeof data === 'string' && FIREWALL_SIGNATURE.test(data);
}

function isRetryableStatus(status: number): boolean {
    return status === 401 || status === 403 || status === 408 || status === 429 || status >= 500;
}

/**
 * Maps an HTTP client failure onto the downstream error taxonomy.
 * `action` names the call in the message, e.g. "upload" or "vision correction".
 */
export function classifyHttpError(err: unknown, action: string): DownstreamError {
    if (err instanceof DownstreamError) return err;

    if (axios.isCancel(err)) {
        return new DownstreamError(`${action} was aborted`, 'timeout', null, err);
    }

    if (isAxiosError(err)) {
        const status = err.response?.status;

        if (status === undefined) {
            const timedOut = err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT';
            return new DownstreamError(`${action} failed: ${err.message}`, timedOut ? 'timeout' : 'transient', null, err);
        }

        const data: unknown = err.response?.data;
        if (isFirewallRejection(status, data)) {
            return new DownstreamError(
                `${action} rejected by web application firewall (HTTP ${status})`,
                'content_rejected',
                status,
                err,
            );
        }

        return new DownstreamError(
            `${action} failed with HTTP ${status}: ${bodySnippet(data)}`,
            isRetryableStatus(status) ? 'transient' : 'permanent',
            status,
            err,
        );
    }

    const message = err instanceof Error ? err.message : String(err);
    return new DownstreamError(`${action} failed: ${message}`, 'transient', null, err);
}
