// src/services/assignment-client.ts
// Posts "assign these geounits to that district" to the plan server.

import type { BusyTracker } from '../utils/busy-tracker';

export interface AssignmentRequest {
    planId: string;
    districtId: string;
    geolevelId: string;
    geounitIds: readonly string[];
}

export type AssignmentFailureReason = 'rejected' | 'malformed' | 'http' | 'network';

export type AssignmentResult =
    | { ok: true; message: string | null }
    | { ok: false; reason: AssignmentFailureReason; message: string };

export interface AssignmentClientOptions {
    /** Prefix of the plan server, '' for same origin */
    baseUrl?: string;
    /** Sent as X-CSRFToken when set */
    csrfToken?: string;
    /** Raised while a request is in flight */
    busy?: BusyTracker;
}

/**
 * One request per call, no retry. Never throws: every outcome is an AssignmentResult.
 */
export class AssignmentClient {
    private readonly baseUrl: string;

    constructor(private readonly options: AssignmentClientOptions = {}) {
        this.baseUrl = (options.baseUrl ?? '').replace(/\/+$/, '');
    }

    buildUrl(planId: string, districtId: string): string {
        return `${this.baseUrl}/districtmapping/plan/${encodeURIComponent(planId)}/district/${encodeURIComponent(districtId)}/add`;
    }

    /** Form body: `geolevel` and the pipe-delimited `geounits`. */
    buildBody(request: AssignmentRequest): URLSearchParams {
        return new URLSearchParams({
            geolevel: request.geolevelId,
            geounits: request.geounitIds.join('|')
        });
    }

    async assign(request: AssignmentRequest): Promise<AssignmentResult> {
        const release = this.options.busy?.acquire();
        try {
            return await this.post(request);
        } finally {
            release?.();
        }
    }

    private async post(request: AssignmentRequest): Promise<AssignmentResult> {
        const headers: Record<string, string> = {
            'Content-Type': 'application/x-www-form-urlencoded; charset=UTF-8',
            'Accept': 'application/json'
        };
        if (this.options.csrfToken) {
            headers['X-CSRFToken'] = this.options.csrfToken;
        }

        let response: Response;
        try {
            response = await fetch(this.buildUrl(request.planId, request.districtId), {
                method: 'POST',
                headers,
                body: this.buildBody(request).toString()
            });
        } catch (error) {
            console.error('[assignment] Request failed:', error);
            return { ok: false, reason: 'network', message: 'failed to select' };
        }

        if (!response.ok) {
            console.error(`[assignment] Server answered ${response.status} ${response.statusText}`);
            return { ok: false, reason: 'http', message: `failed to select (${response.status})` };
        }

        let payload: unknown;
        try {
            payload = await response.json();
        } catch {
            return { ok: false, reason: 'malformed', message: 'failed to select (unreadable response)' };
        }

        if (!isObject(payload) || typeof payload.success !== 'boolean') {
            return { ok: false, reason: 'malformed', message: 'failed to select (unreadable response)' };
        }

        const message = typeof payload.message === 'string' ? payload.message : null;
        if (!payload.success) {
            return { ok: false, reason: 'rejected', message: message ?? 'failed to select' };
        }
        return { ok: true, message };
    }
}

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
