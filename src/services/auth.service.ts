import { timingSafeEqual } from 'crypto';
import type { Authorizer } from '../types';

/**
 * Single shared operator token granting every permission. With no token
 * configured every caller is allowed.
 */
export class ApiTokenAuthorizer implements Authorizer {
    constructor(private readonly apiToken?: string) {}

    async authorize(identity: string | null, _permission: string): Promise<boolean> {
        if (!this.apiToken) {
            return true;
        }
        if (!identity) {
            return false;
        }
        const expected = Buffer.from(this.apiToken);
        const given = Buffer.from(identity);
        return expected.length === given.length && timingSafeEqual(expected, given);
    }
}
