import type { ChannelConnector, IdentityPool, RoutePool } from '../types/collaborators.js';
import type { Channel, Identity, IdentityStatus } from '../types/dispatch.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';
import { IdentityUnavailableError } from './job-errors.js';

export interface IdentityInput {
    handle: string;
    displayName?: string;
    publicId?: string;
    canSend?: boolean;
    status?: IdentityStatus;
    routeId?: string;
}

const UNUSABLE_STATUSES: readonly IdentityStatus[] = ['banned', 'invalid'];

function describe(err: unknown): string {
    return scrubSensitiveText(err instanceof Error ? err.message : String(err));
}

/**
 * Registry of sender identities and the channels currently open for them.
 *
 * An identity whose route is missing or inactive is unavailable; so is a
 * banned, invalid or send-restricted identity.
 */
export class IdentityRegistry implements IdentityPool {
    readonly #identities = new Map<string, Identity>();
    readonly #channels = new Map<string, Channel>();
    readonly #routes: RoutePool;
    readonly #connect: ChannelConnector;

    constructor(routes: RoutePool, connect: ChannelConnector) {
        this.#routes = routes;
        this.#connect = connect;
    }

    register(input: IdentityInput): Identity {
        if (this.#identities.has(input.handle)) {
            throw new Error(`[IdentityPool] Identity '${input.handle}' is already registered.`);
        }

        const identity: Identity = {
            handle: input.handle,
            displayName: input.displayName,
            publicId: input.publicId,
            canSend: input.canSend ?? true,
            status: input.status ?? 'unknown',
            routeId: input.routeId,
            sentCount: 0,
            errorCount: 0,
        };
        this.#identities.set(identity.handle, identity);
        return identity;
    }

    get(handle: string): Identity | undefined {
        return this.#identities.get(handle);
    }

    list(): Identity[] {
        return [...this.#identities.values()];
    }

    listByHandles(handles: readonly string[]): Identity[] {
        const found: Identity[] = [];
        for (const handle of handles) {
            const identity = this.#identities.get(handle);
            if (identity) found.push(identity);
        }
        return found;
    }

    /** Assign (or clear) the route an identity connects through. */
    assignRoute(handle: string, routeId: string | undefined): boolean {
        const identity = this.#identities.get(handle);
        if (!identity) return false;
        identity.routeId = routeId;
        return true;
    }

    setStatus(handle: string, status: IdentityStatus): boolean {
        const identity = this.#identities.get(handle);
        if (!identity) return false;
        identity.status = status;
        return true;
    }

    async acquireChannel(identity: Identity): Promise<Channel> {
        const open = this.#channels.get(identity.handle);
        if (open) return open;

        if (!identity.canSend) {
            throw new IdentityUnavailableError(identity.handle, 'sending is restricted');
        }
        if (UNUSABLE_STATUSES.includes(identity.status)) {
            throw new IdentityUnavailableError(identity.handle, `status is ${identity.status}`);
        }

        const route = identity.routeId ? this.#routes.get(identity.routeId) : undefined;
        if (identity.routeId && !route) {
            throw new IdentityUnavailableError(identity.handle, `route '${identity.routeId}' does not exist`);
        }
        if (route && !route.isActive) {
            throw new IdentityUnavailableError(identity.handle, `route '${route.id}' is inactive`);
        }

        let channel: Channel;
        try {
            channel = await this.#connect(identity, route);
        } catch (err) {
            throw new IdentityUnavailableError(identity.handle, describe(err));
        }

        this.#channels.set(identity.handle, channel);
        return channel;
    }

    async releaseChannel(identity: Identity): Promise<void> {
        const channel = this.#channels.get(identity.handle);
        if (!channel) return;

        this.#channels.delete(identity.handle);
        if (!channel.close) return;

        try {
            await channel.close();
        } catch (err) {
            const message = `[IdentityPool] Closing channel for '${identity.handle}' failed: ${describe(err)}`;
            console.warn(message);
            await logThought(message);
        }
    }

    /** Release every open channel. */
    async releaseAll(): Promise<void> {
        for (const handle of [...this.#channels.keys()]) {
            const identity = this.#identities.get(handle);
            if (identity) {
                await this.releaseChannel(identity);
            } else {
                this.#channels.delete(handle);
            }
        }
    }

    recordUsage(identity: Identity, success: boolean): void {
        identity.sentCount++;
        if (!success) identity.errorCount++;
        identity.lastUsedAt = new Date().toISOString();
    }
}
