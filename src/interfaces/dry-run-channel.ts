import type { ChannelConnector } from '../types/collaborators.js';
import type {
    AddressableTarget,
    Channel,
    DeliveryOutcome,
    Identity,
    Recipient,
    RenderedContent,
    Route,
} from '../types/dispatch.js';
import { logThought } from '../utils/logger.js';
import { connectionString } from '../services/route-pool.js';

function summarize(content: RenderedContent): string {
    switch (content.mode) {
        case 'text':
            return `text (${content.text.length} chars, ${content.buttons.length} buttons)`;
        case 'media':
            return `${content.mediaKind} ${content.mediaRef}`;
        case 'forward':
            return `forward ${content.fromChannel}/${content.messageId}`;
    }
}

/**
 * Channel that accepts every delivery without contacting a provider.
 * Every resolve and delivery is written to the daily log.
 */
export class DryRunChannel implements Channel {
    readonly #identity: Identity;
    #sequence = 0;

    constructor(identity: Identity) {
        this.#identity = identity;
    }

    async resolve(recipient: Recipient): Promise<AddressableTarget | null> {
        if (recipient.resolvedId) {
            return { id: recipient.resolvedId, handle: recipient.resolvedHandle };
        }
        if (recipient.kind === 'handle') {
            return { id: `handle:${recipient.identifier.toLowerCase()}`, handle: recipient.identifier };
        }
        return { id: recipient.identifier };
    }

    async deliver(target: AddressableTarget, content: RenderedContent): Promise<DeliveryOutcome> {
        this.#sequence++;
        const messageId = `dry_${this.#identity.handle}_${this.#sequence}`;
        await logThought(`[DryRun] ${this.#identity.handle} → ${target.handle ?? target.id}: ${summarize(content)}`);
        return { kind: 'delivered', messageId };
    }

    async close(): Promise<void> {
        await logThought(`[DryRun] Closed channel for ${this.#identity.handle} after ${this.#sequence} deliveries.`);
    }
}

/** Connector that opens {@link DryRunChannel}s. */
export const dryRunConnector: ChannelConnector = async (identity: Identity, route: Route | undefined) => {
    const via = route ? ` via ${connectionString(route)}` : '';
    await logThought(`[DryRun] Opened channel for ${identity.handle}${via}.`);
    return new DryRunChannel(identity);
};
