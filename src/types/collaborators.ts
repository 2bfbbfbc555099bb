import type {
    AddressableTarget,
    Channel,
    Identity,
    Job,
    JobStatus,
    PositionedRecipient,
    Route,
    Template,
} from './dispatch.js';

/** Holds sender identities and opens channels for them. */
export interface IdentityPool {
    /** Identities for the given handles, in the order given. Unknown handles are dropped. */
    listByHandles(handles: readonly string[]): Identity[];
    /** Open a channel for the identity. Throws `IdentityUnavailableError` when it cannot. */
    acquireChannel(identity: Identity): Promise<Channel>;
    releaseChannel(identity: Identity): Promise<void>;
    recordUsage(identity: Identity, success: boolean): void;
}

export interface RoutePool {
    get(routeId: string): Route | undefined;
}

export interface RecipientSetStore {
    /** Lazily yield valid recipients in set order, starting at `fromPosition`. */
    validTargetsInOrder(setId: string, fromPosition?: number): Iterable<PositionedRecipient>;
    countValid(setId: string, fromPosition?: number): number;
    markInvalid(setId: string, identifier: string, reason: string): void;
    isBlacklisted(identifier: string): boolean;
    /** Remember what a recipient resolved to, when the store keeps that. */
    markResolved?(setId: string, position: number, target: AddressableTarget): void;
}

export interface TemplateStore {
    get(templateId: string): Template | undefined;
}

/** Opens a transport-level channel for an identity, through its route when it has one. */
export type ChannelConnector = (identity: Identity, route: Route | undefined) => Promise<Channel>;

/** Durable storage boundary for job records. */
export interface JobRepository {
    save(job: Job): void;
    get(jobId: string): Job | undefined;
    list(status?: JobStatus): Job[];
    delete(jobId: string): boolean;
}
