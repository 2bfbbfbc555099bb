import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import type { IdentityRegistry, IdentityInput } from '../services/identity-pool.js';
import { parseRouteString, type RouteInput, type RouteRegistry } from '../services/route-pool.js';
import type { TemplateInput, TemplateRegistry } from '../services/template-store.js';
import type { IdentityStatus, MediaKind } from '../types/dispatch.js';

/**
 * Shape of `data/workspace.json`: the identities, routes and templates the
 * dispatch service starts with.
 */
export interface WorkspaceFile {
    routes: RouteInput[];
    identities: IdentityInput[];
    templates: TemplateInput[];
}

export interface WorkspaceTargets {
    routes: RouteRegistry;
    identities: IdentityRegistry;
    templates: TemplateRegistry;
}

export interface WorkspaceLoadSummary {
    path: string;
    found: boolean;
    routes: number;
    identities: number;
    templates: number;
}

const IDENTITY_STATUSES: readonly IdentityStatus[] = ['unknown', 'active', 'restricted', 'banned', 'invalid'];
const MEDIA_KINDS: readonly MediaKind[] = ['photo', 'document', 'video'];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(record: Record<string, unknown>, key: string): string | undefined {
    const value = record[key];
    return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function entries(root: Record<string, unknown>, key: string): unknown[] {
    const value = root[key];
    if (value === undefined) return [];
    if (!Array.isArray(value)) {
        throw new Error(`[Workspace] '${key}' must be an array.`);
    }
    return value;
}

function parseRoute(entry: unknown, index: number): RouteInput {
    if (typeof entry === 'string') {
        const parsed = parseRouteString(entry);
        if (!parsed) throw new Error(`[Workspace] routes[${index}] is not a valid route string.`);
        return parsed;
    }
    if (!isRecord(entry)) throw new Error(`[Workspace] routes[${index}] must be a string or an object.`);

    const { transport, host, port } = entry;
    if (transport !== 'http' && transport !== 'socks5') {
        throw new Error(`[Workspace] routes[${index}].transport must be 'http' or 'socks5'.`);
    }
    if (typeof host !== 'string' || !host || typeof port !== 'number') {
        throw new Error(`[Workspace] routes[${index}] needs a host and a numeric port.`);
    }

    return {
        id: optionalString(entry, 'id'),
        transport,
        host,
        port,
        username: optionalString(entry, 'username'),
        password: optionalString(entry, 'password'),
        isActive: typeof entry.isActive === 'boolean' ? entry.isActive : undefined,
    };
}

function parseIdentity(entry: unknown, index: number): IdentityInput {
    if (!isRecord(entry) || typeof entry.handle !== 'string' || !entry.handle) {
        throw new Error(`[Workspace] identities[${index}] needs a 'handle'.`);
    }

    const status = IDENTITY_STATUSES.find((candidate) => candidate === entry.status);
    return {
        handle: entry.handle,
        displayName: optionalString(entry, 'displayName'),
        publicId: optionalString(entry, 'publicId'),
        canSend: typeof entry.canSend === 'boolean' ? entry.canSend : undefined,
        status,
        routeId: optionalString(entry, 'routeId'),
    };
}

function parseTemplate(entry: unknown, index: number): TemplateInput {
    if (!isRecord(entry) || typeof entry.name !== 'string' || !entry.name) {
        throw new Error(`[Workspace] templates[${index}] needs a 'name'.`);
    }

    const buttons = Array.isArray(entry.buttons)
        ? entry.buttons.filter(isRecord).flatMap((button) => {
            const url = optionalString(button, 'url');
            if (!url) return [];
            return [{ label: optionalString(button, 'label') ?? optionalString(button, 'text'), url }];
        })
        : undefined;

    return {
        id: optionalString(entry, 'id'),
        name: entry.name,
        text: optionalString(entry, 'text'),
        mediaKind: MEDIA_KINDS.find((kind) => kind === entry.mediaKind),
        mediaRef: optionalString(entry, 'mediaRef'),
        forwardFromChannel: optionalString(entry, 'forwardFromChannel'),
        forwardMessageId: typeof entry.forwardMessageId === 'number' ? entry.forwardMessageId : undefined,
        buttons,
        createdAt: optionalString(entry, 'createdAt'),
    };
}

/** Validate a parsed workspace document. */
export function parseWorkspace(document: unknown): WorkspaceFile {
    if (!isRecord(document)) {
        throw new Error('[Workspace] Workspace file must contain a JSON object.');
    }
    return {
        routes: entries(document, 'routes').map(parseRoute),
        identities: entries(document, 'identities').map(parseIdentity),
        templates: entries(document, 'templates').map(parseTemplate),
    };
}

/** Load the workspace file into the registries. A missing file loads nothing. */
export function loadWorkspace(filePath: string, targets: WorkspaceTargets): WorkspaceLoadSummary {
    const resolved = path.resolve(filePath);
    if (!existsSync(resolved)) {
        return { path: resolved, found: false, routes: 0, identities: 0, templates: 0 };
    }

    let document: unknown;
    try {
        document = JSON.parse(readFileSync(resolved, 'utf8'));
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new Error(`[Workspace] Failed to parse ${resolved}: ${reason}`);
    }

    const workspace = parseWorkspace(document);
    workspace.routes.forEach((route) => targets.routes.add(route));
    workspace.identities.forEach((identity) => targets.identities.register(identity));
    workspace.templates.forEach((template) => targets.templates.register(template));

    return {
        path: resolved,
        found: true,
        routes: workspace.routes.length,
        identities: workspace.identities.length,
        templates: workspace.templates.length,
    };
}
