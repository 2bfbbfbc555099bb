import type { Request, Response } from 'express';
import type { SqliteRecipientStore } from '../../services/recipient-store.js';
import { mapError, sendError, sendOk } from '../shared.js';

export interface RecipientDeps {
    recipients: SqliteRecipientStore;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** POST /recipient-sets — Import a recipient set from newline-separated text. */
export function handleImportRecipients(deps: RecipientDeps) {
    return (req: Request, res: Response): void => {
        const body: unknown = req.body;
        if (!isRecord(body) || typeof body.name !== 'string' || !body.name.trim() || typeof body.text !== 'string') {
            sendError(res, "Expected a JSON body with string fields 'name' and 'text'.", 400);
            return;
        }

        try {
            sendOk(res, deps.recipients.importFromText(body.name.trim(), body.text), 201);
        } catch (err) {
            const { status, message } = mapError(err);
            sendError(res, message, status);
        }
    };
}

/** GET /recipient-sets — Summaries of every set. */
export function handleListRecipientSets(deps: RecipientDeps) {
    return (_req: Request, res: Response): void => {
        sendOk(res, { sets: deps.recipients.listSets() });
    };
}

/** GET /recipient-sets/:id/stats */
export function handleRecipientStats(deps: RecipientDeps) {
    return (req: Request, res: Response): void => {
        const setId = req.params.id ?? '';
        if (!deps.recipients.hasSet(setId)) {
            sendError(res, `Recipient set '${setId}' does not exist.`, 404);
            return;
        }
        sendOk(res, deps.recipients.getStats(setId));
    };
}

/** GET /blacklist */
export function handleListBlacklist(deps: RecipientDeps) {
    return (_req: Request, res: Response): void => {
        sendOk(res, { identifiers: deps.recipients.listBlacklist() });
    };
}

/** POST /blacklist — Blacklist an identifier and invalidate it in every set. */
export function handleAddToBlacklist(deps: RecipientDeps) {
    return (req: Request, res: Response): void => {
        const body: unknown = req.body;
        if (!isRecord(body) || typeof body.identifier !== 'string' || !body.identifier.trim()) {
            sendError(res, "Expected a JSON body with a non-empty 'identifier'.", 400);
            return;
        }

        const added = deps.recipients.addToBlacklist(body.identifier);
        sendOk(res, { identifier: body.identifier.trim(), added }, added ? 201 : 200);
    };
}
