import { randomUUID } from 'node:crypto';
import type { TemplateStore } from '../types/collaborators.js';
import type { LinkButton, MediaKind, Template, TemplateContent } from '../types/dispatch.js';
import { logThought } from '../utils/logger.js';

/** Loose template definition as it appears in the workspace file or an API body. */
export interface TemplateInput {
    id?: string;
    name: string;
    text?: string;
    mediaKind?: MediaKind;
    mediaRef?: string;
    forwardFromChannel?: string;
    forwardMessageId?: number;
    buttons?: Array<{ label?: string; text?: string; url: string }>;
    createdAt?: string;
}

const MEDIA_KINDS: readonly MediaKind[] = ['photo', 'document', 'video'];

function isMediaKind(value: string): value is MediaKind {
    return MEDIA_KINDS.some((kind) => kind === value);
}

/**
 * Pick one content mode from a loose input: forward wins over media, media over text.
 * A media template keeps its text as the caption.
 */
export function normalizeTemplateContent(input: TemplateInput): TemplateContent {
    if (input.forwardFromChannel && input.forwardMessageId !== undefined) {
        return { mode: 'forward', fromChannel: input.forwardFromChannel, messageId: input.forwardMessageId };
    }

    if (input.mediaRef) {
        const mediaKind = input.mediaKind ?? 'photo';
        if (!isMediaKind(mediaKind)) {
            throw new Error(`[TemplateStore] Unsupported media kind '${String(mediaKind)}' in template '${input.name}'.`);
        }
        return { mode: 'media', mediaKind, mediaRef: input.mediaRef, caption: input.text };
    }

    if (input.text !== undefined && input.text.trim().length > 0) {
        return { mode: 'text', text: input.text };
    }

    throw new Error(`[TemplateStore] Template '${input.name}' has no text, media or forward source.`);
}

function normalizeButtons(input: TemplateInput): LinkButton[] | undefined {
    if (!input.buttons || input.buttons.length === 0) return undefined;
    return input.buttons.map((button) => ({ label: button.label ?? button.text ?? 'Link', url: button.url }));
}

/** In-memory template registry. Templates are immutable once registered. */
export class TemplateRegistry implements TemplateStore {
    readonly #templates = new Map<string, Template>();

    register(input: TemplateInput): Template {
        const id = input.id ?? randomUUID().slice(0, 8);
        if (this.#templates.has(id)) {
            throw new Error(`[TemplateStore] Template '${id}' is already registered.`);
        }

        const template: Template = Object.freeze({
            id,
            name: input.name,
            content: Object.freeze(normalizeTemplateContent(input)),
            buttons: normalizeButtons(input),
            createdAt: input.createdAt ?? new Date().toISOString(),
        });

        this.#templates.set(id, template);
        void logThought(`[TemplateStore] Registered ${template.content.mode} template '${template.name}' (${id}).`);
        return template;
    }

    get(templateId: string): Template | undefined {
        return this.#templates.get(templateId);
    }

    list(): Template[] {
        return [...this.#templates.values()];
    }

    remove(templateId: string): boolean {
        return this.#templates.delete(templateId);
    }
}
