import type { LinkButton, RenderedContent, Template } from '../types/dispatch.js';

/** Values substituted into `{name}` placeholders. `date` and `time` default to the render time. */
export type TemplateVariables = Record<string, string | number | undefined>;

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

/** Local date as `YYYY-MM-DD`. */
export function formatDate(date: Date): string {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Local time as `HH:MM`. */
export function formatTime(date: Date): string {
    return `${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

const PLACEHOLDER = /\{(\w+)\}/g;

/**
 * Replace `{key}` placeholders with their values in one pass; inserted values are not rescanned.
 * Placeholders without a value are left in place.
 */
export function renderTemplate(text: string, variables: TemplateVariables, now: Date = new Date()): string {
    const values: TemplateVariables = {
        date: formatDate(now),
        time: formatTime(now),
        ...variables,
    };

    return text.replace(PLACEHOLDER, (match: string, key: string) => {
        const value = Object.hasOwn(values, key) ? values[key] : undefined;
        return value === undefined ? match : String(value);
    });
}

function buildButtons(buttons: readonly LinkButton[] | undefined): LinkButton[] {
    if (!buttons) return [];
    return buttons
        .filter((button) => button.url.trim().length > 0)
        .map((button) => ({ label: button.label.trim() || 'Link', url: button.url.trim() }));
}

/** Render a template's content for one recipient. Forwards are passed through untouched. */
export function renderContent(template: Template, variables: TemplateVariables, now: Date = new Date()): RenderedContent {
    const { content } = template;

    switch (content.mode) {
        case 'forward':
            return { mode: 'forward', fromChannel: content.fromChannel, messageId: content.messageId };
        case 'media':
            return {
                mode: 'media',
                mediaKind: content.mediaKind,
                mediaRef: content.mediaRef,
                caption: content.caption === undefined ? undefined : renderTemplate(content.caption, variables, now),
                buttons: buildButtons(template.buttons),
            };
        case 'text':
            return {
                mode: 'text',
                text: renderTemplate(content.text, variables, now),
                buttons: buildButtons(template.buttons),
            };
    }
}
