import { randomUUID } from 'node:crypto';
import type { SqliteDatabase } from './db.js';
import type { RecipientSetStore } from '../types/collaborators.js';
import type { AddressableTarget, PositionedRecipient, RecipientKind } from '../types/dispatch.js';
import { logThought } from '../utils/logger.js';

const PAGE_SIZE = 100;
const PHONE_PATTERN = /^\+?\d{10,15}$/;

interface RecipientRow {
    set_id: string;
    position: number;
    identifier: string;
    kind: string;
    resolved_id: string | null;
    resolved_handle: string | null;
    is_valid: number;
    error_reason: string | null;
}

export interface ParsedIdentifier {
    identifier: string;
    kind: RecipientKind;
}

export interface RecipientImportResult {
    setId: string;
    name: string;
    /** Non-empty, non-comment lines read from the source. */
    totalCount: number;
    /** Recipients stored after dedup and blacklist filtering. */
    importedCount: number;
    duplicateCount: number;
    blacklistedCount: number;
}

export interface RecipientSetStats {
    total: number;
    valid: number;
    invalid: number;
    handles: number;
    numericIds: number;
    phones: number;
}

export interface RecipientSetSummary {
    id: string;
    name: string;
    sourceCount: number;
    recipientCount: number;
    createdAt: string;
}

/**
 * Classify a raw identifier line.
 * Digits only → numeric id; `+?` and 10–15 digits (spaces and dashes ignored) → phone;
 * anything else → handle, without a leading `@`.
 */
export function parseRecipientIdentifier(raw: string): ParsedIdentifier {
    const trimmed = raw.trim();

    if (/^\d+$/.test(trimmed)) {
        return { identifier: trimmed, kind: 'numeric-id' };
    }

    const compact = trimmed.replace(/[\s-]/g, '');
    if (PHONE_PATTERN.test(compact)) {
        return { identifier: compact, kind: 'phone' };
    }

    return { identifier: trimmed.startsWith('@') ? trimmed.slice(1) : trimmed, kind: 'handle' };
}

/** Blacklist lookup key: lower-cased, without a leading `@`. */
export function toBlacklistKey(identifier: string): string {
    const lowered = identifier.trim().toLowerCase();
    return lowered.startsWith('@') ? lowered.slice(1) : lowered;
}

function isRecipientKind(value: string): value is RecipientKind {
    return value === 'handle' || value === 'numeric-id' || value === 'phone';
}

function rowToRecipient(row: RecipientRow): PositionedRecipient {
    if (!isRecipientKind(row.kind)) {
        throw new Error(`[RecipientStore] Recipient ${row.set_id}#${row.position} has unknown kind '${row.kind}'.`);
    }

    return {
        setId: row.set_id,
        position: row.position,
        identifier: row.identifier,
        kind: row.kind,
        resolvedId: row.resolved_id ?? undefined,
        resolvedHandle: row.resolved_handle ?? undefined,
        isValid: row.is_valid === 1,
        errorReason: row.error_reason ?? undefined,
    };
}

/**
 * SQLite-backed recipient sets and the global blacklist.
 *
 * Recipients keep the position they were imported at, so a job cursor stays
 * meaningful even after earlier recipients are marked invalid.
 */
export class SqliteRecipientStore implements RecipientSetStore {
    readonly #db: SqliteDatabase;

    constructor(db: SqliteDatabase) {
        this.#db = db;
    }

    /** Import recipients from text lines. Blank lines and `#` comments are ignored. */
    importFromText(name: string, text: string, setId: string = randomUUID().slice(0, 8)): RecipientImportResult {
        const lines = text
            .split(/\r?\n/)
            .map((line) => line.trim())
            .filter((line) => line.length > 0 && !line.startsWith('#'));

        const seen = new Set<string>();
        const accepted: ParsedIdentifier[] = [];
        let duplicateCount = 0;
        let blacklistedCount = 0;

        for (const line of lines) {
            const parsed = parseRecipientIdentifier(line);
            if (!parsed.identifier) continue;

            const dedupKey = `${parsed.kind}:${parsed.identifier.toLowerCase()}`;
            if (seen.has(dedupKey)) {
                duplicateCount++;
                continue;
            }
            seen.add(dedupKey);

            if (this.isBlacklisted(parsed.identifier)) {
                blacklistedCount++;
                continue;
            }
            accepted.push(parsed);
        }

        const insertSet = this.#db.prepare(
            'INSERT INTO recipient_sets (id, name, source_count) VALUES (?, ?, ?)',
        );
        const insertRecipient = this.#db.prepare(`
            INSERT INTO recipients (set_id, position, identifier, identifier_key, kind)
            VALUES (?, ?, ?, ?, ?)
        `);

        this.#db.transaction(() => {
            insertSet.run(setId, name, lines.length);
            accepted.forEach((recipient, position) => {
                insertRecipient.run(setId, position, recipient.identifier, recipient.identifier.toLowerCase(), recipient.kind);
            });
        })();

        void logThought(
            `[RecipientStore] Imported set '${name}' (${setId}): ${lines.length} read, ` +
            `${accepted.length} stored, ${duplicateCount} duplicate, ${blacklistedCount} blacklisted.`,
        );

        return {
            setId,
            name,
            totalCount: lines.length,
            importedCount: accepted.length,
            duplicateCount,
            blacklistedCount,
        };
    }

    *validTargetsInOrder(setId: string, fromPosition = 0): Generator<PositionedRecipient> {
        const page = this.#db.prepare<[string, number, number], RecipientRow>(`
            SELECT * FROM recipients
            WHERE set_id = ? AND is_valid = 1 AND position >= ?
            ORDER BY position ASC
            LIMIT ?
        `);

        let next = fromPosition;
        // Pages are materialized so callers may write to the database between yields.
        for (;;) {
            const rows = page.all(setId, next, PAGE_SIZE);
            if (rows.length === 0) return;

            for (const row of rows) {
                yield rowToRecipient(row);
                next = row.position + 1;
            }

            if (rows.length < PAGE_SIZE) return;
        }
    }

    countValid(setId: string, fromPosition = 0): number {
        const row = this.#db
            .prepare<[string, number], { count: number }>(
                'SELECT COUNT(*) AS count FROM recipients WHERE set_id = ? AND is_valid = 1 AND position >= ?',
            )
            .get(setId, fromPosition);
        return row?.count ?? 0;
    }

    markInvalid(setId: string, identifier: string, reason: string): void {
        this.#db
            .prepare('UPDATE recipients SET is_valid = 0, error_reason = ? WHERE set_id = ? AND identifier_key = ?')
            .run(reason, setId, identifier.toLowerCase());
    }

    /** Remember what a recipient resolved to. */
    markResolved(setId: string, position: number, target: AddressableTarget): void {
        this.#db
            .prepare('UPDATE recipients SET resolved_id = ?, resolved_handle = ? WHERE set_id = ? AND position = ?')
            .run(target.id, target.handle ?? null, setId, position);
    }

    getRecipients(setId: string): PositionedRecipient[] {
        return this.#db
            .prepare<[string], RecipientRow>('SELECT * FROM recipients WHERE set_id = ? ORDER BY position ASC')
            .all(setId)
            .map(rowToRecipient);
    }

    getStats(setId: string): RecipientSetStats {
        const row = this.#db
            .prepare<[string], {
                total: number;
                valid: number | null;
                handles: number | null;
                numeric_ids: number | null;
                phones: number | null;
            }>(`
                SELECT
                    COUNT(*) AS total,
                    SUM(is_valid) AS valid,
                    SUM(kind = 'handle') AS handles,
                    SUM(kind = 'numeric-id') AS numeric_ids,
                    SUM(kind = 'phone') AS phones
                FROM recipients
                WHERE set_id = ?
            `)
            .get(setId);

        const total = row?.total ?? 0;
        const valid = row?.valid ?? 0;
        return {
            total,
            valid,
            invalid: total - valid,
            handles: row?.handles ?? 0,
            numericIds: row?.numeric_ids ?? 0,
            phones: row?.phones ?? 0,
        };
    }

    hasSet(setId: string): boolean {
        return this.#db.prepare('SELECT 1 FROM recipient_sets WHERE id = ?').get(setId) !== undefined;
    }

    listSets(): RecipientSetSummary[] {
        return this.#db
            .prepare<[], { id: string; name: string; source_count: number; recipient_count: number; created_at: string }>(`
                SELECT s.id, s.name, s.source_count, s.created_at, COUNT(r.position) AS recipient_count
                FROM recipient_sets s
                LEFT JOIN recipients r ON r.set_id = s.id
                GROUP BY s.id
                ORDER BY s.created_at ASC, s.rowid ASC
            `)
            .all()
            .map((row) => ({
                id: row.id,
                name: row.name,
                sourceCount: row.source_count,
                recipientCount: row.recipient_count,
                createdAt: row.created_at,
            }));
    }

    removeSet(setId: string): boolean {
        return this.#db.prepare('DELETE FROM recipient_sets WHERE id = ?').run(setId).changes > 0;
    }

    // ── Blacklist ─────────────────────────────────────────────────────────────

    isBlacklisted(identifier: string): boolean {
        return this.#db.prepare('SELECT 1 FROM blacklist WHERE identifier_key = ?').get(toBlacklistKey(identifier)) !== undefined;
    }

    /**
     * Add an identifier to the blacklist and invalidate it in every set.
     * Returns `false` when it was already listed.
     */
    addToBlacklist(identifier: string): boolean {
        const key = toBlacklistKey(identifier);
        if (!key) return false;

        const inserted = this.#db.transaction(() => {
            const result = this.#db.prepare('INSERT OR IGNORE INTO blacklist (identifier_key) VALUES (?)').run(key);
            if (result.changes === 0) return false;

            this.#db
                .prepare("UPDATE recipients SET is_valid = 0, error_reason = 'Blacklisted' WHERE identifier_key = ?")
                .run(key);
            return true;
        })();

        if (inserted) {
            void logThought(`[RecipientStore] Added '${key}' to the blacklist.`);
        }
        return inserted;
    }

    listBlacklist(): string[] {
        return this.#db
            .prepare<[], { identifier_key: string }>('SELECT identifier_key FROM blacklist ORDER BY identifier_key ASC')
            .all()
            .map((row) => row.identifier_key);
    }

    clearBlacklist(): number {
        const removed = this.#db.prepare('DELETE FROM blacklist').run().changes;
        void logThought(`[RecipientStore] Cleared blacklist (${removed} entries).`);
        return removed;
    }
}
