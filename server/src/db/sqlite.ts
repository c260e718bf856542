import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { DuplicateNameError } from '../errors.js';
import { log } from '../logger.js';
import type {
    CatalogRepository, Item, ItemPatch, List, ListEntry, MediaFormat, MoveDirection, NewItemRow, SortKey,
} from './db.js';
import { SCHEMA_SQL } from './schema.js';

const MODULE = 'sqlite';

interface ItemRow {
    id: number;
    title: string;
    year: number | null;
    plot: string | null;
    poster_url: string | null;
    poster_path: string | null;
    format: MediaFormat;
    watched: number;
    location: string | null;
    notes: string | null;
    created_at: string;
    updated_at: string;
    source: string | null;
    source_id: string | null;
}

interface ListRow {
    id: number;
    name: string;
    created_at: string;
}

interface MembershipRow {
    item_id: number;
    position: number;
}

const ORDER_BY: Record<SortKey, string> = {
    title_asc: 'title COLLATE NOCASE ASC, id ASC',
    title_desc: 'title COLLATE NOCASE DESC, id DESC',
    // Missing years sort as 0, i.e. after every real year.
    year_desc: 'COALESCE(year, 0) DESC, title COLLATE NOCASE ASC, id ASC',
    added_desc: 'datetime(created_at) DESC, id DESC',
};

const PATCH_COLUMNS: Record<keyof ItemPatch, string> = {
    title: 'title',
    year: 'year',
    plot: 'plot',
    format: 'format',
    watched: 'watched',
    location: 'location',
    notes: 'notes',
    posterUrl: 'poster_url',
    posterPath: 'poster_path',
};

const REQUIRED_TABLES = ['items', 'lists', 'list_items'];

/** Open `file` on its own connection and confirm it is a readable catalog. */
export function checkCatalogFile(file: string): void {
    const db = new Database(file, { fileMustExist: true });
    try {
        const result: unknown = db.pragma('quick_check', { simple: true });
        if (result !== 'ok') throw new Error(`integrity check failed: ${String(result)}`);

        const tables = new Set(db
            .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table'")
            .all()
            .map((row) => row.name));
        const missing = REQUIRED_TABLES.filter((name) => !tables.has(name));
        if (missing.length > 0) throw new Error(`missing tables: ${missing.join(', ')}`);
    } finally {
        db.close();
    }
}

function isPatchKey(key: string): key is keyof ItemPatch {
    return key in PATCH_COLUMNS;
}

/**
 * SQLite implementation of CatalogRepository.
 * One instance per session database file; better-sqlite3 keeps every call
 * synchronous, so a request never observes a half-applied write.
 */
export class SQLiteCatalogRepository implements CatalogRepository {
    private db: Database.Database | null = null;

    constructor(readonly dbPath: string) {
        this.open();
    }

    /** (Re)open the database file and make sure the schema exists. */
    open(): void {
        if (this.db) return;
        const dir = path.dirname(this.dbPath);
        if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });

        this.db = new Database(this.dbPath);
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');
        this.init();
    }

    init(): void {
        this.conn.exec(SCHEMA_SQL);
        log.debug(MODULE, 'Catalog database ready', { path: this.dbPath });
    }

    /** Close the connection; WAL contents are checkpointed into the main file. */
    close(): void {
        if (!this.db) return;
        this.db.close();
        this.db = null;
    }

    /** Write a consistent copy of the live database to `destination`. */
    async snapshot(destination: string): Promise<void> {
        await this.conn.backup(destination);
    }

    /** Throws unless `file` is an intact catalog database. */
    verifyReplacement(file: string): void {
        checkCatalogFile(file);
    }

    /** The open connection; a repository closed while idle reopens on demand. */
    private get conn(): Database.Database {
        if (!this.db) {
            log.debug(MODULE, 'Reopening catalog database', { path: this.dbPath });
            this.open();
        }
        if (!this.db) throw new Error(`Catalog database ${this.dbPath} could not be opened`);
        return this.db;
    }

    // ---------- items ----------

    insertItem(row: NewItemRow): number {
        const result = this.conn.prepare(`
      INSERT INTO items (
        title, year, plot, poster_url, poster_path, format, watched, location, notes, source, source_id
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
            row.title, row.year, row.plot, row.posterUrl, row.posterPath, row.format,
            row.watched ? 1 : 0, row.location, row.notes, row.source, row.sourceId,
        );
        return Number(result.lastInsertRowid);
    }

    findItems(search: string, sort: SortKey): Item[] {
        let sql = 'SELECT * FROM items';
        const params: string[] = [];

        if (search) {
            sql += " WHERE title LIKE ? ESCAPE '\\'";
            params.push(`%${escapeLike(search)}%`);
        }
        sql += ` ORDER BY ${ORDER_BY[sort]}`;

        return this.conn.prepare<string[], ItemRow>(sql).all(...params).map(rowToItem);
    }

    findItem(id: number): Item | null {
        const row = this.conn.prepare<[number], ItemRow>('SELECT * FROM items WHERE id = ?').get(id);
        return row ? rowToItem(row) : null;
    }

    updateItem(id: number, patch: ItemPatch): boolean {
        const updates: string[] = [];
        const params: (string | number | null)[] = [];

        for (const [key, value] of Object.entries(patch)) {
            if (!isPatchKey(key) || value === undefined) continue;
            updates.push(`${PATCH_COLUMNS[key]} = ?`);
            params.push(typeof value === 'boolean' ? (value ? 1 : 0) : value);
        }
        if (updates.length === 0) return false;

        updates.push("updated_at = datetime('now')");
        params.push(id);

        const result = this.conn.prepare(`UPDATE items SET ${updates.join(', ')} WHERE id = ?`).run(...params);
        return result.changes > 0;
    }

    deleteItem(id: number): void {
        this.conn.prepare('DELETE FROM items WHERE id = ?').run(id);
    }

    // ---------- lists ----------

    insertList(name: string): number {
        try {
            const result = this.conn.prepare('INSERT INTO lists (name) VALUES (?)').run(name);
            return Number(result.lastInsertRowid);
        } catch (err) {
            if (err instanceof Database.SqliteError && err.code === 'SQLITE_CONSTRAINT_UNIQUE') {
                throw new DuplicateNameError(name);
            }
            throw err;
        }
    }

    findLists(): List[] {
        return this.conn
            .prepare<[], ListRow>('SELECT * FROM lists ORDER BY name COLLATE NOCASE ASC')
            .all()
            .map(rowToList);
    }

    findList(id: number): List | null {
        const row = this.conn.prepare<[number], ListRow>('SELECT * FROM lists WHERE id = ?').get(id);
        return row ? rowToList(row) : null;
    }

    deleteList(id: number): void {
        this.conn.prepare('DELETE FROM lists WHERE id = ?').run(id);
    }

    // ---------- memberships ----------

    addMembership(listId: number, itemId: number): void {
        const tx = this.conn.transaction(() => {
            const { maxPos } = this.conn
                .prepare<[number], { maxPos: number }>(
                    'SELECT COALESCE(MAX(position), 0) AS maxPos FROM list_items WHERE list_id = ?',
                )
                .get(listId) ?? { maxPos: 0 };
            this.conn
                .prepare('INSERT OR IGNORE INTO list_items (list_id, item_id, position) VALUES (?, ?, ?)')
                .run(listId, itemId, maxPos + 1);
        });
        tx();
    }

    removeMembership(listId: number, itemId: number): void {
        this.conn.prepare('DELETE FROM list_items WHERE list_id = ? AND item_id = ?').run(listId, itemId);
    }

    findListEntries(listId: number): ListEntry[] {
        const rows = this.conn.prepare<[number], ItemRow & { position: number }>(`
      SELECT li.position, i.*
      FROM list_items li
      JOIN items i ON i.id = li.item_id
      WHERE li.list_id = ?
      ORDER BY li.position ASC, li.item_id ASC
    `).all(listId);
        return rows.map((row) => ({ position: row.position, item: rowToItem(row) }));
    }

    swapWithNeighbour(listId: number, itemId: number, direction: MoveDirection): void {
        const tx = this.conn.transaction(() => {
            const rows = this.conn
                .prepare<[number], MembershipRow>(
                    'SELECT item_id, position FROM list_items WHERE list_id = ? ORDER BY position ASC, item_id ASC',
                )
                .all(listId);

            const idx = rows.findIndex((r) => r.item_id === itemId);
            if (idx === -1) return;
            const neighbourIdx = direction === 'up' ? idx - 1 : idx + 1;
            if (neighbourIdx < 0 || neighbourIdx >= rows.length) return;

            const a = rows[idx];
            const b = rows[neighbourIdx];
            const setPosition = this.conn.prepare(
                'UPDATE list_items SET position = ? WHERE list_id = ? AND item_id = ?',
            );
            setPosition.run(b.position, listId, a.item_id);
            setPosition.run(a.position, listId, b.item_id);
        });
        tx();
    }
}

function escapeLike(value: string): string {
    return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}

/** Convert a DB row to an Item */
function rowToItem(row: ItemRow): Item {
    return {
        id: row.id,
        title: row.title,
        year: row.year,
        plot: row.plot,
        posterUrl: row.poster_url,
        posterPath: row.poster_path,
        format: row.format,
        watched: row.watched === 1,
        location: row.location,
        notes: row.notes,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
        source: row.source,
        sourceId: row.source_id,
    };
}

function rowToList(row: ListRow): List {
    return {
        id: row.id,
        name: row.name,
        createdAt: row.created_at,
    };
}
