import type {
    CatalogRepository, Item, ItemPatch, List, ListEntry, MediaFormat, MoveDirection, SortKey,
} from './db/db.js';
import { DEFAULT_FORMAT, MEDIA_FORMATS } from './db/db.js';
import { NotFoundError, ValidationError } from './errors.js';
import { log } from './logger.js';
import type { PosterCache } from './posters.js';

const MODULE = 'library';

export interface NewItemInput {
    title: string;
    year?: number | null;
    plot?: string | null;
    posterUrl?: string | null;
    format?: MediaFormat;
    watched?: boolean;
    location?: string | null;
    notes?: string | null;
    source?: string | null;
    sourceId?: string | null;
}

/** User-editable fields; keys not listed here are ignored. */
export type ItemUpdate = ItemPatch;

/** Fields the user fills in on every add form, whatever the source of the metadata. */
export type ShelfFields = Pick<NewItemInput, 'format' | 'watched' | 'location' | 'notes'>;

function optionalText(value: string | null | undefined): string | null {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
}

function requireTitle(title: string | undefined): string {
    const trimmed = title?.trim();
    if (!trimmed) throw new ValidationError('Title is required');
    return trimmed;
}

function checkYear(year: number | null | undefined): number | null {
    if (year === null || year === undefined) return null;
    if (!Number.isInteger(year) || year <= 0) throw new ValidationError(`Invalid year: ${year}`);
    return year;
}

function checkFormat(format: string | undefined): MediaFormat {
    if (format === undefined) return DEFAULT_FORMAT;
    const match = MEDIA_FORMATS.find((f) => f === format);
    if (!match) throw new ValidationError(`Format must be one of ${MEDIA_FORMATS.join(', ')}`);
    return match;
}

/**
 * Library: the catalog store for one session. Normalizes and validates
 * input, then delegates to the repository, the only writer of the tables.
 */
export class Library {
    constructor(
        private readonly repo: CatalogRepository,
        readonly posters: PosterCache,
    ) {}

    // ---------- items ----------

    /** Insert an item, caching its poster first when a URL is given. */
    async addItem(input: NewItemInput): Promise<number> {
        const title = requireTitle(input.title);
        const year = checkYear(input.year);
        const format = checkFormat(input.format);
        const posterUrl = optionalText(input.posterUrl);
        const posterPath = posterUrl ? await this.posters.ensureCached(posterUrl) : null;

        const id = this.repo.insertItem({
            title,
            year,
            plot: optionalText(input.plot),
            posterUrl,
            posterPath,
            format,
            watched: input.watched ?? false,
            location: optionalText(input.location),
            notes: optionalText(input.notes),
            source: input.source ?? null,
            sourceId: input.sourceId ?? null,
        });
        log.info(MODULE, 'Item added', { id, title, source: input.source ?? 'manual' });
        return id;
    }

    getItems(search = '', sort: SortKey = 'title_asc'): Item[] {
        return this.repo.findItems(search.trim(), sort);
    }

    getItem(id: number): Item | null {
        return this.repo.findItem(id);
    }

    /** Apply recognized fields and refresh updated-at; a no-op without any. */
    updateItem(id: number, update: ItemUpdate): void {
        const patch: ItemPatch = {};
        if (update.title !== undefined) patch.title = requireTitle(update.title);
        if (update.year !== undefined) patch.year = checkYear(update.year);
        if (update.plot !== undefined) patch.plot = optionalText(update.plot);
        if (update.format !== undefined) patch.format = checkFormat(update.format);
        if (update.watched !== undefined) patch.watched = update.watched;
        if (update.location !== undefined) patch.location = optionalText(update.location);
        if (update.notes !== undefined) patch.notes = optionalText(update.notes);
        if (update.posterUrl !== undefined) patch.posterUrl = optionalText(update.posterUrl);
        if (update.posterPath !== undefined) patch.posterPath = optionalText(update.posterPath);

        if (this.repo.updateItem(id, patch)) log.debug(MODULE, 'Item updated', { id, fields: Object.keys(patch) });
    }

    /** Remove the item and its memberships. The cached poster stays on disk. */
    deleteItem(id: number): void {
        this.repo.deleteItem(id);
    }

    // ---------- lists ----------

    createList(name: string): number {
        const trimmed = name.trim();
        if (!trimmed) throw new ValidationError('List name is required');
        return this.repo.insertList(trimmed);
    }

    getLists(): List[] {
        return this.repo.findLists();
    }

    getList(id: number): List | null {
        return this.repo.findList(id);
    }

    deleteList(id: number): void {
        this.repo.deleteList(id);
    }

    /** Append at the end of the list; adding an existing member changes nothing. */
    addToList(listId: number, itemId: number): void {
        if (!this.repo.findList(listId)) throw new NotFoundError(`List ${listId} not found`);
        if (!this.repo.findItem(itemId)) throw new NotFoundError(`Item ${itemId} not found`);
        this.repo.addMembership(listId, itemId);
    }

    removeFromList(listId: number, itemId: number): void {
        this.repo.removeMembership(listId, itemId);
    }

    getListItems(listId: number): ListEntry[] {
        return this.repo.findListEntries(listId);
    }

    /** Swap positions with the neighbour in the given direction, if there is one. */
    moveItem(listId: number, itemId: number, direction: MoveDirection): void {
        this.repo.swapWithNeighbour(listId, itemId, direction);
    }
}
