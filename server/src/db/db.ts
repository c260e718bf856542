/**
 * Item: one physical media unit on the shelf.
 * `source`/`sourceId` record which lookup populated the metadata, if any.
 */
export interface Item {
    id: number;
    title: string;
    year: number | null;
    plot: string | null;
    posterUrl: string | null;
    /** File name inside the session's poster cache. */
    posterPath: string | null;
    format: MediaFormat;
    watched: boolean;
    location: string | null;
    notes: string | null;
    createdAt: string;
    updatedAt: string;
    source: string | null;
    sourceId: string | null;
}

export const MEDIA_FORMATS = ['DVD', 'Blu-ray', '4K'] as const;
export type MediaFormat = (typeof MEDIA_FORMATS)[number];
export const DEFAULT_FORMAT: MediaFormat = 'Blu-ray';

export interface List {
    id: number;
    name: string;
    createdAt: string;
}

export interface ListEntry {
    position: number;
    item: Item;
}

export const SORT_KEYS = ['title_asc', 'title_desc', 'year_desc', 'added_desc'] as const;
export type SortKey = (typeof SORT_KEYS)[number];

export type MoveDirection = 'up' | 'down';

/** Column values for a new row, already normalized by the caller. */
export interface NewItemRow {
    title: string;
    year: number | null;
    plot: string | null;
    posterUrl: string | null;
    posterPath: string | null;
    format: MediaFormat;
    watched: boolean;
    location: string | null;
    notes: string | null;
    source: string | null;
    sourceId: string | null;
}

export type ItemPatch = Partial<Pick<NewItemRow,
    'title' | 'year' | 'plot' | 'format' | 'watched' | 'location' | 'notes' | 'posterUrl' | 'posterPath'>>;

/**
 * CatalogRepository: persistence for items, lists and memberships.
 * All calls are synchronous and each read is a fresh query.
 */
export interface CatalogRepository {
    /** Create tables if missing. */
    init(): void;

    insertItem(row: NewItemRow): number;
    findItems(search: string, sort: SortKey): Item[];
    findItem(id: number): Item | null;
    /** Returns false when no recognized field was given or the item is unknown. */
    updateItem(id: number, patch: ItemPatch): boolean;
    deleteItem(id: number): void;

    /** Throws DuplicateNameError on a case-insensitive collision. */
    insertList(name: string): number;
    findLists(): List[];
    findList(id: number): List | null;
    deleteList(id: number): void;

    addMembership(listId: number, itemId: number): void;
    removeMembership(listId: number, itemId: number): void;
    findListEntries(listId: number): ListEntry[];
    swapWithNeighbour(listId: number, itemId: number, direction: MoveDirection): void;
}
