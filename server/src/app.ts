import express from 'express';
import type { Request, Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { MEDIA_FORMATS, SORT_KEYS } from './db/db.js';
import { NotFoundError, ValidationError } from './errors.js';
import { log } from './logger.js';
import { asyncHandler } from './middleware/asyncHandler.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import type { Catalog, SessionRegistry } from './sessions.js';
import { newSessionId, sessionKey } from './sessions.js';

export const SESSION_HEADER = 'X-Session-Id';

// ---------- request schemas ----------

const idSchema = z.coerce.number().int().positive();

const shelfFieldsSchema = z.object({
    format: z.enum(MEDIA_FORMATS).optional(),
    watched: z.boolean().optional(),
    location: z.string().nullable().optional(),
    notes: z.string().nullable().optional(),
});

const newItemSchema = shelfFieldsSchema.extend({
    title: z.string({ required_error: 'Title is required' }),
    year: z.number().int().positive().nullable().optional(),
    plot: z.string().nullable().optional(),
    posterUrl: z.string().nullable().optional(),
});

const updateItemSchema = z.object({
    title: z.string().optional(),
    year: z.number().int().positive().nullable().optional(),
    plot: z.string().nullable().optional(),
    format: z.enum(MEDIA_FORMATS).optional(),
    watched: z.boolean().optional(),
    location: z.string().nullable().optional(),
    notes: z.string().nullable().optional(),
    posterUrl: z.string().nullable().optional(),
    posterPath: z.string().nullable().optional(),
});

const itemsQuerySchema = z.object({
    search: z.string().optional(),
    sort: z.enum(SORT_KEYS).optional(),
});

const fromSearchSchema = shelfFieldsSchema.extend({
    externalId: z.string().min(1, 'externalId is required'),
});

const scanSchema = shelfFieldsSchema.extend({
    code: z.string().trim().min(1, 'code is required'),
});

/** Form fields travel in the query string when the body is the photo. */
const scanImageQuerySchema = z.object({
    format: z.enum(MEDIA_FORMATS).optional(),
    watched: z.enum(['true', 'false']).transform((v) => v === 'true').optional(),
    location: z.string().optional(),
    notes: z.string().optional(),
});

const moveSchema = z.object({
    direction: z.enum(['up', 'down']),
});

/**
 * The caller's session id. A request without one gets a new id, echoed in
 * the response header for the client to keep.
 */
function sessionIdFor(req: Request, res: Response): string {
    const supplied = req.get(SESSION_HEADER);
    const sessionId = supplied ? sessionKey(supplied) : newSessionId();
    if (!supplied) log.debug('http', 'Minted session id', { session: sessionId });
    res.setHeader(SESSION_HEADER, sessionId);
    return sessionId;
}

function sessionCatalog(registry: SessionRegistry, req: Request, res: Response): Catalog {
    return registry.get(sessionIdFor(req, res));
}

function rawBody(req: Request, what: string): Buffer {
    if (!Buffer.isBuffer(req.body) || req.body.length === 0) {
        throw new ValidationError(`Request body must be ${what}`);
    }
    return req.body;
}

export function createApp(registry: SessionRegistry): express.Express {
    const app = express();
    app.use(cors({ exposedHeaders: [SESSION_HEADER] }));
    app.use(express.json());

    const catalogFor = (req: Request, res: Response) => sessionCatalog(registry, req, res);

    app.get('/api/status', (req, res) => {
        // Answered without opening a catalog; health checks create no stores.
        const sessionId = sessionIdFor(req, res);
        res.json({ sessionId, ...registry.resolver.status() });
    });

    // ---------- library routes ----------

    app.get('/api/items', (req, res) => {
        const { library } = catalogFor(req, res);
        const query = itemsQuerySchema.parse(req.query);
        res.json(library.getItems(query.search, query.sort));
    });

    app.post('/api/items', asyncHandler(async (req, res) => {
        const { library } = catalogFor(req, res);
        const input = newItemSchema.parse(req.body);
        const id = await library.addItem(input);
        res.status(201).json(library.getItem(id));
    }));

    app.post('/api/items/from-search', asyncHandler(async (req, res) => {
        const { library, enrichment } = catalogFor(req, res);
        const { externalId, ...fields } = fromSearchSchema.parse(req.body);
        const id = await enrichment.addFromSearchResult(externalId, fields);
        res.status(201).json(library.getItem(id));
    }));

    app.get('/api/items/:id', (req, res) => {
        const { library } = catalogFor(req, res);
        const id = idSchema.parse(req.params.id);
        const item = library.getItem(id);
        if (!item) throw new NotFoundError(`Item ${id} not found`);
        res.json(item);
    });

    app.patch('/api/items/:id', (req, res) => {
        const { library } = catalogFor(req, res);
        const id = idSchema.parse(req.params.id);
        if (!library.getItem(id)) throw new NotFoundError(`Item ${id} not found`);
        library.updateItem(id, updateItemSchema.parse(req.body));
        res.json(library.getItem(id));
    });

    app.delete('/api/items/:id', (req, res) => {
        const { library } = catalogFor(req, res);
        library.deleteItem(idSchema.parse(req.params.id));
        res.status(204).end();
    });

    app.get('/api/posters/:file', (req, res) => {
        const { library } = catalogFor(req, res);
        const file = library.posters.pathFor(req.params.file);
        if (!file) throw new NotFoundError('Poster not found');
        res.sendFile(file);
    });

    // ---------- list routes ----------

    app.get('/api/lists', (req, res) => {
        const { library } = catalogFor(req, res);
        res.json(library.getLists());
    });

    app.post('/api/lists', (req, res) => {
        const { library } = catalogFor(req, res);
        const { name } = z.object({ name: z.string() }).parse(req.body);
        const id = library.createList(name);
        res.status(201).json(library.getList(id));
    });

    app.delete('/api/lists/:id', (req, res) => {
        const { library } = catalogFor(req, res);
        library.deleteList(idSchema.parse(req.params.id));
        res.status(204).end();
    });

    app.get('/api/lists/:id/items', (req, res) => {
        const { library } = catalogFor(req, res);
        const listId = idSchema.parse(req.params.id);
        if (!library.getList(listId)) throw new NotFoundError(`List ${listId} not found`);
        res.json(library.getListItems(listId));
    });

    app.post('/api/lists/:id/items', (req, res) => {
        const { library } = catalogFor(req, res);
        const listId = idSchema.parse(req.params.id);
        const { itemId } = z.object({ itemId: idSchema }).parse(req.body);
        library.addToList(listId, itemId);
        res.status(201).json(library.getListItems(listId));
    });

    app.delete('/api/lists/:id/items/:itemId', (req, res) => {
        const { library } = catalogFor(req, res);
        library.removeFromList(idSchema.parse(req.params.id), idSchema.parse(req.params.itemId));
        res.status(204).end();
    });

    app.post('/api/lists/:id/items/:itemId/move', (req, res) => {
        const { library } = catalogFor(req, res);
        const listId = idSchema.parse(req.params.id);
        const { direction } = moveSchema.parse(req.body);
        library.moveItem(listId, idSchema.parse(req.params.itemId), direction);
        res.json(library.getListItems(listId));
    });

    // ---------- lookup routes ----------

    app.get('/api/search', asyncHandler(async (req, res) => {
        catalogFor(req, res);
        const q = typeof req.query.q === 'string' ? req.query.q : '';
        const configured = registry.resolver.status().titleSearch;
        const results = q.trim().length > 0 ? await registry.resolver.searchByTitle(q) : [];
        res.json({ configured, results });
    }));

    app.post('/api/scan', asyncHandler(async (req, res) => {
        const { enrichment } = catalogFor(req, res);
        const { code, ...fields } = scanSchema.parse(req.body);
        const outcome = await enrichment.addFromScan(code, fields);
        res.status(outcome.status === 'added' ? 201 : 200).json(outcome);
    }));

    app.post(
        '/api/scan/image',
        express.raw({ type: 'image/*', limit: '15mb' }),
        asyncHandler(async (req, res) => {
            const { enrichment } = catalogFor(req, res);
            const image = rawBody(req, 'an image');
            const fields = scanImageQuerySchema.parse(req.query);
            const outcome = await enrichment.decodeAndAdd(image, fields);
            res.status(outcome.status === 'added' ? 201 : 200).json(outcome);
        }),
    );

    // ---------- backup routes ----------

    app.get('/api/backup', asyncHandler(async (req, res) => {
        const { backup } = catalogFor(req, res);
        const archive = await backup.exportArchive();
        res.setHeader('Content-Type', 'application/zip');
        res.setHeader('Content-Disposition', 'attachment; filename="media_shelf_backup.zip"');
        res.send(archive);
    }));

    app.post(
        '/api/backup',
        express.raw({ type: ['application/zip', 'application/octet-stream'], limit: '500mb' }),
        (req, res) => {
            const { backup } = catalogFor(req, res);
            backup.importArchive(rawBody(req, 'a zip archive'));
            res.json({ restored: true });
        },
    );

    app.use(notFoundHandler);
    app.use(errorHandler);
    return app;
}
