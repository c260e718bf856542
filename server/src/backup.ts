import AdmZip from 'adm-zip';
import fs from 'fs';
import path from 'path';
import { ValidationError } from './errors.js';
import { errorMessage, log } from './logger.js';

const MODULE = 'backup';

/** Archive entry names; the layout is the contract for export and import. */
export const STORE_ENTRY = 'library.db';
export const POSTERS_ENTRY = 'posters';

/** What backup needs from the live store. */
export interface ReplaceableStore {
    readonly dbPath: string;
    snapshot(destination: string): Promise<void>;
    close(): void;
    open(): void;
    /** Throws unless `file` could stand in for the live database. */
    verifyReplacement(file: string): void;
}

/**
 * Backup: zips one session's database and poster directory, and restores
 * them from such a zip.
 */
export class Backup {
    constructor(
        private readonly store: ReplaceableStore,
        private readonly postersDir: string,
    ) {}

    /** `library.db` at the root plus a `posters/` tree mirroring the cache. */
    async exportArchive(): Promise<Buffer> {
        const scratch = this.makeScratchDir('export');
        try {
            const snapshotPath = path.join(scratch, STORE_ENTRY);
            await this.store.snapshot(snapshotPath);

            const zip = new AdmZip();
            zip.addLocalFile(snapshotPath, '', STORE_ENTRY);
            if (fs.existsSync(this.postersDir)) {
                zip.addLocalFolder(this.postersDir, POSTERS_ENTRY);
            }
            const archive = zip.toBuffer();
            log.info(MODULE, 'Backup exported', { bytes: archive.length });
            return archive;
        } finally {
            fs.rmSync(scratch, { recursive: true, force: true });
        }
    }

    /**
     * Replace the live database and poster directory with the archive's.
     * A blob that is not a zip, lacks `library.db`, or carries a file that is
     * not a catalog database is rejected before anything live is touched.
     */
    importArchive(blob: Buffer): void {
        const scratch = this.makeScratchDir('restore');
        try {
            const extracted = path.join(scratch, 'extracted');
            try {
                const zip = new AdmZip(blob);
                zip.extractAllTo(extracted, true);
            } catch (err) {
                throw new ValidationError(`Not a valid backup archive: ${errorMessage(err)}`);
            }

            const extractedDb = path.join(extracted, STORE_ENTRY);
            const extractedPosters = path.join(extracted, POSTERS_ENTRY);
            if (!fs.existsSync(extractedDb) || !fs.statSync(extractedDb).isFile()) {
                throw new ValidationError(`Backup archive is missing ${STORE_ENTRY}`);
            }
            try {
                this.store.verifyReplacement(extractedDb);
            } catch (err) {
                throw new ValidationError(`Backup ${STORE_ENTRY} is not a usable catalog: ${errorMessage(err)}`);
            }

            this.store.close();
            try {
                this.swapIn(extractedDb, fs.existsSync(extractedPosters) ? extractedPosters : null, scratch);
            } finally {
                this.store.open();
            }
            log.info(MODULE, 'Backup restored', { db: this.store.dbPath });
        } finally {
            fs.rmSync(scratch, { recursive: true, force: true });
        }
    }

    /**
     * Move the live files into `scratch` and the restored ones into place.
     * On failure the live files are moved back. Every rename stays inside
     * the session directory, so each one is atomic.
     */
    private swapIn(db: string, posters: string | null, scratch: string): void {
        const { dbPath } = this.store;
        const previousDb = path.join(scratch, 'previous.db');
        const previousPosters = path.join(scratch, 'previous-posters');

        for (const suffix of ['-wal', '-shm']) {
            fs.rmSync(`${dbPath}${suffix}`, { force: true });
        }
        const hadDb = fs.existsSync(dbPath);
        if (hadDb) fs.renameSync(dbPath, previousDb);
        const hadPosters = fs.existsSync(this.postersDir);
        if (hadPosters) fs.renameSync(this.postersDir, previousPosters);

        try {
            fs.renameSync(db, dbPath);
            if (posters) {
                fs.renameSync(posters, this.postersDir);
            } else {
                fs.mkdirSync(this.postersDir, { recursive: true });
            }
        } catch (err) {
            log.error(MODULE, 'Restore failed, putting the previous catalog back', { error: errorMessage(err) });
            fs.rmSync(dbPath, { force: true });
            fs.rmSync(this.postersDir, { recursive: true, force: true });
            if (hadDb) fs.renameSync(previousDb, dbPath);
            if (hadPosters) fs.renameSync(previousPosters, this.postersDir);
            throw err;
        }
    }

    private makeScratchDir(kind: string): string {
        const parent = path.dirname(this.store.dbPath);
        fs.mkdirSync(parent, { recursive: true });
        return fs.mkdtempSync(path.join(parent, `.${kind}-`));
    }
}
