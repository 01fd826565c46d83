// JSON File Store
// Key-value persistence backed by a single JSON document on disk

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { KeyValueStore } from '@earshot/core';

const DocumentSchema = z.record(z.unknown());

type Document = Record<string, unknown>;

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Every write replaces the whole document through a temp file and rename.
 * Writes are serialized in call order.
 */
export class JsonFileStore implements KeyValueStore {
    private document: Document | null = null;
    private queue: Promise<void> = Promise.resolve();

    constructor(private readonly filePath: string) {}

    async get(key: string): Promise<unknown> {
        await this.queue;
        const document = await this.load();
        return Object.hasOwn(document, key) ? structuredClone(document[key]) : undefined;
    }

    set(key: string, value: unknown): Promise<void> {
        const copy = structuredClone(value);
        return this.update((document) => {
            document[key] = copy;
        });
    }

    remove(key: string): Promise<void> {
        return this.update((document) => {
            delete document[key];
        });
    }

    private update(mutate: (document: Document) => void): Promise<void> {
        const write = this.queue.then(async () => {
            const document = { ...(await this.load()) };
            mutate(document);
            await this.persist(document);
            this.document = document;
        });

        // A failed write rejects its own caller; later writes still run
        this.queue = write.catch((error: unknown) => {
            console.error(`[store] Write to ${this.filePath} failed:`, error);
        });
        return write;
    }

    private async load(): Promise<Document> {
        if (this.document) return this.document;

        let raw: string;
        try {
            raw = await readFile(this.filePath, 'utf8');
        } catch (error) {
            if (isMissingFile(error)) {
                this.document = {};
                return this.document;
            }
            throw error;
        }

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch {
            json = undefined;
        }

        const parsed = DocumentSchema.safeParse(json);
        if (!parsed.success) {
            console.warn(`[store] ${this.filePath} is not a JSON object, starting empty`);
        }
        this.document = parsed.success ? parsed.data : {};
        return this.document;
    }

    private async persist(document: Document): Promise<void> {
        await mkdir(dirname(this.filePath), { recursive: true });
        const tempPath = `${this.filePath}.${process.pid}.tmp`;
        await writeFile(tempPath, JSON.stringify(document, null, 2), 'utf8');
        await rename(tempPath, this.filePath);
    }
}
