import fs from 'fs';
import path from 'path';
import { IRecordStore } from '../../domain/ports/IRecordStore';

/**
 * Record store backed by a single JSON list on disk.
 * Every save rewrites the whole file; there is no file-level locking, so two
 * instances pointing at the same path race (last writer wins).
 */
export class JsonFileRecordStore<T> implements IRecordStore<T> {
    private readonly filePath: string;

    constructor(
        filePath: string,
        private readonly isRecord: (value: unknown) => value is T
    ) {
        this.filePath = path.resolve(process.cwd(), filePath);
    }

    async load(): Promise<T[]> {
        try {
            if (!fs.existsSync(this.filePath)) {
                return [];
            }
            const data = await fs.promises.readFile(this.filePath, 'utf-8');
            const parsed: unknown = JSON.parse(data);
            if (!Array.isArray(parsed)) {
                console.error(`[RecordStore] ${this.filePath} does not hold a JSON list, starting empty`);
                return [];
            }
            const records = parsed.filter(this.isRecord);
            if (records.length !== parsed.length) {
                console.warn(`[RecordStore] Skipped ${parsed.length - records.length} malformed records in ${this.filePath}`);
            }
            return records;
        } catch (error) {
            console.error(`[RecordStore] Failed to load ${this.filePath}:`, error);
            return [];
        }
    }

    async saveAll(records: T[]): Promise<void> {
        await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.promises.writeFile(this.filePath, JSON.stringify(records, null, 2), 'utf-8');
    }
}

/**
 * Record store kept in memory. Holds copies so callers cannot alias stored state.
 */
export class InMemoryRecordStore<T> implements IRecordStore<T> {
    private records: T[];
    saveCount = 0;

    constructor(initial: T[] = []) {
        this.records = structuredClone(initial);
    }

    async load(): Promise<T[]> {
        return structuredClone(this.records);
    }

    async saveAll(records: T[]): Promise<void> {
        this.records = structuredClone(records);
        this.saveCount += 1;
    }

    snapshot(): T[] {
        return structuredClone(this.records);
    }
}
