/**
 * Persistence port for a registry's records.
 * The registry always hands over the full record list; implementations
 * may rewrite their backing store wholesale.
 */
export interface IRecordStore<T> {
    load(): Promise<T[]>;
    saveAll(records: T[]): Promise<void>;
}
