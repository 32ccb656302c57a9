/**
 * Append-only change ledger of a project. Entries are kept in append order;
 * per-category counters are derived from the entries themselves.
 */
import { CHANGE_CATEGORY_LABELS } from '../Domain/Project.js';
import type { ChangeCategory, ChangeLogEntry } from '../Domain/Project.js';
import { GetTimestamp } from '../Common/Log.js';

export class ChangeLog {
    private readonly _entries: ChangeLogEntry[] = [];
    private readonly _counts: Map<ChangeCategory, number> = new Map();

    /**
     * @param entries ChangeLogEntry[] - Previously persisted entries, in append order
     */
    constructor(entries: ChangeLogEntry[] = []) {
        for (const entry of entries) {
            this._entries.push({ ...entry });
            this._counts.set(entry.category, this.Count(entry.category) + 1);
        }
    }

    /**
     * Legacy key of an entry.
     * @example
     * ChangeLog.Key({ category: 'status', sequence: 2, ... }); // 'Status Change #2'
     */
    public static Key(entry: Pick<ChangeLogEntry, 'category' | 'sequence'>): string {
        return `${CHANGE_CATEGORY_LABELS[entry.category]} Change #${entry.sequence}`;
    }

    /**
     * Appends one entry under the next sequence number of its category.
     * @returns ChangeLogEntry - The stored entry
     */
    public Append(category: ChangeCategory, description: string, timestamp: string = GetTimestamp()): ChangeLogEntry {
        const sequence = this.Count(category) + 1;
        const entry: ChangeLogEntry = { category, sequence, timestamp, description };
        this._entries.push(entry);
        this._counts.set(category, sequence);
        return { ...entry };
    }

    /** Number of entries recorded for a category. */
    public Count(category: ChangeCategory): number {
        return this._counts.get(category) ?? 0;
    }

    /** Counter view over every category. */
    public Counters(): Record<ChangeCategory, number> {
        return {
            identity: this.Count(`identity`),
            file: this.Count(`file`),
            status: this.Count(`status`),
            responsible: this.Count(`responsible`),
            quantity: this.Count(`quantity`),
            name: this.Count(`name`),
            customer: this.Count(`customer`),
            shipping: this.Count(`shipping`),
            comment: this.Count(`comment`),
        };
    }

    /** Total number of entries. */
    public get size(): number {
        return this._entries.length;
    }

    /** Entries in append (chronological) order. */
    public Entries(): ChangeLogEntry[] {
        return this._entries.map(entry => ({ ...entry }));
    }

    /** Entries of one category, oldest first. */
    public ForCategory(category: ChangeCategory): ChangeLogEntry[] {
        return this.Entries().filter(entry => entry.category === category);
    }

    /** Entries in ascending key order: category label, then sequence number. */
    public Sorted(): ChangeLogEntry[] {
        return this.Entries().sort((a, b) => {
            const labelA = CHANGE_CATEGORY_LABELS[a.category];
            const labelB = CHANGE_CATEGORY_LABELS[b.category];
            if (labelA !== labelB) {
                return labelA < labelB ? -1 : 1;
            }
            return a.sequence - b.sequence;
        });
    }
}
