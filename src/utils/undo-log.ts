/**
 * Position in an `UndoLog`, returned by `checkpoint()`.
 */
export interface UndoMark {
    readonly position: number;
    readonly depth: number;
}

/**
 * Inverse operations recorded while at least one checkpoint is open.
 *
 * A checkpoint costs nothing up front; each write made after it records how
 * to undo itself, so rolling back is proportional to the work being undone
 * and not to the size of the state. Checkpoints nest.
 */
export class UndoLog {
    private entries: Array<() => void> = [];
    private open: number[] = [];

    get recording(): boolean {
        return this.open.length > 0;
    }

    checkpoint(): UndoMark {
        const mark = { position: this.entries.length, depth: this.open.length };
        this.open.push(mark.position);
        return mark;
    }

    /**
     * Undo everything recorded since `mark`, newest first, and close it
     * together with any checkpoint opened after it.
     */
    rollback(mark: UndoMark): void {
        this.requireOpen(mark);
        while (this.entries.length > mark.position) {
            this.entries.pop()?.();
        }
        this.close(mark);
    }

    /**
     * Keep the changes made since `mark` and close it.
     */
    release(mark: UndoMark): void {
        this.requireOpen(mark);
        this.close(mark);
    }

    record(undo: () => void): void {
        if (this.recording) this.entries.push(undo);
    }

    /**
     * `map.set` that records how to put the previous value back.
     */
    set<K, V>(map: Map<K, V>, key: K, value: V): void {
        this.recordPrevious(map, key);
        map.set(key, value);
    }

    /**
     * `map.delete` that records how to put the entry back.
     */
    delete<K, V>(map: Map<K, V>, key: K): boolean {
        this.recordPrevious(map, key);
        return map.delete(key);
    }

    private recordPrevious<K, V>(map: Map<K, V>, key: K): void {
        if (!this.recording) return;
        const previous = map.get(key);
        this.entries.push(() => {
            if (previous === undefined) map.delete(key);
            else map.set(key, previous);
        });
    }

    private requireOpen(mark: UndoMark): void {
        if (this.open[mark.depth] !== mark.position) {
            throw new Error('Checkpoint is no longer open');
        }
    }

    private close(mark: UndoMark): void {
        this.open.length = mark.depth;
        if (this.open.length === 0) this.entries = [];
    }
}
