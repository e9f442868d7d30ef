import type { TagFields, TagStore } from "../interfaces/TagStore";

/**
 * Tag store kept in a map. Stands in for audio files in tests.
 */
export class MemoryTagStore implements TagStore {
    public readonly reads: string[] = [];
    public readonly writes: { filePath: string; fields: TagFields }[] = [];
    public failWrites = false;

    constructor(private readonly files: Record<string, TagFields> = {}) {}

    public async read(filePath: string): Promise<TagFields> {
        this.reads.push(filePath);
        return { ...(this.files[filePath] ?? {}) };
    }

    public async write(filePath: string, fields: TagFields): Promise<boolean> {
        this.writes.push({ filePath, fields });
        if (this.failWrites) return false;
        this.files[filePath] = { ...(this.files[filePath] ?? {}), ...fields };
        return true;
    }
}
