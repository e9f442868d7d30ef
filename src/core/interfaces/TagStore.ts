/**
 * Tag fields the core reads from and writes to an audio file.
 */
export interface TagFields {
    artist?: string;
    title?: string;
    lyrics?: string;
}

/**
 * Access to the tags embedded in audio files.
 * The core never parses a container format itself.
 */
export interface TagStore {
    read(filePath: string): Promise<TagFields>;

    /**
     * Writes all given fields in one operation.
     * @returns false when the file could not be updated.
     */
    write(filePath: string, fields: TagFields): Promise<boolean>;
}
