/**
 * IMediaProber - Port for reading container metadata of local media files.
 */
export interface IMediaProber {
    /**
     * @throws ResolutionError(UnreadableMedia) when the file cannot be probed
     */
    probeDurationSeconds(filePath: string): Promise<number>;
}
